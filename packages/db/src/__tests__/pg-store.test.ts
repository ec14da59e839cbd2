import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { newDb } from 'pg-mem';
import { VisitStatus } from '@visitor-kiosk/core';
import { PgKioskStore, parseVisitStatus } from '../pg-store.js';

const SCHEMA = readFileSync(fileURLToPath(new URL('../../schema.sql', import.meta.url)), 'utf8');

const ALICE = { full_name: 'Alice Smith', email: 'alice@example.com', phone: null, id_number: null };

describe('parseVisitStatus', () => {
  it('maps stored status text to the enum', () => {
    expect(parseVisitStatus('checked_in')).toBe(VisitStatus.CHECKED_IN);
    expect(parseVisitStatus('checked_out')).toBe(VisitStatus.CHECKED_OUT);
    expect(parseVisitStatus('cancelled')).toBe(VisitStatus.CANCELLED);
  });

  it('rejects unknown values', () => {
    expect(() => parseVisitStatus('pending')).toThrow(
      'Unknown visit status "pending" (expected one of checked_in, checked_out, cancelled)',
    );
  });
});

describe('PgKioskStore', () => {
  let store: PgKioskStore;

  beforeEach(() => {
    const db = newDb();
    db.public.none(SCHEMA);
    const { Pool } = db.adapters.createPg();
    store = new PgKioskStore(new Pool());
  });

  afterEach(async () => {
    await store.close();
  });

  describe('getOrCreateVisitor', () => {
    it('reuses the visitor with the same name and email', async () => {
      const first = await store.getOrCreateVisitor(ALICE);
      const second = await store.getOrCreateVisitor({ ...ALICE, phone: '5551234567' });

      expect(second.id).toBe(first.id);
      expect(await store.listVisitors({ skip: 0, limit: 25 })).toHaveLength(1);
    });

    it('matches visitors without email to each other', async () => {
      const first = await store.getOrCreateVisitor({ ...ALICE, email: null });
      const second = await store.getOrCreateVisitor({ ...ALICE, email: null });

      expect(second.id).toBe(first.id);
      expect(second.email).toBeNull();
    });

    it('keeps a visitor without email apart from one with email', async () => {
      const withEmail = await store.getOrCreateVisitor(ALICE);
      const withoutEmail = await store.getOrCreateVisitor({ ...ALICE, email: null });

      expect(withoutEmail.id).not.toBe(withEmail.id);
    });
  });

  describe('getOrCreateHost', () => {
    it('creates the host once and returns it again on conflict', async () => {
      const first = await store.getOrCreateHost('bob.jones@example.com');
      const second = await store.getOrCreateHost('bob.jones@example.com');

      expect(first).toEqual({
        id: first.id,
        full_name: 'bob.jones',
        email: 'bob.jones@example.com',
        phone: null,
        department: null,
      });
      expect(second).toEqual(first);
      expect(await store.listHosts({ skip: 0, limit: 25 })).toHaveLength(1);
    });
  });

  describe('visit logs', () => {
    async function checkIn(purpose: string) {
      const visitor = await store.getOrCreateVisitor(ALICE);
      const host = await store.getOrCreateHost('bob@example.com');
      return store.createVisitLog({ visitorId: visitor.id, hostId: host.id, purpose });
    }

    it('returns the new visit with visitor and host', async () => {
      const visit = await checkIn('Interview');

      expect(visit.status).toBe(VisitStatus.CHECKED_IN);
      expect(visit.purpose).toBe('Interview');
      expect(visit.check_out_time).toBeNull();
      expect(visit.visitor.full_name).toBe('Alice Smith');
      expect(visit.host.email).toBe('bob@example.com');
    });

    it('lists the newest visit first and pages with skip and limit', async () => {
      const ids: number[] = [];
      for (const purpose of ['first', 'second', 'third']) {
        ids.push((await checkIn(purpose)).id);
      }

      const logs = await store.listVisitLogs({ skip: 0, limit: 25 });
      expect(logs.map((l) => l.id)).toEqual([...ids].reverse());

      const page = await store.listVisitLogs({ skip: 1, limit: 1 });
      expect(page.map((l) => l.purpose)).toEqual(['second']);
    });

    it('moves a checked-in visit once and refuses the second move', async () => {
      const visit = await checkIn('Delivery');
      const out = new Date('2026-03-02T17:00:00.000Z');

      const closed = await store.transitionVisit(visit.id, VisitStatus.CHECKED_IN, VisitStatus.CHECKED_OUT, out);
      expect(closed?.status).toBe(VisitStatus.CHECKED_OUT);
      expect(closed?.check_out_time?.toISOString()).toBe('2026-03-02T17:00:00.000Z');

      expect(await store.transitionVisit(visit.id, VisitStatus.CHECKED_IN, VisitStatus.CANCELLED, null)).toBeNull();
      expect((await store.findVisitLog(visit.id))?.status).toBe(VisitStatus.CHECKED_OUT);
    });

    it('returns null for an unknown visit', async () => {
      expect(await store.findVisitLog(99)).toBeNull();
      expect(await store.transitionVisit(99, VisitStatus.CHECKED_IN, VisitStatus.CANCELLED, null)).toBeNull();
    });
  });

  it('answers a ping', async () => {
    await expect(store.ping()).resolves.toBeUndefined();
  });
});
