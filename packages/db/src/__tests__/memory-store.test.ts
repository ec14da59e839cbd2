import { describe, it, expect, beforeEach } from 'vitest';
import { VisitStatus } from '@visitor-kiosk/core';
import { MemoryKioskStore } from '../memory-store.js';

function tickingClock(start = Date.parse('2026-03-02T09:00:00.000Z')) {
  let minutes = 0;
  return () => new Date(start + minutes++ * 60_000);
}

const ALICE = { full_name: 'Alice Smith', email: 'alice@example.com', phone: null, id_number: null };

describe('MemoryKioskStore', () => {
  let store: MemoryKioskStore;

  beforeEach(() => {
    store = new MemoryKioskStore({ now: tickingClock() });
  });

  describe('getOrCreateVisitor', () => {
    it('reuses the visitor with the same name and email', async () => {
      const first = await store.getOrCreateVisitor(ALICE);
      const second = await store.getOrCreateVisitor({ ...ALICE, phone: '5551234567' });

      expect(second.id).toBe(first.id);
      expect(await store.listVisitors({ skip: 0, limit: 25 })).toHaveLength(1);
    });

    it('creates a new visitor when the email differs', async () => {
      const first = await store.getOrCreateVisitor(ALICE);
      const second = await store.getOrCreateVisitor({ ...ALICE, email: 'alice@work.example' });

      expect(second.id).not.toBe(first.id);
    });

    it('matches visitors without email to each other', async () => {
      const first = await store.getOrCreateVisitor({ ...ALICE, email: null });
      const second = await store.getOrCreateVisitor({ ...ALICE, email: null });
      expect(second.id).toBe(first.id);
    });
  });

  describe('getOrCreateHost', () => {
    it('names a new host after the email local part', async () => {
      const host = await store.getOrCreateHost('bob.jones@example.com');
      expect(host).toEqual({
        id: 1,
        full_name: 'bob.jones',
        email: 'bob.jones@example.com',
        phone: null,
        department: null,
      });
    });

    it('returns a seeded host unchanged', async () => {
      await store.ensureHost({ full_name: 'Bob Jones', email: 'bob@example.com', phone: null, department: 'Sales' });
      const host = await store.getOrCreateHost('bob@example.com');

      expect(host.full_name).toBe('Bob Jones');
      expect(host.department).toBe('Sales');
    });
  });

  describe('visit logs', () => {
    it('creates a checked-in visit with nested visitor and host', async () => {
      const visitor = await store.getOrCreateVisitor(ALICE);
      const host = await store.getOrCreateHost('bob@example.com');
      const visit = await store.createVisitLog({ visitorId: visitor.id, hostId: host.id, purpose: 'Interview' });

      expect(visit.status).toBe(VisitStatus.CHECKED_IN);
      expect(visit.visitor).toEqual(visitor);
      expect(visit.host).toEqual(host);
      expect(visit.check_out_time).toBeNull();
      expect(visit.check_in_time.toISOString()).toBe('2026-03-02T09:01:00.000Z');
    });

    it('lists the most recent check-in first', async () => {
      const visitor = await store.getOrCreateVisitor(ALICE);
      const host = await store.getOrCreateHost('bob@example.com');
      for (const purpose of ['first', 'second', 'third']) {
        await store.createVisitLog({ visitorId: visitor.id, hostId: host.id, purpose });
      }

      const logs = await store.listVisitLogs({ skip: 0, limit: 25 });
      expect(logs.map((l) => l.purpose)).toEqual(['third', 'second', 'first']);

      const page = await store.listVisitLogs({ skip: 1, limit: 1 });
      expect(page.map((l) => l.purpose)).toEqual(['second']);
    });

    it('updates status and check-out time', async () => {
      const visitor = await store.getOrCreateVisitor(ALICE);
      const host = await store.getOrCreateHost('bob@example.com');
      const visit = await store.createVisitLog({ visitorId: visitor.id, hostId: host.id, purpose: null });
      const out = new Date('2026-03-02T17:00:00.000Z');

      const updated = await store.transitionVisit(visit.id, VisitStatus.CHECKED_IN, VisitStatus.CHECKED_OUT, out);
      expect(updated?.status).toBe(VisitStatus.CHECKED_OUT);
      expect(updated?.check_out_time).toEqual(out);
      expect((await store.findVisitLog(visit.id))?.status).toBe(VisitStatus.CHECKED_OUT);
    });

    it('returns null when updating an unknown visit', async () => {
      expect(await store.transitionVisit(99, VisitStatus.CHECKED_IN, VisitStatus.CANCELLED, null)).toBeNull();
    });

    it('leaves a visit alone when it is not in the expected status', async () => {
      const visitor = await store.getOrCreateVisitor(ALICE);
      const host = await store.getOrCreateHost('bob@example.com');
      const visit = await store.createVisitLog({ visitorId: visitor.id, hostId: host.id, purpose: null });
      await store.transitionVisit(visit.id, VisitStatus.CHECKED_IN, VisitStatus.CANCELLED, null);

      const out = new Date('2026-03-02T17:00:00.000Z');
      expect(await store.transitionVisit(visit.id, VisitStatus.CHECKED_IN, VisitStatus.CHECKED_OUT, out)).toBeNull();
      expect(await store.findVisitLog(visit.id)).toMatchObject({ status: VisitStatus.CANCELLED, check_out_time: null });
    });
  });

  describe('admin users', () => {
    it('never lists the password hash', async () => {
      await store.ensureAdminUser({ username: 'admin', hashedPassword: 'hash', full_name: null });
      const [user] = await store.listAdminUsers({ skip: 0, limit: 25 });

      expect(user).toEqual({
        id: 1,
        username: 'admin',
        full_name: null,
        is_active: true,
        created_at: new Date('2026-03-02T09:00:00.000Z'),
      });
    });

    it('does not insert a duplicate username', async () => {
      expect(await store.ensureAdminUser({ username: 'admin', hashedPassword: 'a', full_name: null })).toBe(true);
      expect(await store.ensureAdminUser({ username: 'admin', hashedPassword: 'b', full_name: null })).toBe(false);
    });
  });

  it('paginates visitors by offset and limit', async () => {
    for (const name of ['A', 'B', 'C', 'D']) {
      await store.getOrCreateVisitor({ ...ALICE, full_name: name });
    }
    const page = await store.listVisitors({ skip: 1, limit: 2 });
    expect(page.map((v) => v.full_name)).toEqual(['B', 'C']);
  });
});
