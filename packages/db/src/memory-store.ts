import {
  VisitStatus,
  type AdminUserRecord,
  type HostRecord,
  type PageRequest,
  type VisitLogRecord,
  type VisitorRecord,
} from '@visitor-kiosk/core';
import {
  hostNameFromEmail,
  type KioskStore,
  type NewAdminUser,
  type NewHost,
  type NewVisitLog,
  type NewVisitor,
} from './store.js';

interface VisitLogRow {
  id: number;
  visitorId: number;
  hostId: number;
  purpose: string | null;
  check_in_time: Date;
  check_out_time: Date | null;
  status: VisitStatus;
}

interface AdminUserRow extends AdminUserRecord {
  hashed_password: string;
}

export interface MemoryKioskStoreOptions {
  /** Clock used for created_at and check_in_time. */
  now?: () => Date;
}

/**
 * In-process store with the same semantics as the PostgreSQL one.
 * Backs `STORE_ADAPTER=memory` for local demos and the API tests.
 */
export class MemoryKioskStore implements KioskStore {
  readonly name = 'Memory';

  private visitors: VisitorRecord[] = [];
  private hosts: HostRecord[] = [];
  private visitLogs: VisitLogRow[] = [];
  private adminUsers: AdminUserRow[] = [];
  private nextId = { visitor: 1, host: 1, visitLog: 1, adminUser: 1 };
  private now: () => Date;

  constructor(options: MemoryKioskStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async getOrCreateVisitor(visitor: NewVisitor): Promise<VisitorRecord> {
    const existing = this.visitors.find(
      (v) => v.full_name === visitor.full_name && v.email === visitor.email,
    );
    if (existing) return { ...existing };

    const created: VisitorRecord = { id: this.nextId.visitor++, ...visitor, created_at: this.now() };
    this.visitors.push(created);
    return { ...created };
  }

  async getOrCreateHost(email: string): Promise<HostRecord> {
    const existing = this.hosts.find((h) => h.email === email);
    if (existing) return { ...existing };

    const created: HostRecord = {
      id: this.nextId.host++,
      full_name: hostNameFromEmail(email),
      email,
      phone: null,
      department: null,
    };
    this.hosts.push(created);
    return { ...created };
  }

  async createVisitLog(visit: NewVisitLog): Promise<VisitLogRecord> {
    const row: VisitLogRow = {
      id: this.nextId.visitLog++,
      visitorId: visit.visitorId,
      hostId: visit.hostId,
      purpose: visit.purpose,
      check_in_time: this.now(),
      check_out_time: null,
      status: VisitStatus.CHECKED_IN,
    };
    this.visitLogs.push(row);
    return this.toRecord(row);
  }

  async findVisitLog(id: number): Promise<VisitLogRecord | null> {
    const row = this.visitLogs.find((v) => v.id === id);
    return row ? this.toRecord(row) : null;
  }

  async transitionVisit(
    id: number,
    from: VisitStatus,
    to: VisitStatus,
    checkOutTime: Date | null,
  ): Promise<VisitLogRecord | null> {
    const row = this.visitLogs.find((v) => v.id === id);
    if (!row || row.status !== from) return null;
    row.status = to;
    row.check_out_time = checkOutTime;
    return this.toRecord(row);
  }

  async listVisitors(page: PageRequest): Promise<VisitorRecord[]> {
    return paginate(this.visitors, page).map((v) => ({ ...v }));
  }

  async listVisitLogs(page: PageRequest): Promise<VisitLogRecord[]> {
    const newestFirst = [...this.visitLogs].sort(
      (a, b) => b.check_in_time.getTime() - a.check_in_time.getTime() || b.id - a.id,
    );
    return paginate(newestFirst, page).map((row) => this.toRecord(row));
  }

  async listHosts(page: PageRequest): Promise<HostRecord[]> {
    return paginate(this.hosts, page).map((h) => ({ ...h }));
  }

  async listAdminUsers(page: PageRequest): Promise<AdminUserRecord[]> {
    return paginate(this.adminUsers, page).map(({ hashed_password: _hash, ...user }) => user);
  }

  async ensureHost(host: NewHost): Promise<boolean> {
    if (this.hosts.some((h) => h.email === host.email)) return false;
    this.hosts.push({ id: this.nextId.host++, ...host });
    return true;
  }

  async ensureAdminUser(user: NewAdminUser): Promise<boolean> {
    if (this.adminUsers.some((u) => u.username === user.username)) return false;
    this.adminUsers.push({
      id: this.nextId.adminUser++,
      username: user.username,
      hashed_password: user.hashedPassword,
      full_name: user.full_name,
      is_active: true,
      created_at: this.now(),
    });
    return true;
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {}

  private toRecord(row: VisitLogRow): VisitLogRecord {
    const visitor = this.visitors.find((v) => v.id === row.visitorId);
    const host = this.hosts.find((h) => h.id === row.hostId);
    if (!visitor || !host) {
      throw new Error(`Visit log ${row.id} references a missing visitor or host`);
    }
    return {
      id: row.id,
      visitor: { ...visitor },
      host: { ...host },
      purpose: row.purpose,
      check_in_time: row.check_in_time,
      check_out_time: row.check_out_time,
      status: row.status,
    };
  }
}

function paginate<T>(rows: T[], page: PageRequest): T[] {
  return rows.slice(page.skip, page.skip + page.limit);
}
