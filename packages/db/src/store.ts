import type {
  AdminUserRecord,
  HostRecord,
  PageRequest,
  VisitLogRecord,
  VisitorRecord,
  VisitStatus,
} from '@visitor-kiosk/core';

export interface NewVisitor {
  full_name: string;
  email: string | null;
  phone: string | null;
  id_number: string | null;
}

export interface NewVisitLog {
  visitorId: number;
  hostId: number;
  purpose: string | null;
}

export interface NewHost {
  full_name: string;
  email: string;
  phone: string | null;
  department: string | null;
}

export interface NewAdminUser {
  username: string;
  hashedPassword: string;
  full_name: string | null;
}

/**
 * Persistence boundary for visitors, hosts, visit logs and admin users.
 *
 * The get-or-create operations look up by natural key and insert only when
 * nothing matches: visitors by (full_name, email), hosts by email.
 */
export interface KioskStore {
  readonly name: string;

  getOrCreateVisitor(visitor: NewVisitor): Promise<VisitorRecord>;
  /** Creates the host named after the e-mail's local part when unknown. */
  getOrCreateHost(email: string): Promise<HostRecord>;
  createVisitLog(visit: NewVisitLog): Promise<VisitLogRecord>;
  findVisitLog(id: number): Promise<VisitLogRecord | null>;
  /**
   * Move a visit from `from` to `to` in one step. Returns null when no visit
   * with that id is currently in `from`.
   */
  transitionVisit(
    id: number,
    from: VisitStatus,
    to: VisitStatus,
    checkOutTime: Date | null,
  ): Promise<VisitLogRecord | null>;

  listVisitors(page: PageRequest): Promise<VisitorRecord[]>;
  /** Most recent check-in first. */
  listVisitLogs(page: PageRequest): Promise<VisitLogRecord[]>;
  listHosts(page: PageRequest): Promise<HostRecord[]>;
  listAdminUsers(page: PageRequest): Promise<AdminUserRecord[]>;

  /** Inserts the host unless the e-mail exists. Returns true when a row was added. */
  ensureHost(host: NewHost): Promise<boolean>;
  /** Inserts the admin unless the username exists. Returns true when a row was added. */
  ensureAdminUser(user: NewAdminUser): Promise<boolean>;

  ping(): Promise<void>;
  close(): Promise<void>;
}

export function hostNameFromEmail(email: string): string {
  return email.split('@')[0];
}
