import type { Pool } from 'pg';
import {
  VisitStatus,
  type AdminUserRecord,
  type HostRecord,
  type PageRequest,
  type VisitLogRecord,
  type VisitorRecord,
} from '@visitor-kiosk/core';
import { hostNameFromEmail, type KioskStore, type NewAdminUser, type NewHost, type NewVisitLog, type NewVisitor } from './store.js';

interface VisitorRow {
  id: number;
  full_name: string;
  email: string | null;
  phone: string | null;
  id_number: string | null;
  created_at: Date;
}

interface HostRow {
  id: number;
  full_name: string;
  email: string;
  phone: string | null;
  department: string | null;
}

interface VisitLogRow {
  id: number;
  purpose: string | null;
  check_in_time: Date;
  check_out_time: Date | null;
  status: string;
  visitor_id: number;
  visitor_full_name: string;
  visitor_email: string | null;
  visitor_phone: string | null;
  visitor_id_number: string | null;
  visitor_created_at: Date;
  host_id: number;
  host_full_name: string;
  host_email: string;
  host_phone: string | null;
  host_department: string | null;
}

interface AdminUserRow {
  id: number;
  username: string;
  full_name: string | null;
  is_active: boolean;
  created_at: Date;
}

const VISITOR_COLUMNS = 'id, full_name, email, phone, id_number, created_at';
const HOST_COLUMNS = 'id, full_name, email, phone, department';

const VISIT_LOG_SELECT = `
  SELECT vl.id, vl.purpose, vl.check_in_time, vl.check_out_time, vl.status,
         v.id AS visitor_id, v.full_name AS visitor_full_name, v.email AS visitor_email,
         v.phone AS visitor_phone, v.id_number AS visitor_id_number, v.created_at AS visitor_created_at,
         h.id AS host_id, h.full_name AS host_full_name, h.email AS host_email,
         h.phone AS host_phone, h.department AS host_department
    FROM visit_logs vl
    JOIN visitors v ON v.id = vl.visitor_id
    JOIN hosts h ON h.id = vl.host_id`;

const VISIT_STATUSES: readonly string[] = Object.values(VisitStatus);

export function parseVisitStatus(value: string): VisitStatus {
  switch (value) {
    case VisitStatus.CHECKED_IN:
      return VisitStatus.CHECKED_IN;
    case VisitStatus.CHECKED_OUT:
      return VisitStatus.CHECKED_OUT;
    case VisitStatus.CANCELLED:
      return VisitStatus.CANCELLED;
    default:
      throw new Error(`Unknown visit status "${value}" (expected one of ${VISIT_STATUSES.join(', ')})`);
  }
}

function toVisitLog(row: VisitLogRow): VisitLogRecord {
  return {
    id: row.id,
    visitor: {
      id: row.visitor_id,
      full_name: row.visitor_full_name,
      email: row.visitor_email,
      phone: row.visitor_phone,
      id_number: row.visitor_id_number,
      created_at: row.visitor_created_at,
    },
    host: {
      id: row.host_id,
      full_name: row.host_full_name,
      email: row.host_email,
      phone: row.host_phone,
      department: row.host_department,
    },
    purpose: row.purpose,
    check_in_time: row.check_in_time,
    check_out_time: row.check_out_time,
    status: parseVisitStatus(row.status),
  };
}

/**
 * PostgreSQL store on a `pg` pool. Each statement commits on its own;
 * nothing holds a connection between calls.
 */
export class PgKioskStore implements KioskStore {
  readonly name = 'PostgreSQL';

  constructor(private readonly pool: Pool) {}

  async getOrCreateVisitor(visitor: NewVisitor): Promise<VisitorRecord> {
    // A visitor without e-mail matches the earlier one without e-mail
    const existing = await this.pool.query<VisitorRow>(
      `SELECT ${VISITOR_COLUMNS} FROM visitors
        WHERE full_name = $1 AND (email = $2 OR (email IS NULL AND $2::text IS NULL))
        ORDER BY id LIMIT 1`,
      [visitor.full_name, visitor.email],
    );
    if (existing.rows.length > 0) return existing.rows[0];

    const created = await this.pool.query<VisitorRow>(
      `INSERT INTO visitors (full_name, email, phone, id_number)
       VALUES ($1, $2, $3, $4)
       RETURNING ${VISITOR_COLUMNS}`,
      [visitor.full_name, visitor.email, visitor.phone, visitor.id_number],
    );
    return created.rows[0];
  }

  async getOrCreateHost(email: string): Promise<HostRecord> {
    const inserted = await this.pool.query<HostRow>(
      `INSERT INTO hosts (full_name, email) VALUES ($1, $2)
       ON CONFLICT (email) DO NOTHING
       RETURNING ${HOST_COLUMNS}`,
      [hostNameFromEmail(email), email],
    );
    if (inserted.rows.length > 0) return inserted.rows[0];

    const existing = await this.pool.query<HostRow>(
      `SELECT ${HOST_COLUMNS} FROM hosts WHERE email = $1`,
      [email],
    );
    return existing.rows[0];
  }

  async createVisitLog(visit: NewVisitLog): Promise<VisitLogRecord> {
    const inserted = await this.pool.query<{ id: number }>(
      `INSERT INTO visit_logs (visitor_id, host_id, purpose, status)
       VALUES ($1, $2, $3, $4)
       RETURNING id`,
      [visit.visitorId, visit.hostId, visit.purpose, VisitStatus.CHECKED_IN],
    );
    const created = await this.findVisitLog(inserted.rows[0].id);
    if (!created) throw new Error(`Visit log ${inserted.rows[0].id} vanished after insert`);
    return created;
  }

  async findVisitLog(id: number): Promise<VisitLogRecord | null> {
    const result = await this.pool.query<VisitLogRow>(`${VISIT_LOG_SELECT} WHERE vl.id = $1`, [id]);
    return result.rows.length > 0 ? toVisitLog(result.rows[0]) : null;
  }

  async transitionVisit(
    id: number,
    from: VisitStatus,
    to: VisitStatus,
    checkOutTime: Date | null,
  ): Promise<VisitLogRecord | null> {
    const updated = await this.pool.query(
      'UPDATE visit_logs SET status = $3, check_out_time = $4 WHERE id = $1 AND status = $2',
      [id, from, to, checkOutTime],
    );
    if (!updated.rowCount) return null;
    return this.findVisitLog(id);
  }

  async listVisitors(page: PageRequest): Promise<VisitorRecord[]> {
    const result = await this.pool.query<VisitorRow>(
      `SELECT ${VISITOR_COLUMNS} FROM visitors ORDER BY id LIMIT $2 OFFSET $1`,
      [page.skip, page.limit],
    );
    return result.rows;
  }

  async listVisitLogs(page: PageRequest): Promise<VisitLogRecord[]> {
    const result = await this.pool.query<VisitLogRow>(
      `${VISIT_LOG_SELECT} ORDER BY vl.check_in_time DESC, vl.id DESC LIMIT $2 OFFSET $1`,
      [page.skip, page.limit],
    );
    return result.rows.map(toVisitLog);
  }

  async listHosts(page: PageRequest): Promise<HostRecord[]> {
    const result = await this.pool.query<HostRow>(
      `SELECT ${HOST_COLUMNS} FROM hosts ORDER BY id LIMIT $2 OFFSET $1`,
      [page.skip, page.limit],
    );
    return result.rows;
  }

  async listAdminUsers(page: PageRequest): Promise<AdminUserRecord[]> {
    const result = await this.pool.query<AdminUserRow>(
      `SELECT id, username, full_name, is_active, created_at
         FROM admin_users ORDER BY id LIMIT $2 OFFSET $1`,
      [page.skip, page.limit],
    );
    return result.rows;
  }

  async ensureHost(host: NewHost): Promise<boolean> {
    const result = await this.pool.query(
      `INSERT INTO hosts (full_name, email, phone, department)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (email) DO NOTHING`,
      [host.full_name, host.email, host.phone, host.department],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async ensureAdminUser(user: NewAdminUser): Promise<boolean> {
    const result = await this.pool.query(
      `INSERT INTO admin_users (username, hashed_password, full_name)
       VALUES ($1, $2, $3)
       ON CONFLICT (username) DO NOTHING`,
      [user.username, user.hashedPassword, user.full_name],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
