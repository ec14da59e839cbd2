// Visitor Kiosk Core Types
//
// Record shapes are snake_case: they are the JSON the kiosk frontend and the
// admin dashboard read.

// ============================================================================
// Visit Types
// ============================================================================

export enum VisitStatus {
  CHECKED_IN = 'checked_in',
  CHECKED_OUT = 'checked_out',
  CANCELLED = 'cancelled',
}

export interface VisitorRecord {
  id: number;
  full_name: string;
  email: string | null;
  phone: string | null;
  id_number: string | null; // ID card or passport number
  created_at: Date;
}

export interface HostRecord {
  id: number;
  full_name: string;
  email: string;
  phone: string | null;
  department: string | null;
}

export interface VisitLogRecord {
  id: number;
  visitor: VisitorRecord;
  host: HostRecord;
  purpose: string | null;
  check_in_time: Date;
  check_out_time: Date | null;
  status: VisitStatus;
}

// ============================================================================
// Admin Types
// ============================================================================

/** Dashboard account as exposed by the API. The password hash never leaves the store. */
export interface AdminUserRecord {
  id: number;
  username: string;
  full_name: string | null;
  is_active: boolean;
  created_at: Date;
}

// ============================================================================
// Check-in Types
// ============================================================================

/** Completed interview answers, normalized for persistence. */
export interface CheckinDetails {
  full_name: string;
  email: string | null;
  phone: string | null;
  id_number: string | null;
  purpose: string | null;
  host_email: string;
}

export interface PageRequest {
  skip: number;
  limit: number;
}
