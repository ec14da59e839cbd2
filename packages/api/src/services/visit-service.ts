import { VisitStatus, type CheckinDetails, type VisitLogRecord } from '@visitor-kiosk/core';
import type { KioskStore } from '@visitor-kiosk/db';

/** Carries the HTTP status the global error handler replies with. */
export class VisitError extends Error {
  constructor(message: string, readonly statusCode: number) {
    super(message);
    this.name = 'VisitError';
  }
}

export class VisitService {
  private store: KioskStore;
  private now: () => Date;

  constructor(store: KioskStore, now: () => Date = () => new Date()) {
    this.store = store;
    this.now = now;
  }

  /** Record a completed interview as a checked-in visit. */
  async finalize(details: CheckinDetails): Promise<VisitLogRecord> {
    const visitor = await this.store.getOrCreateVisitor({
      full_name: details.full_name,
      email: details.email,
      phone: details.phone,
      id_number: details.id_number,
    });
    const host = await this.store.getOrCreateHost(details.host_email);

    return this.store.createVisitLog({
      visitorId: visitor.id,
      hostId: host.id,
      purpose: details.purpose,
    });
  }

  async checkOut(visitId: number): Promise<VisitLogRecord> {
    return this.close(visitId, VisitStatus.CHECKED_OUT);
  }

  async cancel(visitId: number): Promise<VisitLogRecord> {
    return this.close(visitId, VisitStatus.CANCELLED);
  }

  // Only a visit still on site can be checked out or cancelled. The store
  // applies the status check and the update together.
  private async close(visitId: number, status: VisitStatus): Promise<VisitLogRecord> {
    const checkOutTime = status === VisitStatus.CHECKED_OUT ? this.now() : null;
    const updated = await this.store.transitionVisit(visitId, VisitStatus.CHECKED_IN, status, checkOutTime);
    if (updated) return updated;

    const visit = await this.store.findVisitLog(visitId);
    if (!visit) throw new VisitError('Visit not found', 404);
    throw new VisitError(`Visit is already ${visit.status}`, 409);
  }
}
