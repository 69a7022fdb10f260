//process-scoped state: polling watermark and the review-ticket registry
//loaded when the reconciler starts, checkpointed after each batch, saved on shutdown
import type { FieldId, ReviewTicket } from '../models/index.js';
import { transitionTicket } from './order-state.js';

export interface ProcessStateSnapshot {
  watermark: string | null;
  tickets: ReviewTicket[];
}

export interface IProcessStateStore {
  load(): ProcessStateSnapshot;
  save(snapshot: ProcessStateSnapshot): void;
}

const sameFields = (a: FieldId[], b: FieldId[]): boolean =>
  a.length === b.length && [...a].sort().join('|') === [...b].sort().join('|');

export class ProcessState {
  private tickets = new Map<string, ReviewTicket>();

  constructor(public watermark: string | null = null, tickets: ReviewTicket[] = []) {
    for (const t of tickets) this.tickets.set(t.orderRecordId, t);
  }

  static fromSnapshot(snapshot: ProcessStateSnapshot): ProcessState {
    return new ProcessState(snapshot.watermark, snapshot.tickets);
  }

  snapshot(): ProcessStateSnapshot {
    return { watermark: this.watermark, tickets: [...this.tickets.values()] };
  }

  //only moves forward
  advanceWatermark(receivedAt: string): void {
    if (this.watermark === null || receivedAt > this.watermark) this.watermark = receivedAt;
  }

  getTicket(orderRecordId: string): ReviewTicket | undefined {
    return this.tickets.get(orderRecordId);
  }

  openTickets(): ReviewTicket[] {
    return [...this.tickets.values()].filter(t => t.status !== 'closed').sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  //open a ticket, or refresh the missing fields of the one already open.
  //`notify` is true only when the missing-field set differs from the last one notified.
  recordIncomplete(orderRecordId: string, missingFields: FieldId[], now: Date = new Date()): { ticket: ReviewTicket; notify: boolean } {
    const existing = this.tickets.get(orderRecordId);
    if (!existing || existing.status === 'closed') {
      const ticket: ReviewTicket = {
        orderRecordId, missingFields, notifiedFields: missingFields, status: 'open',
        createdAt: now.toISOString(), updatedAt: now.toISOString(),
      };
      this.tickets.set(orderRecordId, ticket);
      return { ticket, notify: true };
    }

    const notify = !sameFields(existing.notifiedFields, missingFields);
    const patch = { missingFields, ...(notify ? { notifiedFields: missingFields } : {}) };
    const ticket = existing.status === 'open'
      ? { ...existing, ...patch, updatedAt: now.toISOString() }
      : transitionTicket(existing, 'open', patch, now);
    this.tickets.set(orderRecordId, ticket);
    return { ticket, notify };
  }

  //rebuild the open ticket of a record the ledger still holds for review, e.g. after a
  //restart that lost the state written since the last checkpoint; the reviewer was already notified
  restore(orderRecordId: string, missingFields: FieldId[], now: Date = new Date()): ReviewTicket {
    const existing = this.tickets.get(orderRecordId);
    if (existing && existing.status !== 'closed') return existing;
    const ticket: ReviewTicket = {
      orderRecordId, missingFields, notifiedFields: missingFields, status: 'open',
      createdAt: now.toISOString(), updatedAt: now.toISOString(),
    };
    this.tickets.set(orderRecordId, ticket);
    return ticket;
  }

  markResolving(orderRecordId: string, now: Date = new Date()): ReviewTicket | undefined {
    return this.move(orderRecordId, 'resolved_pending_revalidation', now);
  }

  reopen(orderRecordId: string, now: Date = new Date()): ReviewTicket | undefined {
    return this.move(orderRecordId, 'open', now);
  }

  close(orderRecordId: string, now: Date = new Date()): ReviewTicket | undefined {
    return this.move(orderRecordId, 'closed', now);
  }

  private move(orderRecordId: string, to: ReviewTicket['status'], now: Date): ReviewTicket | undefined {
    const existing = this.tickets.get(orderRecordId);
    if (!existing || existing.status === to) return existing;
    const ticket = transitionTicket(existing, to, {}, now);
    this.tickets.set(orderRecordId, ticket);
    return ticket;
  }
}
