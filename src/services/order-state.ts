//order and review-ticket lifecycles - pure domain logic, no storage.
//ORDER FLOW:
//pending_validation → complete → synced
//        ↓               ↓
//incomplete_awaiting_review → failed
//        ↺ (re-validated, still incomplete)
//TICKET FLOW:
//open → resolved_pending_revalidation → open (still incomplete)
//                                     → closed (order synced or failed)
import type { OrderRecord, OrderStatus, ReviewTicket, ReviewTicketStatus } from '../models/index.js';
import { ContractViolationError } from '../errors.js';

export interface TransitionDefinition {
  to: OrderStatus;
  description: string;
}

export const ORDER_STATUS_TRANSITIONS: Record<OrderStatus, TransitionDefinition[]> = {
  pending_validation: [
    { to: 'complete', description: 'Validator verdict is complete' },
    { to: 'incomplete_awaiting_review', description: 'Validator verdict is incomplete; open a review ticket' },
  ],
  complete: [
    { to: 'synced', description: 'Stock adjustments acknowledged by the stock backend' },
    { to: 'failed', description: 'Submission failed after exhausting retries' },
  ],
  incomplete_awaiting_review: [
    { to: 'incomplete_awaiting_review', description: 'Re-validated after a resolve command, still incomplete' },
    { to: 'complete', description: 'Re-validated after a resolve command, now complete' },
  ],
  synced: [],
  failed: [],
};

export const TICKET_STATUS_TRANSITIONS: Record<ReviewTicketStatus, ReviewTicketStatus[]> = {
  open: ['resolved_pending_revalidation', 'closed'],
  resolved_pending_revalidation: ['open', 'closed'],
  closed: [],
};

export function isValidTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_STATUS_TRANSITIONS[from].some(t => t.to === to);
}

export function isTerminalStatus(status: OrderStatus): boolean {
  return ORDER_STATUS_TRANSITIONS[status].length === 0;
}

export function getValidTargetStatuses(from: OrderStatus): OrderStatus[] {
  return ORDER_STATUS_TRANSITIONS[from].map(t => t.to);
}

//returns the record in its new status; synced and failed records are never touched again
export function transitionOrder(record: OrderRecord, to: OrderStatus, patch: Partial<OrderRecord> = {}, now: Date = new Date()): OrderRecord {
  if (!isValidTransition(record.status, to)) {
    throw new ContractViolationError(`Invalid order transition ${record.status} → ${to} for ${record.externalRecordId ?? record.orderNumber ?? '?'}`);
  }
  return { ...record, ...patch, status: to, updatedAt: now.toISOString() };
}

export function transitionTicket(ticket: ReviewTicket, to: ReviewTicketStatus, patch: Partial<ReviewTicket> = {}, now: Date = new Date()): ReviewTicket {
  if (!TICKET_STATUS_TRANSITIONS[ticket.status].includes(to)) {
    throw new ContractViolationError(`Invalid review ticket transition ${ticket.status} → ${to} for ${ticket.orderRecordId}`);
  }
  return { ...ticket, ...patch, status: to, updatedAt: now.toISOString() };
}
