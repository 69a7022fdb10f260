//notification formatting: every outbound message the reconciler emits is built here
import type { Logger } from 'pino';
import type {
  BatchSummary, CommandListener, CommandResponse, CompleteOrder, FieldId, Notification, Notifier,
  OrderRecord, OrderStatus, ReviewTicket, SessionStats, StockAdjustment,
} from '../models/index.js';
import { ORDER_STATUSES } from '../models/index.js';
import { createChildLogger } from '../utils/logger.js';
import { formatAmount } from './money.js';

const ITEM_FIELD = /^item\[(\d+)\]\.(.+)$/;
const MAX_WARNINGS = 3;

const kindLabel = (kind: string | undefined): string => (kind === 'sale' ? 'Sale' : kind === 'purchase' ? 'Purchase' : 'Order');

//human-readable review notes: order-level fields on one line,
//then one line per item naming the item and what it lacks.
export function reviewNotes(record: OrderRecord, missingFields: FieldId[]): string[] {
  const orderFields: string[] = [];
  const byItem = new Map<number, string[]>();
  for (const field of missingFields) {
    const m = ITEM_FIELD.exec(field);
    if (m) {
      const index = Number(m[1]);
      byItem.set(index, [...(byItem.get(index) ?? []), m[2] ?? field]);
    } else {
      orderFields.push(field.replace(/^order\./, ''));
    }
  }

  const notes: string[] = [];
  if (orderFields.length > 0) notes.push(`Order: ${orderFields.join(', ')}`);
  for (const [index, fields] of [...byItem.entries()].sort((a, b) => a[0] - b[0])) {
    const name = record.items?.[index]?.rawName?.trim();
    notes.push(`Item ${index + 1}${name ? ` (${name})` : ''}: ${fields.join(', ')}`);
  }
  return notes;
}

export function reviewNotification(record: OrderRecord & { externalRecordId: string }, missingFields: FieldId[], warnings: string[] = []): Notification {
  const id = record.externalRecordId;
  return {
    level: 'warning',
    title: `Review needed: ${kindLabel(record.kind)} ${record.orderNumber ?? '(no order number)'}`,
    message: `Record ${id} is missing ${missingFields.length} field(s). Fix the record, then send "resolved ${id}".`,
    fields: {
      'Record': id,
      'Missing fields': reviewNotes(record, missingFields).join('\n'),
      ...(record.counterparty ? { 'Counterparty': record.counterparty } : {}),
      ...(warnings.length > 0 ? { 'Warnings': warnings.slice(0, MAX_WARNINGS).join('\n') } : {}),
    },
    orderRecordId: id,
  };
}

export function syncedNotification(order: CompleteOrder, adjustments: StockAdjustment[], warnings: string[]): Notification {
  const units = adjustments.reduce((n, a) => n + a.signedQuantity, 0);
  return {
    level: warnings.length > 0 ? 'warning' : 'success',
    title: `${kindLabel(order.kind)} ${order.orderNumber} synced`,
    message: `${order.items.length} item(s), tax $${formatAmount(order.tax)}, ${adjustments.length} stock adjustment(s) confirmed (${order.kind === 'purchase' ? '+' : '-'}${units} units)`,
    fields: {
      'Record': order.externalRecordId,
      'Counterparty': order.counterparty,
      'Date': order.date,
      ...(warnings.length > 0 ? { 'Warnings': warnings.slice(0, MAX_WARNINGS).join('\n') } : {}),
    },
    orderRecordId: order.externalRecordId,
  };
}

export function failureNotification(record: OrderRecord, cause: string, applied: number, total: number): Notification {
  return {
    level: 'error',
    title: `${kindLabel(record.kind)} ${record.orderNumber ?? '(no order number)'} failed`,
    message: cause,
    fields: {
      ...(record.externalRecordId ? { 'Record': record.externalRecordId } : {}),
      ...(total > 0 ? { 'Adjustments applied': `${applied} of ${total}` } : {}),
    },
    ...(record.externalRecordId ? { orderRecordId: record.externalRecordId } : {}),
  };
}

export function batchSummaryNotification(summary: BatchSummary): Notification {
  const attempted = summary.outcomes.length - summary.skipped;
  const rate = attempted > 0 ? Math.round((summary.synced / attempted) * 100) : 100;
  return {
    level: summary.failed > 0 ? 'warning' : 'info',
    title: 'Batch complete',
    message: `${summary.fetched} message(s): ${summary.synced} synced, ${summary.review} awaiting review, ${summary.failed} failed, ${summary.skipped} skipped`,
    fields: { 'Success rate': `${rate}%` },
  };
}

export function sessionStatsNotification(stats: SessionStats, now: Date = new Date()): Notification {
  const minutes = Math.floor((now.getTime() - stats.sessionStart.getTime()) / 60_000);
  return {
    level: 'info',
    title: 'Session statistics',
    message: `${stats.processed} order(s) processed in ${minutes} min`,
    fields: {
      'Synced': String(stats.synced),
      'Awaiting review': String(stats.review),
      'Failed': String(stats.failed),
      'Skipped': String(stats.skipped),
      'Session start': stats.sessionStart.toISOString(),
    },
  };
}

export function statusReport(counts: Record<OrderStatus, number>, openTickets: number): string {
  const lines = ORDER_STATUSES.map(s => `${s}: ${counts[s]}`);
  return [...lines, `open review tickets: ${openTickets}`].join('\n');
}

export function pendingReport(tickets: ReviewTicket[]): string {
  if (tickets.length === 0) return 'No open review tickets';
  return tickets
    .map(t => `${t.orderRecordId} [${t.status}] missing: ${t.missingFields.join(', ')}`)
    .join('\n');
}

const LOG_METHOD = { success: 'info', info: 'info', warning: 'warn', error: 'error' } as const;

//Notifier that writes to the log; commands are fed in through dispatch()
export class LogNotifier implements Notifier {
  private listeners: CommandListener[] = [];
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createChildLogger({ component: 'notifier' });
  }

  emit(notification: Notification): Promise<void> {
    const { level, title, message, fields, orderRecordId } = notification;
    this.logger[LOG_METHOD[level]]({ notification: level, orderRecordId, fields }, `${title}: ${message}`);
    return Promise.resolve();
  }

  onCommand(listener: CommandListener): void {
    this.listeners.push(listener);
  }

  dispatch(text: string): Promise<CommandResponse[]> {
    return Promise.all(this.listeners.map(l => l(text)));
  }
}
