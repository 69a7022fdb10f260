//Stateful workflow orchestrator: Validate → Resolve → Allocate → Adjust, or → Review
import type { Logger } from 'pino';
import type {
  AuditEntry, BatchSummary, CommandResponse, CompleteLineItem, CompleteOrder, InboxSource, LedgerStore, LineItem, Micro, Notification,
  Notifier, OrderDraft, OrderRecord, OutcomeKind, PersistedOrderRecord, ProcessingOutcome, RawMessage,
  ReconciliationConfig, SessionStats, StockAdjustment, StockBackend, StructuredExtractor, ValidationVerdict,
} from '../models/index.js';
import { RECONCILIATION_DEFAULTS } from '../models/index.js';
import type { IAuditLog } from '../repository/audit-repository.js';
import { ContractViolationError, SubmissionInterruptedError, describeError } from '../errors.js';
import { createChildLogger } from '../utils/logger.js';
import { buildAdjustments } from './adjustment-builder.js';
import { COMMAND_USAGE, parseCommand } from './commands.js';
import { CostAllocator } from './cost-allocator.js';
import { KeyedLock } from './keyed-lock.js';
import { UNIT_COST_PLACES, formatAmount, parseAmount } from './money.js';
import { normalizeDraft } from './normalize.js';
import {
  batchSummaryNotification, failureNotification, pendingReport, reviewNotification, sessionStatsNotification,
  statusReport, syncedNotification,
} from './notifications.js';
import { isTerminalStatus, isValidTransition, transitionOrder } from './order-state.js';
import { ProcessState, type IProcessStateStore } from './process-state.js';
import { RetryPolicy } from './retry.js';
import { SkuResolver } from './sku-resolver.js';
import { identifierWarnings, reconciliationWarnings, toCompleteOrder, validate } from './validator.js';

export interface ReconcilerDependencies {
  ledger: LedgerStore;
  stock: StockBackend;
  notifier: Notifier;
  stateStore: IProcessStateStore;
  audit?: IAuditLog;
  config?: ReconciliationConfig;
  logger?: Logger;
  retry?: RetryPolicy;
  lock?: KeyedLock;
  clock?: () => Date;
}

//public reconciler interface
export interface IReconciler {
  ingest(draft: OrderDraft, confidenceScore: number): Promise<ProcessingOutcome>;
  processRecord(externalRecordId: string): Promise<ProcessingOutcome>;
  runBatch(inbox: InboxSource, extractor: StructuredExtractor): Promise<BatchSummary>;
  handleCommand(text: string): Promise<CommandResponse>;
}

//one order's trip through the pipeline
interface RunContext {
  record: PersistedOrderRecord;
  order?: CompleteOrder;
  trail: AuditEntry[];
  warnings: string[];
  adjustments: StockAdjustment[];
  applied: number;
  log: Logger;
}

function chunkArray<T>(arr: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < arr.length; i += size) {
    chunks.push(arr.slice(i, i + size));
  }
  return chunks;
}

//statuses where a second arrival of the same natural key is a no-op
const SETTLED_ON_ARRIVAL = new Set(['synced', 'incomplete_awaiting_review', 'failed']);

export class Reconciler implements IReconciler {
  readonly state: ProcessState;
  private readonly config: ReconciliationConfig;
  private readonly logger: Logger;
  private readonly retry: RetryPolicy;
  private readonly lock: KeyedLock;
  private readonly clock: () => Date;
  private readonly resolver: SkuResolver;
  private readonly allocator: CostAllocator;
  private readonly tolerance: Micro;
  private session: SessionStats;

  constructor(private deps: ReconcilerDependencies) {
    this.config = deps.config ?? RECONCILIATION_DEFAULTS;
    this.logger = deps.logger ?? createChildLogger({ component: 'reconciler' });
    this.retry = deps.retry ?? new RetryPolicy(this.config.retry, undefined, this.logger);
    this.lock = deps.lock ?? new KeyedLock();
    this.clock = deps.clock ?? (() => new Date());
    this.resolver = new SkuResolver(deps.stock, {
      logger: this.logger.child({ component: 'sku-resolver' }),
      ...(this.config.skuPrefix ? { skuPrefix: this.config.skuPrefix } : {}),
    });
    this.allocator = new CostAllocator(deps.stock, this.config.apportionBasis, this.logger.child({ component: 'cost-allocator' }));
    this.tolerance = parseAmount(this.config.totalMismatchTolerance) ?? 0n;
    //process state is loaded once, here; checkpoint() and shutdown() write it back
    this.state = ProcessState.fromSnapshot(deps.stateStore.load());
    this.session = { processed: 0, synced: 0, review: 0, failed: 0, skipped: 0, sessionStart: this.clock() };
  }

  get stats(): SessionStats {
    return { ...this.session };
  }

  //entry point for a freshly extracted draft.
  //the natural key (orderNumber + kind) is checked first: a record that already
  //reached sync, review or failure is skipped; one left mid-pipeline is resumed.
  async ingest(draft: OrderDraft, confidenceScore: number): Promise<ProcessingOutcome> {
    const orderNumber = draft.orderNumber?.trim(), kind = draft.kind;
    if (!orderNumber || !kind) return this.createAndProcess(draft, confidenceScore);
    return this.lock.run([`order:${kind}:${orderNumber}`], async () => {
      let existing: PersistedOrderRecord | undefined;
      try {
        existing = await this.retry.execute('ledger lookup', () => this.deps.ledger.findByNaturalKey(orderNumber, kind));
      } catch (err) {
        return this.failBeforePersist(draft, err);
      }
      if (!existing) return this.createAndProcess(draft, confidenceScore);

      if (SETTLED_ON_ARRIVAL.has(existing.status)) {
        this.logger.info({ externalRecordId: existing.externalRecordId, orderNumber, kind, status: existing.status }, 'duplicate order skipped');
        if (existing.status === 'incomplete_awaiting_review') this.restoreTicket(existing);
        const entry = this.entry('ingest', `Duplicate of ${existing.externalRecordId} (${existing.status}), skipped`);
        return this.record(this.outcome('skipped', existing, [entry]));
      }
      this.logger.info({ externalRecordId: existing.externalRecordId, orderNumber, kind, status: existing.status }, 'resuming order left mid-pipeline');
      return this.processRecord(existing.externalRecordId);
    });
  }

  //re-run the pipeline for a stored record from whatever status it is in
  async processRecord(externalRecordId: string): Promise<ProcessingOutcome> {
    return this.lock.run([`record:${externalRecordId}`], async () => {
      const record = await this.retry.execute('ledger get', () => this.deps.ledger.get(externalRecordId));
      if (!record) {
        throw new ContractViolationError(`Order record ${externalRecordId} does not exist`);
      }
      return this.record(await this.advance(record));
    });
  }

  async runBatch(inbox: InboxSource, extractor: StructuredExtractor): Promise<BatchSummary> {
    const messages = await this.retry.execute('inbox fetch', () => inbox.fetchNew(this.state.watermark));
    const outcomes: ProcessingOutcome[] = [];

    for (const chunk of chunkArray(messages, this.config.batchSize)) {
      const results = await Promise.allSettled(chunk.map(m => this.ingestMessage(m, extractor)));
      results.forEach((result, i) => {
        if (result.status === 'fulfilled') {
          outcomes.push(result.value);
          return;
        }
        //the order is already marked failed; the batch keeps going
        const messageId = chunk[i]?.id;
        this.logger.error({ messageId, err: result.reason }, 'order aborted');
        outcomes.push(this.record({
          outcome: 'failed', externalRecordId: undefined, orderNumber: undefined, kind: undefined, status: undefined,
          missingFields: [], warnings: [], adjustments: [], error: describeError(result.reason), auditTrail: [],
        }));
      });
    }

    for (const m of messages) this.state.advanceWatermark(m.receivedAt);

    const summary: BatchSummary = {
      fetched: messages.length,
      synced: outcomes.filter(o => o.outcome === 'synced').length,
      review: outcomes.filter(o => o.outcome === 'review').length,
      failed: outcomes.filter(o => o.outcome === 'failed').length,
      skipped: outcomes.filter(o => o.outcome === 'skipped').length,
      outcomes,
    };
    this.logger.info({ fetched: summary.fetched, synced: summary.synced, review: summary.review, failed: summary.failed, skipped: summary.skipped }, 'batch complete');
    if (messages.length > 0) await this.notify(batchSummaryNotification(summary));
    this.checkpoint();
    return summary;
  }

  async handleCommand(text: string): Promise<CommandResponse> {
    const command = parseCommand(text);
    try {
      switch (command.type) {
        case 'resolved':
          return await this.handleResolved(command.externalRecordId);
        case 'status': {
          const counts = await this.retry.execute('ledger count', () => this.deps.ledger.countByStatus());
          return { kind: 'ok', text: statusReport(counts, this.state.openTickets().length) };
        }
        case 'pending':
          return { kind: 'ok', text: pendingReport(this.state.openTickets()) };
        case 'unrecognized':
          return { kind: 'info', text: COMMAND_USAGE };
      }
    } catch (err) {
      if (err instanceof ContractViolationError) throw err;
      this.logger.error({ command: command.type, err }, 'command failed');
      return { kind: 'info', text: `Command failed: ${describeError(err)}` };
    }
  }

  //commands arrive out of band and may interleave with a running batch
  listen(notifier: Notifier = this.deps.notifier): void {
    notifier.onCommand(text => this.handleCommand(text));
  }

  checkpoint(): void {
    this.deps.stateStore.save(this.state.snapshot());
  }

  async shutdown(): Promise<SessionStats> {
    this.checkpoint();
    await this.notify(sessionStatsNotification(this.session, this.clock()));
    this.logger.info({ ...this.stats, sessionStart: this.session.sessionStart.toISOString() }, 'reconciler stopped');
    return this.stats;
  }

  private async ingestMessage(message: RawMessage, extractor: StructuredExtractor): Promise<ProcessingOutcome> {
    const { draft, confidenceScore } = await extractor.extract(message);
    return this.ingest({ ...normalizeDraft(draft), sourceMessageId: message.id }, confidenceScore);
  }

  private async createAndProcess(draft: OrderDraft, confidenceScore: number): Promise<ProcessingOutcome> {
    const now = this.clock().toISOString();
    const record: OrderRecord = {
      ...draft, confidenceScore, status: 'pending_validation', missingFields: [], createdAt: now, updatedAt: now,
    };
    let id: string;
    try {
      id = await this.retry.execute('ledger upsert', () => this.deps.ledger.upsert(record));
    } catch (err) {
      return this.failBeforePersist(draft, err);
    }
    const entry = this.entry('ingest', `Stored as ${id} (confidence ${confidenceScore.toFixed(2)})`);
    this.deps.audit?.append(id, entry);
    this.logger.info({ externalRecordId: id, orderNumber: draft.orderNumber, kind: draft.kind }, 'order ingested');
    const outcome = await this.processRecord(id);
    return { ...outcome, auditTrail: [entry, ...outcome.auditTrail] };
  }

  //the ledger never took the record, so there is nothing to mark failed; the notification is all that is left
  private async failBeforePersist(draft: OrderDraft, err: unknown): Promise<ProcessingOutcome> {
    const cause = describeError(err);
    this.logger.error({ orderNumber: draft.orderNumber, kind: draft.kind, err }, 'order could not be stored');
    const record: OrderRecord = { ...draft, confidenceScore: 0, status: 'pending_validation', missingFields: [] };
    await this.notify(failureNotification(record, cause, 0, 0));
    return this.record({
      outcome: 'failed', externalRecordId: undefined, orderNumber: draft.orderNumber, kind: draft.kind, status: undefined,
      missingFields: [], warnings: [], adjustments: [], error: cause, auditTrail: [],
    });
  }

  private async advance(record: PersistedOrderRecord): Promise<ProcessingOutcome> {
    const ctx: RunContext = {
      record, trail: [], warnings: [], adjustments: [], applied: 0,
      log: this.logger.child({ externalRecordId: record.externalRecordId, orderNumber: record.orderNumber, kind: record.kind }),
    };

    if (isTerminalStatus(record.status)) {
      //synced and failed records are immutable; any ticket left on them is stale
      this.state.close(record.externalRecordId, this.clock());
      return this.outcome('skipped', record, []);
    }

    try {
      if (record.status === 'complete' && record.submissionStartedAt !== undefined) return await this.resumeSubmission(ctx);
      if (record.status !== 'complete') {
        const verdict = validate(record, this.config);
        this.audit(ctx, 'validate', verdict.isComplete
          ? `Complete (confidence ${verdict.confidenceScore.toFixed(2)})`
          : `Incomplete: ${verdict.missingFields.join(', ')}`);
        if (!verdict.isComplete) return await this.toReview(ctx, verdict);
        await this.transition(ctx, transitionOrder(ctx.record, 'complete', { missingFields: [] }, this.clock()));
      }
      return await this.syncComplete(ctx);
    } catch (err) {
      return this.fail(ctx, err);
    }
  }

  private async toReview(ctx: RunContext, verdict: ValidationVerdict): Promise<ProcessingOutcome> {
    const id = ctx.record.externalRecordId;
    await this.transition(ctx, transitionOrder(ctx.record, 'incomplete_awaiting_review', { missingFields: verdict.missingFields }, this.clock()));
    ctx.warnings.push(...identifierWarnings(ctx.record.items ?? []));
    const { ticket, notify } = this.state.recordIncomplete(id, verdict.missingFields, this.clock());
    this.audit(ctx, 'review', `Review ticket ${ticket.status}; ${notify ? 'reviewer notified' : 'missing fields unchanged, no new notification'}`);
    ctx.log.info({ missingFields: verdict.missingFields }, 'order awaiting review');
    if (notify) await this.notify(reviewNotification(ctx.record, verdict.missingFields, ctx.warnings));
    return this.outcome('review', ctx.record, ctx.trail, ctx);
  }

  private async syncComplete(ctx: RunContext): Promise<ProcessingOutcome> {
    let order = toCompleteOrder(ctx.record);
    ctx.order = order;
    ctx.warnings.push(...reconciliationWarnings(order, ctx.record, this.tolerance));

    const items: CompleteLineItem[] = [], stockKeys: string[] = [];
    for (const item of order.items) {
      const resolution = await this.retry.execute(`resolve item[${item.index}]`, () => this.resolver.resolve(item));
      items.push({ ...item, resolvedStockId: resolution.stockId, resolvedSku: resolution.sku });
      stockKeys.push(`stock:${resolution.stockId}`);
      this.audit(ctx, 'resolve', `item[${item.index}] ${item.rawName} → ${resolution.sku} (${resolution.tier}${resolution.created ? ', new' : ''})`);
    }
    order = { ...order, items };
    ctx.order = order;

    //same-identity work from concurrent orders is serialized from cost read to cost write
    await this.lock.run(stockKeys, async () => {
      const allocated = await this.allocate(ctx, order);
      ctx.order = allocated;
      ctx.adjustments = buildAdjustments(allocated);
      await this.save(ctx, { ...ctx.record, items: this.writeBack(ctx.record, allocated), submissionStartedAt: this.clock().toISOString() });

      //adjustments follow item order
      for (const [index, adjustment] of ctx.adjustments.entries()) {
        const ack = await this.retry.execute(`adjust ${adjustment.stockId}`, () => this.deps.stock.applyAdjustment(adjustment));
        ctx.applied++;
        this.audit(ctx, 'adjust', `${adjustment.direction} ${adjustment.signedQuantity} × ${adjustment.stockId} @ ${adjustment.unitCost} (on hand ${ack.quantityOnHand})`);
        await this.save(ctx, {
          ...ctx.record,
          items: (ctx.record.items ?? []).map((item, i) => i === index ? { ...item, adjustmentId: ack.adjustmentId } : item),
        });
        if (allocated.kind === 'purchase') {
          await this.retry.execute(`set last cost ${adjustment.stockId}`, () => this.deps.stock.setLastCost(adjustment.stockId, adjustment.unitCost));
        }
      }
    });

    const synced = transitionOrder(ctx.record, 'synced', { items: this.writeBack(ctx.record, ctx.order), missingFields: [] }, this.clock());
    await this.transition(ctx, synced);
    this.state.close(synced.externalRecordId, this.clock());
    this.audit(ctx, 'sync', `${ctx.applied} adjustment(s) applied`);
    for (const w of ctx.warnings) ctx.log.warn({ warning: w }, 'reconciliation warning');
    ctx.log.info({ adjustments: ctx.applied }, 'order synced');
    await this.notify(syncedNotification(ctx.order, ctx.adjustments, ctx.warnings));
    return this.outcome('synced', ctx.record, ctx.trail, ctx);
  }

  //a run stopped after submission began: finish only when every adjustment was confirmed,
  //otherwise resubmitting could apply some of them twice
  private async resumeSubmission(ctx: RunContext): Promise<ProcessingOutcome> {
    const record = ctx.record, items = record.items ?? [];
    const direction = record.kind === 'purchase' ? 'increase' : 'decrease';
    ctx.adjustments = items.flatMap((item): StockAdjustment[] => {
      const unitCost = record.kind === 'purchase' ? item.allocatedUnitCost : item.cogsUnitCost;
      if (!item.resolvedStockId || item.quantity === undefined || unitCost === undefined) return [];
      return [{ stockId: item.resolvedStockId, signedQuantity: item.quantity, unitCost, sourceOrderNumber: record.orderNumber ?? '', direction }];
    });
    ctx.applied = items.filter(i => i.adjustmentId !== undefined).length;
    this.audit(ctx, 'adjust', `Submission started ${record.submissionStartedAt ?? '?'} resumed: ${ctx.applied} of ${items.length} adjustment(s) confirmed`);
    if (ctx.applied < items.length || ctx.adjustments.length < items.length) {
      throw new SubmissionInterruptedError(record.orderNumber ?? record.externalRecordId, ctx.applied, items.length);
    }

    const order = toCompleteOrder(record);
    ctx.order = order;
    if (order.kind === 'purchase') {
      await this.lock.run(ctx.adjustments.map(a => `stock:${a.stockId}`), async () => {
        for (const a of ctx.adjustments) {
          await this.retry.execute(`set last cost ${a.stockId}`, () => this.deps.stock.setLastCost(a.stockId, a.unitCost));
        }
      });
    }
    await this.transition(ctx, transitionOrder(ctx.record, 'synced', { missingFields: [] }, this.clock()));
    this.state.close(record.externalRecordId, this.clock());
    this.audit(ctx, 'sync', `${ctx.applied} adjustment(s) confirmed before the interruption`);
    ctx.log.info({ adjustments: ctx.applied }, 'interrupted order synced');
    await this.notify(syncedNotification(order, ctx.adjustments, ctx.warnings));
    return this.outcome('synced', ctx.record, ctx.trail, ctx);
  }

  private async allocate(ctx: RunContext, order: CompleteOrder): Promise<CompleteOrder> {
    if (order.kind === 'purchase') {
      const { order: allocated, shares, warnings } = this.allocator.allocatePurchaseCosts(order);
      ctx.warnings.push(...warnings);
      this.audit(ctx, 'allocate', shares
        .map(s => `item[${s.index}] tax ${formatAmount(s.taxShare)} shipping ${formatAmount(s.shippingShare)}`)
        .join('; '));
      return allocated;
    }
    const { order: allocated, warnings } = await this.retry.execute('read last cost', () => this.allocator.allocateSaleCogs(order));
    ctx.warnings.push(...warnings);
    this.audit(ctx, 'allocate', allocated.items
      .map(i => `item[${i.index}] COGS ${i.cogsUnitCost === undefined ? '?' : formatAmount(i.cogsUnitCost, UNIT_COST_PLACES)}`)
      .join('; '));
    return allocated;
  }

  //terminal failure. Contract violations are logged as fatal and rethrown after the
  //order is marked failed; everything else becomes a failed outcome.
  private async fail(ctx: RunContext, err: unknown): Promise<ProcessingOutcome> {
    const cause = describeError(err);
    const contract = err instanceof ContractViolationError;
    if (contract) ctx.log.fatal({ err }, 'contract violation');
    else ctx.log.error({ err, applied: ctx.applied, total: ctx.adjustments.length }, 'order failed');

    if (isValidTransition(ctx.record.status, 'failed')) {
      const failed = transitionOrder(ctx.record, 'failed', {
        failureReason: cause, ...(ctx.order ? { items: this.writeBack(ctx.record, ctx.order) } : {}),
      }, this.clock());
      try {
        await this.transition(ctx, failed);
      } catch (persistErr) {
        ctx.log.error({ err: persistErr }, 'could not persist failed status');
        ctx.record = failed;
      }
      this.state.close(failed.externalRecordId, this.clock());
    }
    this.audit(ctx, 'fail', cause);
    await this.notify(failureNotification(ctx.record, cause, ctx.applied, ctx.adjustments.length));
    if (contract) throw err;
    return { ...this.outcome('failed', ctx.record, ctx.trail, ctx), error: cause };
  }

  private async transition(ctx: RunContext, next: OrderRecord): Promise<void> {
    await this.save(ctx, next);
    ctx.log.debug({ status: next.status }, 'order status changed');
  }

  private async save(ctx: RunContext, next: OrderRecord): Promise<void> {
    await this.retry.execute('ledger upsert', () => this.deps.ledger.upsert(next));
    ctx.record = { ...next, externalRecordId: ctx.record.externalRecordId };
  }

  //resolved identities and costs are written onto the stored line items
  private writeBack(record: OrderRecord, order: CompleteOrder): LineItem[] {
    return (record.items ?? []).map((item, index) => {
      const done = order.items.find(i => i.index === index);
      if (!done) return item;
      return {
        ...item,
        ...(done.resolvedStockId ? { resolvedStockId: done.resolvedStockId } : {}),
        ...(done.resolvedSku ? { sku: done.resolvedSku } : {}),
        ...(done.allocatedUnitCost !== undefined ? { allocatedUnitCost: formatAmount(done.allocatedUnitCost, UNIT_COST_PLACES) } : {}),
        ...(done.cogsUnitCost !== undefined ? { cogsUnitCost: formatAmount(done.cogsUnitCost, UNIT_COST_PLACES) } : {}),
      };
    });
  }

  private async handleResolved(externalRecordId: string): Promise<CommandResponse> {
    const ticket = this.state.getTicket(externalRecordId);
    if (ticket?.status === 'resolved_pending_revalidation') {
      return { kind: 'info', text: `${externalRecordId} is already being revalidated` };
    }

    const record = await this.retry.execute('ledger get', () => this.deps.ledger.get(externalRecordId));
    if (!record) {
      return { kind: 'info', text: `Order record ${externalRecordId} not found` };
    }
    if (record.status !== 'incomplete_awaiting_review') {
      if (isTerminalStatus(record.status)) this.state.close(externalRecordId, this.clock());
      if (!ticket) return { kind: 'info', text: `No review ticket for ${externalRecordId} (status: ${record.status})` };
      if (ticket.status === 'closed') return { kind: 'info', text: `Review ticket for ${externalRecordId} is already closed` };
      return { kind: 'info', text: `${externalRecordId} is ${record.status}, nothing to revalidate` };
    }
    //the ledger is authoritative: a record held for review always has an open ticket
    if (!ticket || ticket.status === 'closed') this.restoreTicket(record);

    this.state.markResolving(externalRecordId, this.clock());
    this.logger.info({ externalRecordId }, 'revalidating after resolve command');
    let outcome: ProcessingOutcome;
    try {
      outcome = await this.processRecord(externalRecordId);
    } finally {
      //a ticket still waiting means the run never reached a verdict
      if (this.state.getTicket(externalRecordId)?.status === 'resolved_pending_revalidation') {
        this.state.reopen(externalRecordId, this.clock());
      }
    }
    return { kind: 'ok', text: this.describeOutcome(externalRecordId, outcome) };
  }

  private restoreTicket(record: PersistedOrderRecord): void {
    const existing = this.state.getTicket(record.externalRecordId);
    if (existing && existing.status !== 'closed') return;
    this.state.restore(record.externalRecordId, record.missingFields, this.clock());
    this.logger.warn({ externalRecordId: record.externalRecordId, missingFields: record.missingFields }, 'review ticket restored from ledger');
  }

  private describeOutcome(id: string, o: ProcessingOutcome): string {
    switch (o.outcome) {
      case 'synced': return `${id} synced: ${o.adjustments.length} stock adjustment(s) applied`;
      case 'review': return `${id} is still incomplete, missing: ${o.missingFields.join(', ')}`;
      case 'failed': return `${id} failed: ${o.error ?? 'unknown error'}`;
      case 'skipped': return `${id} is ${o.status ?? 'unknown'}, nothing to do`;
    }
  }

  //notification failures are logged, never allowed to change an order's fate
  private async notify(notification: Notification): Promise<void> {
    try {
      await this.deps.notifier.emit(notification);
    } catch (err) {
      this.logger.warn({ err, title: notification.title }, 'notification failed');
    }
  }

  private entry(step: AuditEntry['step'], details: string): AuditEntry {
    return { step, timestamp: this.clock().toISOString(), details };
  }

  private audit(ctx: RunContext, step: AuditEntry['step'], details: string): void {
    const entry = this.entry(step, details);
    ctx.trail.push(entry);
    this.deps.audit?.append(ctx.record.externalRecordId, entry);
  }

  private outcome(kind: OutcomeKind, record: OrderRecord, trail: AuditEntry[], ctx?: RunContext): ProcessingOutcome {
    return {
      outcome: kind,
      externalRecordId: record.externalRecordId,
      orderNumber: record.orderNumber,
      kind: record.kind,
      status: record.status,
      missingFields: record.missingFields,
      warnings: ctx?.warnings ?? [],
      adjustments: ctx?.adjustments ?? [],
      auditTrail: trail,
    };
  }

  private record(outcome: ProcessingOutcome): ProcessingOutcome {
    this.session.processed++;
    this.session[outcome.outcome]++;
    return outcome;
  }
}
