//public API of the reconciliation services

export { parseAmount, formatAmount, roundDiv, roundToPlaces, sumMicro, absMicro, MICRO_PER_UNIT, MICRO_PER_CENT, UNIT_COST_PLACES } from './money.js';
export { normalizeName, standardizeCounterparty, normalizeDraft } from './normalize.js';
export { validate, normalizeDate, toCompleteOrder, extendedSubtotal, reconciliationWarnings, identifierWarnings, type ValidatorOptions } from './validator.js';
export { SkuResolver, synthesizeSku, isValidSku, isValidUpc, type ISkuResolver, type SkuResolution, type ResolutionTier, type ResolvableItem, type SkuResolverOptions } from './sku-resolver.js';
export { CostAllocator, apportion, type ICostAllocator, type CostShare, type PurchaseAllocation, type SaleAllocation, type Apportionment } from './cost-allocator.js';
export { buildAdjustments } from './adjustment-builder.js';
export { ORDER_STATUS_TRANSITIONS, TICKET_STATUS_TRANSITIONS, isValidTransition, isTerminalStatus, getValidTargetStatuses, transitionOrder, transitionTicket, type TransitionDefinition } from './order-state.js';
export { ProcessState, type IProcessStateStore, type ProcessStateSnapshot } from './process-state.js';
export { RetryPolicy, type Sleep } from './retry.js';
export { KeyedLock } from './keyed-lock.js';
export { parseCommand, COMMAND_USAGE, type ReviewCommand } from './commands.js';
export { parseOrderDraft, JsonMessageExtractor } from './extraction.js';
export {
  LogNotifier, reviewNotes, reviewNotification, syncedNotification, failureNotification, batchSummaryNotification,
  sessionStatsNotification, statusReport, pendingReport,
} from './notifications.js';
export { Reconciler, type IReconciler, type ReconcilerDependencies } from './reconciler.js';
