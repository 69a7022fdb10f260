//domain types for the reconciliation workflow
//every record that flows from extraction to the stock ledger is described here
//it can be considered as the contract between the core and its collaborators

export type OrderKind = 'purchase' | 'sale';

export type OrderStatus =
  | 'pending_validation'
  | 'complete'
  | 'incomplete_awaiting_review'
  | 'synced'
  | 'failed';

export const ORDER_STATUSES: readonly OrderStatus[] = [
  'pending_validation', 'complete', 'incomplete_awaiting_review', 'synced', 'failed',
] as const;

//raw monetary value as the extractor or a human editor left it: "12.50", 12.5, "$1,200.00"
export type Amount = string | number;

//addressable field identifier, e.g. "order.tax" or "item[2].unitPrice"
export type FieldId = `order.${string}` | `item[${number}].${string}`;

//Line item as extracted; every field may be absent until validation says otherwise
export interface LineItem {
  rawName?: string;
  quantity?: number;
  unitPrice?: Amount;
  sku?: string;
  upc?: string;
  productId?: string;
  resolvedStockId?: string;
  allocatedUnitCost?: string;
  cogsUnitCost?: string;
  //set once the stock backend confirmed this item's adjustment
  adjustmentId?: string;
}

//what the extraction boundary hands over: best effort, nothing guaranteed
export interface OrderDraft {
  kind?: OrderKind;
  orderNumber?: string;
  date?: string;
  counterparty?: string;
  items?: LineItem[];
  subtotal?: Amount;
  tax?: Amount | null;
  shippingOrFees?: Amount;
  total?: Amount;
  sourceMessageId?: string;
}

//persisted order record
export interface OrderRecord extends OrderDraft {
  externalRecordId?: string;
  confidenceScore: number;
  status: OrderStatus;
  missingFields: FieldId[];
  failureReason?: string;
  //when stock submission began; a complete record carrying it was interrupted mid-submission
  submissionStartedAt?: string;
  createdAt?: string;
  updatedAt?: string;
}

export type PersistedOrderRecord = OrderRecord & { externalRecordId: string };

export interface ValidationVerdict {
  isComplete: boolean;
  missingFields: FieldId[];
  confidenceScore: number;
}

//Money in micro-units (1 unit = 1_000_000 micro)
export type Micro = bigint;

//a record that passed validation, with every field parsed into its working type
export interface CompleteLineItem {
  index: number;
  rawName: string;
  quantity: number;
  unitPrice: Micro;
  sku?: string;
  upc?: string;
  productId?: string;
  resolvedStockId?: string;
  resolvedSku?: string;
  allocatedUnitCost?: Micro;
  cogsUnitCost?: Micro;
}

export interface CompleteOrder {
  externalRecordId: string;
  kind: OrderKind;
  orderNumber: string;
  date: string;
  counterparty: string;
  items: CompleteLineItem[];
  statedSubtotal: Micro | undefined;
  tax: Micro;
  shippingOrFees: Micro;
  statedTotal: Micro | undefined;
  confidenceScore: number;
  status: 'complete';
}

export type AdjustmentDirection = 'increase' | 'decrease';

export interface StockAdjustment {
  stockId: string;
  signedQuantity: number;
  unitCost: string;
  sourceOrderNumber: string;
  direction: AdjustmentDirection;
}

export interface AdjustmentAck {
  adjustmentId: string;
  stockId: string;
  quantityOnHand: number;
}

export type ReviewTicketStatus = 'open' | 'resolved_pending_revalidation' | 'closed';

export interface ReviewTicket {
  orderRecordId: string;
  missingFields: FieldId[];
  //the field set the last notification was sent for
  notifiedFields: FieldId[];
  createdAt: string;
  updatedAt: string;
  status: ReviewTicketStatus;
}

//Processing result models
export interface AuditEntry {
  step: 'ingest' | 'validate' | 'resolve' | 'allocate' | 'adjust' | 'review' | 'sync' | 'fail';
  timestamp: string;
  details: string;
}

export type OutcomeKind = 'synced' | 'review' | 'failed' | 'skipped';

//This is the final output for every order that enters the pipeline.
export interface ProcessingOutcome {
  outcome: OutcomeKind;
  externalRecordId: string | undefined;
  orderNumber: string | undefined;
  kind: OrderKind | undefined;
  status: OrderStatus | undefined;
  missingFields: FieldId[];
  warnings: string[];
  adjustments: StockAdjustment[];
  error?: string;
  auditTrail: AuditEntry[];
}

export interface BatchSummary {
  fetched: number;
  synced: number;
  review: number;
  failed: number;
  skipped: number;
  outcomes: ProcessingOutcome[];
}

export interface SessionStats {
  processed: number;
  synced: number;
  review: number;
  failed: number;
  skipped: number;
  sessionStart: Date;
}

export type ApportionBasis = 'extended' | 'quantity';

export interface RetrySettings {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
}

export interface ReconciliationConfig {
  confidenceThreshold: number;
  skuPrefix: string | undefined;
  apportionBasis: ApportionBasis;
  batchSize: number;
  retry: RetrySettings;
  totalMismatchTolerance: string;
  databasePath: string;
  logLevel: string;
}

export const RECONCILIATION_DEFAULTS: ReconciliationConfig = {
  confidenceThreshold: 0.7,
  skuPrefix: undefined,
  apportionBasis: 'extended',
  batchSize: 5,
  retry: { maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 8000, factor: 2 },
  totalMismatchTolerance: '0.10',
  databasePath: './reconciliation.db',
  logLevel: 'info',
};

export * from './ports.js';
