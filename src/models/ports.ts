//narrow contracts for the collaborators the core talks to
//inbox, extractor, ledger, stock backend and notifier all live behind these
import type {
  OrderDraft, OrderKind, OrderRecord, OrderStatus, PersistedOrderRecord, StockAdjustment, AdjustmentAck,
} from './index.js';

export interface RawMessage {
  id: string;
  receivedAt: string;
  subject?: string;
  body: string;
}

//finite per call; the caller keeps the watermark
export interface InboxSource {
  fetchNew(since: string | null): Promise<RawMessage[]>;
}

export interface ExtractionResult {
  draft: OrderDraft;
  confidenceScore: number;
}

//never rejects on malformed input: unusable fields are left out of the draft
export interface StructuredExtractor {
  extract(message: RawMessage): Promise<ExtractionResult>;
}

export interface LedgerStore {
  upsert(record: OrderRecord): Promise<string>;
  get(externalRecordId: string): Promise<PersistedOrderRecord | undefined>;
  findByNaturalKey(orderNumber: string, kind: OrderKind): Promise<PersistedOrderRecord | undefined>;
  countByStatus(): Promise<Record<OrderStatus, number>>;
}

export type IdentityQuery =
  | { by: 'sku'; value: string }
  | { by: 'upc'; value: string }
  | { by: 'productId'; value: string }
  | { by: 'name'; value: string };

export interface StockIdentity {
  stockId: string;
  sku: string;
  name: string;
  upc?: string;
  productId?: string;
}

export interface StockBackend {
  findIdentity(query: IdentityQuery): Promise<StockIdentity | undefined>;
  registerIdentity(name: string, sku: string, identifiers?: { upc?: string; productId?: string }): Promise<StockIdentity>;
  applyAdjustment(adjustment: StockAdjustment): Promise<AdjustmentAck>;
  getLastCost(stockId: string): Promise<string | undefined>;
  setLastCost(stockId: string, cost: string): Promise<void>;
}

export type NotificationLevel = 'success' | 'warning' | 'error' | 'info';

export interface Notification {
  level: NotificationLevel;
  title: string;
  message: string;
  fields?: Record<string, string>;
  orderRecordId?: string;
}

export interface CommandResponse {
  kind: 'ok' | 'info';
  text: string;
}

export type CommandListener = (text: string) => Promise<CommandResponse>;

export interface Notifier {
  emit(notification: Notification): Promise<void>;
  onCommand(listener: CommandListener): void;
}
