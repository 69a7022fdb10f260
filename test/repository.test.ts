import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import type { OrderRecord } from '../src/models/index.js';
import { ReconciliationError } from '../src/errors.js';
import { SqliteAuditLog } from '../src/repository/audit-repository.js';
import { SqliteLedgerStore } from '../src/repository/ledger-repository.js';
import { SqliteStockBackend } from '../src/repository/stock-repository.js';
import { cleanupTestDatabase, createTestDatabase } from './setup.js';

const draft = (overrides: Partial<OrderRecord> = {}): OrderRecord => ({
  kind: 'purchase', orderNumber: 'PO-1', date: '2024-03-05', counterparty: 'eBay',
  items: [{ rawName: 'Widget', quantity: 1, unitPrice: '2.50' }], tax: '0',
  confidenceScore: 0.9, status: 'pending_validation', missingFields: [],
  ...overrides,
});

describe('SQLite adapters', () => {
  let db: Database.Database;

  beforeEach(() => { db = createTestDatabase(); });
  afterEach(() => cleanupTestDatabase(db));

  describe('SqliteLedgerStore', () => {
    it('assigns rec_ ids and round-trips records', async () => {
      const ledger = new SqliteLedgerStore(db);
      const id = await ledger.upsert(draft());
      expect(id).toMatch(/^rec_[0-9a-f-]{36}$/);
      expect(await ledger.get(id)).toMatchObject({ externalRecordId: id, orderNumber: 'PO-1', tax: '0', status: 'pending_validation' });
      expect(await ledger.get('rec_unknown')).toBeUndefined();
    });

    it('updates in place when the record already has an id', async () => {
      const ledger = new SqliteLedgerStore(db);
      const id = await ledger.upsert(draft());
      expect(await ledger.upsert(draft({ externalRecordId: id, status: 'complete' }))).toBe(id);
      expect(ledger.list()).toHaveLength(1);
      expect((await ledger.get(id))?.status).toBe('complete');
    });

    it('finds records by natural key and counts by status', async () => {
      const ledger = new SqliteLedgerStore(db);
      const id = await ledger.upsert(draft());
      await ledger.upsert(draft({ kind: 'sale', orderNumber: 'PO-1', status: 'synced' }));
      expect((await ledger.findByNaturalKey('PO-1', 'purchase'))?.externalRecordId).toBe(id);
      expect(await ledger.findByNaturalKey('PO-2', 'purchase')).toBeUndefined();
      expect(await ledger.countByStatus()).toEqual({
        pending_validation: 1, complete: 0, incomplete_awaiting_review: 0, synced: 1, failed: 0,
      });
      expect(ledger.list('synced').map(r => r.kind)).toEqual(['sale']);
    });
  });

  describe('SqliteStockBackend', () => {
    it('registers identities idempotently per SKU', async () => {
      const stock = new SqliteStockBackend(db);
      const a = await stock.registerIdentity('Widget Alpha', 'WA-1', { upc: '012345678905' });
      const b = await stock.registerIdentity('Other name', 'WA-1');
      expect(b).toEqual(a);
      expect(await stock.findIdentity({ by: 'name', value: 'WIDGET alpha' })).toEqual(a);
      expect(await stock.findIdentity({ by: 'upc', value: '012345678905' })).toEqual(a);
      expect(await stock.findIdentity({ by: 'productId', value: 'nope' })).toBeUndefined();
    });

    it('applies adjustments in both directions', async () => {
      const stock = new SqliteStockBackend(db);
      const { stockId } = await stock.registerIdentity('Widget', 'W-1');
      expect(await stock.applyAdjustment({ stockId, signedQuantity: 10, unitCost: '2.5000', sourceOrderNumber: 'PO-1', direction: 'increase' }))
        .toMatchObject({ stockId, quantityOnHand: 10 });
      expect(await stock.applyAdjustment({ stockId, signedQuantity: 3, unitCost: '2.5000', sourceOrderNumber: 'SO-1', direction: 'decrease' }))
        .toMatchObject({ stockId, quantityOnHand: 7 });
      expect(stock.getStockLevel(stockId)).toEqual({ stockId, sku: 'W-1', quantityOnHand: 7, lastCost: undefined });
      expect(stock.listAdjustments('SO-1')).toEqual([
        { stockId, signedQuantity: 3, unitCost: '2.5000', sourceOrderNumber: 'SO-1', direction: 'decrease' },
      ]);
    });

    it('rejects adjustments for unknown identities without marking them retryable', async () => {
      const stock = new SqliteStockBackend(db);
      const error = await stock.applyAdjustment({ stockId: 'stk_none', signedQuantity: 1, unitCost: '1.0000', sourceOrderNumber: 'PO-1', direction: 'increase' })
        .catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ReconciliationError);
      expect(error).toMatchObject({ code: 'ADJUSTMENT_REJECTED', recoverable: false });
    });

    it('stores the last cost', async () => {
      const stock = new SqliteStockBackend(db);
      const { stockId } = await stock.registerIdentity('Widget', 'W-1');
      expect(await stock.getLastCost(stockId)).toBeUndefined();
      await stock.setLastCost(stockId, '2.7500');
      expect(await stock.getLastCost(stockId)).toBe('2.7500');
    });
  });

  describe('SqliteAuditLog', () => {
    it('returns entries in the order they were appended', () => {
      const audit = new SqliteAuditLog(db);
      const timestamp = '2024-03-10T12:00:00.000Z';
      audit.append('rec_1', { step: 'ingest', timestamp, details: 'stored' });
      audit.append('rec_1', { step: 'validate', timestamp, details: 'complete' });
      audit.append('rec_2', { step: 'ingest', timestamp, details: 'other' });
      expect(audit.getAuditTrail('rec_1').map(e => e.step)).toEqual(['ingest', 'validate']);
    });
  });
});
