import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { ResolutionError } from '../src/errors.js';
import { SqliteStockBackend } from '../src/repository/stock-repository.js';
import { SkuResolver, synthesizeSku } from '../src/services/sku-resolver.js';
import { FlakyStockBackend, cleanupTestDatabase, createTestDatabase, silentLogger } from './setup.js';

describe('SKU Resolver', () => {
  let db: Database.Database, stock: SqliteStockBackend, resolver: SkuResolver;

  beforeEach(() => {
    db = createTestDatabase();
    stock = new SqliteStockBackend(db);
    resolver = new SkuResolver(stock, { logger: silentLogger });
  });
  afterEach(() => cleanupTestDatabase(db));

  describe('synthesizeSku', () => {
    it('derives the prefix from the normalized name', () => {
      expect(synthesizeSku('Widget Alpha')).toMatch(/^AUTO-WIDG-[0-9A-F]{6}$/);
      expect(synthesizeSku('!!!')).toMatch(/^AUTO-ITEM-[0-9A-F]{6}$/);
    });

    it('uses a configured prefix when given', () => {
      expect(synthesizeSku('Widget Alpha', undefined, 'acme')).toMatch(/^AUTO-ACME-[0-9A-F]{6}$/);
    });

    it('is deterministic and insensitive to case and spacing', () => {
      expect(synthesizeSku('Widget Alpha')).toBe(synthesizeSku('Widget Alpha'));
      expect(synthesizeSku('  widget   ALPHA ')).toBe(synthesizeSku('Widget Alpha'));
    });

    it('mixes the identifier into the hash', () => {
      expect(synthesizeSku('Widget Alpha', '012345678905')).not.toBe(synthesizeSku('Widget Alpha'));
    });
  });

  describe('tiered lookup', () => {
    let stockId: string;

    beforeEach(async () => {
      ({ stockId } = await stock.registerIdentity('Widget Alpha', 'WA-100', { upc: '012345678905', productId: 'P-77' }));
    });

    it('matches on exact SKU first', async () => {
      expect(await resolver.resolve({ rawName: 'something else', sku: 'WA-100' }))
        .toEqual({ stockId, sku: 'WA-100', tier: 'sku', created: false });
    });

    it('falls back to UPC, then product id', async () => {
      expect((await resolver.resolve({ rawName: 'x', upc: '012345678905' })).tier).toBe('upc');
      expect((await resolver.resolve({ rawName: 'x', productId: 'P-77' })).tier).toBe('product_id');
    });

    it('matches names case- and whitespace-insensitively', async () => {
      expect(await resolver.resolve({ rawName: ' WIDGET  alpha ' }))
        .toEqual({ stockId, sku: 'WA-100', tier: 'name', created: false });
    });

    it('does not match partial names', async () => {
      const result = await resolver.resolve({ rawName: 'Widget' });
      expect(result.tier).toBe('synthesized');
      expect(result.stockId).not.toBe(stockId);
    });

    it('skips a SKU with an invalid format', async () => {
      expect((await resolver.resolve({ rawName: 'Widget Alpha', sku: 'WA 100!' })).tier).toBe('name');
    });

    it('asks each tier in order and registers only when all miss', async () => {
      const find = vi.spyOn(stock, 'findIdentity');
      const register = vi.spyOn(stock, 'registerIdentity');
      await resolver.resolve({ rawName: 'Brand New', sku: 'BN-1', upc: '999999999999', productId: 'P-1' });
      expect(find.mock.calls.map(([q]) => q.by)).toEqual(['sku', 'upc', 'productId', 'name']);
      expect(register).toHaveBeenCalledTimes(1);
    });
  });

  describe('new identities', () => {
    it('synthesizes and registers a SKU when nothing matches', async () => {
      const result = await resolver.resolve({ rawName: 'Unknown Thing', sku: 'ZZ-1' });
      expect(result).toMatchObject({ sku: synthesizeSku('Unknown Thing'), tier: 'synthesized', created: true });
      expect(await stock.findIdentity({ by: 'sku', value: result.sku })).toMatchObject({ stockId: result.stockId, name: 'Unknown Thing' });
    });

    it('resolves the same item to the same SKU the second time', async () => {
      const first = await resolver.resolve({ rawName: 'Unknown Thing' });
      const second = await resolver.resolve({ rawName: 'Unknown Thing' });
      expect(second.sku).toBe(first.sku);
      expect(second.stockId).toBe(first.stockId);
      expect(second.created).toBe(false);
    });

    it('synthesizes the same SKU against an independent catalog', async () => {
      const other = createTestDatabase();
      const otherResolver = new SkuResolver(new SqliteStockBackend(other), { logger: silentLogger });
      const a = await resolver.resolve({ rawName: 'Unknown Thing' });
      const b = await otherResolver.resolve({ rawName: 'Unknown Thing' });
      expect(b.sku).toBe(a.sku);
      cleanupTestDatabase(other);
    });

    it('stores the UPC so later orders match it', async () => {
      const created = await resolver.resolve({ rawName: 'Gizmo', upc: '123456789012' });
      expect(created.sku).toBe(synthesizeSku('Gizmo', '123456789012'));
      expect(await resolver.resolve({ rawName: 'Renamed gizmo', upc: '123456789012' }))
        .toEqual({ stockId: created.stockId, sku: created.sku, tier: 'upc', created: false });
    });

    it('applies the configured prefix', async () => {
      const prefixed = new SkuResolver(stock, { logger: silentLogger, skuPrefix: 'SHOP' });
      expect((await prefixed.resolve({ rawName: 'Gizmo' })).sku).toMatch(/^AUTO-SHOP-/);
    });
  });

  it('surfaces catalog failures as transient resolution errors', async () => {
    const flaky = new SkuResolver(new FlakyStockBackend(stock, { findIdentity: 1 }), { logger: silentLogger });
    await expect(flaky.resolve({ rawName: 'Widget Alpha' })).rejects.toBeInstanceOf(ResolutionError);
    await expect(flaky.resolve({ rawName: 'Widget Alpha' })).resolves.toMatchObject({ tier: 'synthesized' });
  });
});
