import { describe, it, expect } from 'vitest';
import type { CompleteOrder } from '../src/models/index.js';
import { ContractViolationError } from '../src/errors.js';
import { buildAdjustments } from '../src/services/adjustment-builder.js';

const base: CompleteOrder = {
  externalRecordId: 'rec_1', kind: 'purchase', orderNumber: 'PO-1', date: '2024-03-05', counterparty: 'eBay',
  items: [
    { index: 0, rawName: 'Widget', quantity: 10, unitPrice: 25_000_000n, resolvedStockId: 'stk_a', allocatedUnitCost: 28_334_000n },
    { index: 1, rawName: 'Gadget', quantity: 5, unitPrice: 50_000_000n, resolvedStockId: 'stk_b', allocatedUnitCost: 53_332_000n },
  ],
  statedSubtotal: undefined, tax: 40_000_000n, shippingOrFees: 10_000_000n, statedTotal: undefined,
  confidenceScore: 0.9, status: 'complete',
};

describe('Stock Adjustment Builder', () => {
  it('builds one increase per purchase item at the allocated cost', () => {
    expect(buildAdjustments(base)).toEqual([
      { stockId: 'stk_a', signedQuantity: 10, unitCost: '28.3340', sourceOrderNumber: 'PO-1', direction: 'increase' },
      { stockId: 'stk_b', signedQuantity: 5, unitCost: '53.3320', sourceOrderNumber: 'PO-1', direction: 'increase' },
    ]);
  });

  it('builds decreases at COGS for sales, keeping the quantity positive', () => {
    const sale: CompleteOrder = {
      ...base, kind: 'sale', orderNumber: 'SO-1',
      items: [{ index: 0, rawName: 'Widget', quantity: 3, unitPrice: 45_000_000n, resolvedStockId: 'stk_a', cogsUnitCost: 27_500_000n }],
    };
    expect(buildAdjustments(sale)).toEqual([
      { stockId: 'stk_a', signedQuantity: 3, unitCost: '27.5000', sourceOrderNumber: 'SO-1', direction: 'decrease' },
    ]);
  });

  it('refuses an item that was never resolved', () => {
    const unresolved: CompleteOrder = { ...base, items: [{ index: 0, rawName: 'Widget', quantity: 1, unitPrice: 1n, allocatedUnitCost: 1n }] };
    expect(() => buildAdjustments(unresolved)).toThrow(ContractViolationError);
  });

  it('refuses a purchase item without an allocated cost', () => {
    const unallocated: CompleteOrder = { ...base, items: [{ index: 0, rawName: 'Widget', quantity: 1, unitPrice: 1n, resolvedStockId: 'stk_a' }] };
    expect(() => buildAdjustments(unallocated)).toThrow(/has no allocated unit cost/);
  });

  it('refuses a sale item priced only with a purchase cost', () => {
    const sale: CompleteOrder = { ...base, kind: 'sale' };
    expect(() => buildAdjustments(sale)).toThrow(/has no COGS/);
  });
});
