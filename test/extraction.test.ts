import { describe, it, expect } from 'vitest';
import { JsonMessageExtractor, parseOrderDraft } from '../src/services/extraction.js';
import { standardizeCounterparty } from '../src/services/normalize.js';
import { loadMessages, silentLogger } from './setup.js';

describe('Extraction boundary', () => {
  it('coerces loosely typed fields', () => {
    const draft = parseOrderDraft({
      kind: ' PURCHASE ', orderNumber: 1234, counterparty: ' amazon.com   marketplace ', tax: null,
      items: [{ rawName: 'A', quantity: '3', unitPrice: '2.50', upc: 123456789012 }],
    });
    expect(draft).toMatchObject({
      kind: 'purchase', orderNumber: '1234', counterparty: 'Amazon', tax: null,
      items: [{ rawName: 'A', quantity: 3, unitPrice: '2.50', upc: '123456789012' }],
    });
  });

  it('drops fields it cannot use instead of failing', () => {
    const draft = parseOrderDraft({ kind: 'refund', items: 'none', date: 20240305, orderNumber: ' SO-9 ' });
    expect(draft.kind).toBeUndefined();
    expect(draft.items).toBeUndefined();
    expect(draft.date).toBeUndefined();
    expect(draft.orderNumber).toBe('SO-9');
  });

  it('drops a non-positive quantity on a single item', () => {
    expect(parseOrderDraft({ items: [{ rawName: 'A', quantity: -1 }] }).items).toEqual([{ rawName: 'A', quantity: undefined }]);
  });

  it('returns an empty draft for non-objects', () => {
    expect(parseOrderDraft('not an order')).toEqual({});
    expect(parseOrderDraft(null)).toEqual({});
  });

  it('standardizes vendors for purchases and channels for sales', () => {
    expect(standardizeCounterparty('ebay seller widgetworld', 'purchase')).toBe('eBay');
    expect(standardizeCounterparty('my shopify store', 'sale')).toBe('Shopify Sales');
    expect(standardizeCounterparty('  Corner   Shop ', 'purchase')).toBe('Corner Shop');
  });

  describe('JsonMessageExtractor', () => {
    const extractor = new JsonMessageExtractor(silentLogger);

    it('extracts the draft and confidence from a JSON body', async () => {
      const [message] = loadMessages(1);
      if (!message) throw new Error('fixture missing');
      const { draft, confidenceScore } = await extractor.extract(message);
      expect(confidenceScore).toBe(0.92);
      expect(draft).toMatchObject({ kind: 'purchase', orderNumber: 'PO-1001', counterparty: 'eBay', tax: '40.00', sourceMessageId: 'msg-001' });
    });

    it('yields an empty draft with zero confidence for unreadable text', async () => {
      const result = await extractor.extract({ id: 'msg-x', receivedAt: '2024-03-05T00:00:00.000Z', body: 'Thanks for your order!' });
      expect(result).toEqual({ draft: { sourceMessageId: 'msg-x' }, confidenceScore: 0 });
    });
  });
});
