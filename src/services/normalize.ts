//name normalization shared by SKU resolution and the extraction boundary
import type { OrderDraft, OrderKind } from '../models/index.js';

//normalize item names for exact catalog matching
export function normalizeName(name: string): string {
  return name.toLowerCase().trim().replace(/\s+/g, ' ');
}

//well-known marketplaces: first substring match wins
const VENDOR_NAMES: [string, string][] = [
  ['ebay', 'eBay'], ['amazon', 'Amazon'], ['tcgplayer', 'TCGPlayer'], ['shopify', 'Shopify'],
];
const CHANNEL_NAMES: [string, string][] = [
  ['ebay', 'eBay Sales'], ['amazon', 'Amazon Sales'], ['tcgplayer', 'TCGPlayer Sales'], ['shopify', 'Shopify Sales'],
  ['etsy', 'Etsy Sales'], ['facebook', 'Facebook Marketplace'], ['mercari', 'Mercari Sales'],
];

//vendor for purchases, sales channel for sales
export function standardizeCounterparty(name: string, kind: OrderKind | undefined): string {
  const trimmed = name.trim().replace(/\s+/g, ' ');
  const lower = trimmed.toLowerCase();
  const table = kind === 'sale' ? CHANNEL_NAMES : VENDOR_NAMES;
  return table.find(([needle]) => lower.includes(needle))?.[1] ?? trimmed;
}

//applied once, when a draft crosses the extraction boundary
export function normalizeDraft(draft: OrderDraft): OrderDraft {
  return {
    ...draft,
    ...(draft.orderNumber !== undefined ? { orderNumber: draft.orderNumber.trim() } : {}),
    ...(draft.counterparty !== undefined ? { counterparty: standardizeCounterparty(draft.counterparty, draft.kind) } : {}),
  };
}
