//SkuResolver: maps a line item to a stable stock identity
//tiers: exact SKU → UPC → product id → normalized name → synthesized AUTO SKU
import { createHash } from 'crypto';
import type { Logger } from 'pino';
import type { IdentityQuery, StockBackend, StockIdentity } from '../models/index.js';
import { ReconciliationError, ResolutionError } from '../errors.js';
import { createChildLogger } from '../utils/logger.js';
import { normalizeName } from './normalize.js';

export type ResolutionTier = 'sku' | 'upc' | 'product_id' | 'name' | 'synthesized';

export interface ResolvableItem {
  rawName: string;
  sku?: string;
  upc?: string;
  productId?: string;
}

export interface SkuResolution {
  stockId: string;
  sku: string;
  tier: ResolutionTier;
  created: boolean;
}

export interface ISkuResolver {
  resolve(item: ResolvableItem): Promise<SkuResolution>;
}

export interface SkuResolverOptions {
  skuPrefix?: string;
  logger?: Logger;
}

const SKU_PATTERN = /^[A-Za-z0-9_-]+$/;
const UPC_PATTERN = /^\d{12,13}$/;

export const isValidSku = (sku: string): boolean => SKU_PATTERN.test(sku);
export const isValidUpc = (upc: string): boolean => UPC_PATTERN.test(upc);

//AUTO-<PREFIX>-<HASH>; same name and identifier always give the same SKU
export function synthesizeSku(name: string, identifier?: string, prefix?: string): string {
  const normalized = normalizeName(name);
  const derived = normalized.replace(/[^a-z0-9]/g, '').slice(0, 4).toUpperCase();
  const p = prefix ? prefix.toUpperCase() : derived || 'ITEM';
  const hash = createHash('sha256').update(identifier ? `${normalized}|${identifier}` : normalized).digest('hex');
  return `AUTO-${p}-${hash.slice(0, 6).toUpperCase()}`;
}

export class SkuResolver implements ISkuResolver {
  private logger: Logger;

  constructor(private catalog: StockBackend, private options: SkuResolverOptions = {}) {
    this.logger = options.logger ?? createChildLogger({ component: 'sku-resolver' });
  }

  async resolve(item: ResolvableItem): Promise<SkuResolution> {
    const sku = item.sku?.trim(), upc = item.upc?.trim(), productId = item.productId?.trim();

    const tiers: [ResolutionTier, IdentityQuery | undefined][] = [
      ['sku', sku && isValidSku(sku) ? { by: 'sku', value: sku } : undefined],
      ['upc', upc && isValidUpc(upc) ? { by: 'upc', value: upc } : undefined],
      ['product_id', productId ? { by: 'productId', value: productId } : undefined],
      ['name', { by: 'name', value: normalizeName(item.rawName) }],
    ];

    //first match wins
    for (const [tier, query] of tiers) {
      if (!query) continue;
      const identity = await this.lookup(query);
      if (identity) {
        this.logger.debug({ tier, sku: identity.sku, item: item.rawName }, 'resolved stock identity');
        return { stockId: identity.stockId, sku: identity.sku, tier, created: false };
      }
    }

    const identifier = upc && isValidUpc(upc) ? upc : productId || undefined;
    const newSku = synthesizeSku(item.rawName, identifier, this.options.skuPrefix);
    const registered = await this.call(`register ${newSku}`, () => this.catalog.registerIdentity(item.rawName.trim(), newSku, {
      ...(upc && isValidUpc(upc) ? { upc } : {}),
      ...(productId ? { productId } : {}),
    }));
    this.logger.info({ sku: registered.sku, item: item.rawName }, 'registered new stock identity');
    return { stockId: registered.stockId, sku: registered.sku, tier: 'synthesized', created: true };
  }

  private lookup(query: IdentityQuery): Promise<StockIdentity | undefined> {
    return this.call(`lookup by ${query.by}`, () => this.catalog.findIdentity(query));
  }

  //catalog failures surface as transient resolution errors
  private async call<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof ReconciliationError) throw err;
      throw new ResolutionError(`Stock backend ${what} failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
  }
}
