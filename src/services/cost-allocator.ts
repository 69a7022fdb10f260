//CostAllocator: landed unit cost for purchases, last-cost COGS for sales
import type { Logger } from 'pino';
import type { ApportionBasis, CompleteLineItem, CompleteOrder, Micro, StockBackend } from '../models/index.js';
import { ContractViolationError, ReconciliationError, ResolutionError } from '../errors.js';
import { createChildLogger } from '../utils/logger.js';
import { MICRO_PER_CENT, UNIT_COST_QUANTUM, formatAmount, parseAmount, roundDiv, roundToPlaces, sumMicro } from './money.js';

export interface CostShare {
  index: number;
  taxShare: Micro;
  shippingShare: Micro;
}

export interface PurchaseAllocation {
  order: CompleteOrder;
  shares: CostShare[];
  warnings: string[];
}

export interface SaleAllocation {
  order: CompleteOrder;
  warnings: string[];
}

export interface ICostAllocator {
  allocatePurchaseCosts(order: CompleteOrder): PurchaseAllocation;
  allocateSaleCogs(order: CompleteOrder): Promise<SaleAllocation>;
}

export interface Apportionment {
  shares: Micro[];
  equalSplit: boolean;
}

//split amount across weights, each share rounded half-up to the cent
//a share never takes more than is left, and the last share takes the remainder
//all-zero weights fall back to an equal split
export function apportion(amount: Micro, weights: bigint[]): Apportionment {
  if (weights.length === 0) return { shares: [], equalSplit: false };
  let total = sumMicro(weights);
  const equalSplit = total === 0n;
  const w = equalSplit ? weights.map(() => 1n) : weights;
  if (equalSplit) total = BigInt(w.length);

  const shares: Micro[] = [];
  let allocated = 0n;
  w.forEach((weight, i) => {
    const remaining = amount - allocated;
    const rounded = roundDiv(amount * weight, total * MICRO_PER_CENT) * MICRO_PER_CENT;
    //per-share rounding can overshoot (0.05 over 7 rounds every share up to 0.01)
    const capped = amount >= 0n ? (rounded > remaining ? remaining : rounded) : (rounded < remaining ? remaining : rounded);
    const share = i === w.length - 1 ? remaining : capped;
    shares.push(share);
    allocated += share;
  });
  return { shares, equalSplit };
}

export class CostAllocator implements ICostAllocator {
  private logger: Logger;

  constructor(private catalog: StockBackend, private basis: ApportionBasis = 'extended', logger?: Logger) {
    this.logger = logger ?? createChildLogger({ component: 'cost-allocator' });
  }

  allocatePurchaseCosts(order: CompleteOrder): PurchaseAllocation {
    const warnings: string[] = [];
    const weights = order.items.map(i => this.basis === 'quantity' ? BigInt(i.quantity) : i.unitPrice * BigInt(i.quantity));
    const tax = apportion(order.tax, weights), shipping = apportion(order.shippingOrFees, weights);

    if (tax.equalSplit && (order.tax !== 0n || order.shippingOrFees !== 0n)) {
      warnings.push(`Zero ${this.basis === 'quantity' ? 'quantity' : 'subtotal'} basis: tax and shipping split equally across ${order.items.length} item(s)`);
      this.logger.warn({ orderNumber: order.orderNumber }, 'zero apportionment basis, using equal split');
    }

    const shares: CostShare[] = [];
    const items = order.items.map((item, i) => {
      const taxShare = tax.shares[i] ?? 0n, shippingShare = shipping.shares[i] ?? 0n;
      shares.push({ index: item.index, taxShare, shippingShare });
      const qty = BigInt(item.quantity);
      let unitCost = roundDiv(item.unitPrice * qty + taxShare + shippingShare, qty * UNIT_COST_QUANTUM) * UNIT_COST_QUANTUM;
      if (unitCost < 0n) {
        warnings.push(`Item ${item.index + 1} (${item.rawName}): computed unit cost $${formatAmount(unitCost, 4)} is negative, recorded as $0.0000`);
        unitCost = 0n;
      }
      return { ...item, allocatedUnitCost: unitCost };
    });

    return { order: { ...order, items }, shares, warnings };
  }

  //last-allocated-cost model: COGS is the identity's most recent purchase unit cost
  async allocateSaleCogs(order: CompleteOrder): Promise<SaleAllocation> {
    const warnings: string[] = [];
    const items: CompleteLineItem[] = [];
    for (const item of order.items) {
      if (!item.resolvedStockId) {
        throw new ContractViolationError(`Order ${order.orderNumber} item[${item.index}] has no resolved stock identity`);
      }
      const stockId = item.resolvedStockId;
      const recorded = await this.readLastCost(stockId);
      const cost = recorded === undefined ? undefined : parseAmount(recorded);
      if (cost === undefined) {
        warnings.push(`Item ${item.index + 1} (${item.rawName}): no recorded cost for ${item.resolvedSku ?? stockId}, COGS recorded as $0.0000`);
        this.logger.warn({ orderNumber: order.orderNumber, stockId }, 'no recorded cost, COGS set to zero');
      }
      items.push({ ...item, cogsUnitCost: roundToPlaces(cost ?? 0n, 4) });
    }
    return { order: { ...order, items }, warnings };
  }

  private async readLastCost(stockId: string): Promise<string | undefined> {
    try {
      return await this.catalog.getLastCost(stockId);
    } catch (err) {
      if (err instanceof ReconciliationError) throw err;
      throw new ResolutionError(`Stock backend cost lookup for ${stockId} failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
  }
}
