//AdjustmentBuilder: turns an allocated, complete order into stock adjustment instructions
//direction is carried explicitly; signedQuantity is always the positive item quantity
import type { CompleteOrder, StockAdjustment } from '../models/index.js';
import { ContractViolationError } from '../errors.js';
import { UNIT_COST_PLACES, formatAmount } from './money.js';

export function buildAdjustments(order: CompleteOrder): StockAdjustment[] {
  //only reachable after validation; anything else is a caller bug
  if (order.status !== 'complete') {
    throw new ContractViolationError(`Cannot build adjustments for order ${order.orderNumber} in status ${String(order.status)}`);
  }

  return order.items.map((item): StockAdjustment => {
    if (!item.resolvedStockId) {
      throw new ContractViolationError(`Order ${order.orderNumber} item[${item.index}] has no resolved stock identity`);
    }
    const unitCost = order.kind === 'purchase' ? item.allocatedUnitCost : item.cogsUnitCost;
    if (unitCost === undefined) {
      throw new ContractViolationError(`Order ${order.orderNumber} item[${item.index}] has no ${order.kind === 'purchase' ? 'allocated unit cost' : 'COGS'}`);
    }
    return {
      stockId: item.resolvedStockId,
      signedQuantity: item.quantity,
      unitCost: formatAmount(unitCost, UNIT_COST_PLACES),
      sourceOrderNumber: order.orderNumber,
      direction: order.kind === 'purchase' ? 'increase' : 'decrease',
    };
  });
}
