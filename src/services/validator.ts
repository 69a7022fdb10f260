//Completeness Validator: decides whether an order record is usable as-is
//pure and total: it never throws on a record, the worst case is a long missing-field list
import type {
  CompleteLineItem, CompleteOrder, FieldId, LineItem, Micro, OrderRecord, ValidationVerdict,
} from '../models/index.js';
import { RECONCILIATION_DEFAULTS } from '../models/index.js';
import { ContractViolationError } from '../errors.js';
import { absMicro, formatAmount, parseAmount, sumMicro } from './money.js';
import { isValidSku, isValidUpc } from './sku-resolver.js';

export interface ValidatorOptions {
  confidenceThreshold: number;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})[T ]\d{2}:\d{2}/;
const ZONED = /(?:Z|GMT|UTC|([+-])(\d{2}):?(\d{2}))$/i;

const isNonEmpty = (v: unknown): v is string => typeof v === 'string' && v.trim().length > 0;
const isPositiveInt = (v: unknown): v is number => typeof v === 'number' && Number.isInteger(v) && v > 0;

//normalize a date to YYYY-MM-DD; undefined when it cannot be read
export function normalizeDate(value: unknown): string | undefined {
  if (!isNonEmpty(value)) return undefined;
  const text = value.trim();
  //a timestamp keeps the calendar date it was written with, whatever its offset
  const prefix = ISO_DATE_PREFIX.exec(text);
  if (prefix?.[1] !== undefined && !Number.isNaN(Date.parse(text))) return normalizeDate(prefix[1]);
  const iso = ISO_DATE.exec(text);
  if (iso) {
    const [y, m, d] = [Number(iso[1]), Number(iso[2]), Number(iso[3])];
    const date = new Date(Date.UTC(y, m - 1, d));
    return date.getUTCFullYear() === y && date.getUTCMonth() === m - 1 && date.getUTCDate() === d ? text : undefined;
  }
  const ms = Date.parse(text);
  if (Number.isNaN(ms)) return undefined;
  //zoned text keeps the date at its own offset; text without a zone is read in local time
  const zone = ZONED.exec(text);
  let y: number, m: number, d: number;
  if (zone) {
    const offset = zone[1] === undefined ? 0 : (zone[1] === '-' ? -1 : 1) * (Number(zone[2]) * 60 + Number(zone[3]));
    const shifted = new Date(ms + offset * 60_000);
    [y, m, d] = [shifted.getUTCFullYear(), shifted.getUTCMonth(), shifted.getUTCDate()];
  } else {
    const date = new Date(ms);
    [y, m, d] = [date.getFullYear(), date.getMonth(), date.getDate()];
  }
  return `${y}-${String(m + 1).padStart(2, '0')}-${String(d).padStart(2, '0')}`;
}

function nonNegative(value: unknown): Micro | undefined {
  const micro = parseAmount(value);
  return micro !== undefined && micro >= 0n ? micro : undefined;
}

function itemMissingFields(item: LineItem, index: number): FieldId[] {
  const missing: FieldId[] = [];
  if (!isNonEmpty(item.rawName)) missing.push(`item[${index}].rawName`);
  if (!isPositiveInt(item.quantity)) missing.push(`item[${index}].quantity`);
  if (nonNegative(item.unitPrice) === undefined) missing.push(`item[${index}].unitPrice`);
  return missing;
}

export function validate(order: OrderRecord, options: ValidatorOptions = RECONCILIATION_DEFAULTS): ValidationVerdict {
  const missing: FieldId[] = [];

  if (order.kind !== 'purchase' && order.kind !== 'sale') missing.push('order.kind');
  if (!isNonEmpty(order.orderNumber)) missing.push('order.orderNumber');
  if (normalizeDate(order.date) === undefined) missing.push('order.date');
  if (!isNonEmpty(order.counterparty)) missing.push('order.counterparty');

  const items = Array.isArray(order.items) ? order.items : [];
  if (items.length === 0) missing.push('order.items');
  items.forEach((item, i) => missing.push(...itemMissingFields(item, i)));

  //zero tax is fine, absent or unreadable tax is not
  if (parseAmount(order.tax) === undefined) missing.push('order.tax');

  const confidenceScore = Number.isFinite(order.confidenceScore) ? order.confidenceScore : 0;
  if (confidenceScore < options.confidenceThreshold) missing.push('order.confidenceScore');

  return { isComplete: missing.length === 0, missingFields: missing, confidenceScore };
}

//parse a record that has been moved to 'complete' into its working form
export function toCompleteOrder(order: OrderRecord): CompleteOrder {
  if (order.status !== 'complete') {
    throw new ContractViolationError(`Order ${order.externalRecordId ?? order.orderNumber ?? '?'} is ${order.status}, expected complete`);
  }
  const kind = order.kind, date = normalizeDate(order.date), tax = parseAmount(order.tax);
  if (!order.externalRecordId || (kind !== 'purchase' && kind !== 'sale') || !isNonEmpty(order.orderNumber)
    || !isNonEmpty(order.counterparty) || date === undefined || tax === undefined || !order.items?.length) {
    throw new ContractViolationError(`Order ${order.externalRecordId ?? '?'} is marked complete but fails the completeness policy`);
  }

  const items: CompleteLineItem[] = order.items.map((item, index) => {
    const unitPrice = nonNegative(item.unitPrice);
    if (!isNonEmpty(item.rawName) || !isPositiveInt(item.quantity) || unitPrice === undefined) {
      throw new ContractViolationError(`Order ${order.externalRecordId ?? '?'} item[${index}] is incomplete`);
    }
    return {
      index, rawName: item.rawName.trim(), quantity: item.quantity, unitPrice,
      ...(isNonEmpty(item.sku) ? { sku: item.sku.trim() } : {}),
      ...(isNonEmpty(item.upc) ? { upc: item.upc.trim() } : {}),
      ...(isNonEmpty(item.productId) ? { productId: item.productId.trim() } : {}),
    };
  });

  return {
    externalRecordId: order.externalRecordId, kind, orderNumber: order.orderNumber.trim(), date,
    counterparty: order.counterparty.trim(), items,
    statedSubtotal: parseAmount(order.subtotal), tax,
    shippingOrFees: parseAmount(order.shippingOrFees) ?? 0n,
    statedTotal: parseAmount(order.total), confidenceScore: order.confidenceScore, status: 'complete',
  };
}

export function extendedSubtotal(order: CompleteOrder): Micro {
  return sumMicro(order.items.map(i => i.unitPrice * BigInt(i.quantity)));
}

//non-blocking findings about a complete order
export function reconciliationWarnings(order: CompleteOrder, raw: OrderRecord, tolerance: Micro): string[] {
  const warnings: string[] = [];
  const subtotal = extendedSubtotal(order);

  if (order.statedSubtotal !== undefined && absMicro(order.statedSubtotal - subtotal) > tolerance) {
    warnings.push(`Subtotal mismatch: items sum to $${formatAmount(subtotal)} vs stated $${formatAmount(order.statedSubtotal)}`);
  }
  const calculated = subtotal + order.tax + order.shippingOrFees;
  if (order.statedTotal !== undefined && order.statedTotal > 0n && absMicro(order.statedTotal - calculated) > tolerance) {
    warnings.push(`Total mismatch: calculated $${formatAmount(calculated)} vs stated $${formatAmount(order.statedTotal)}`);
  }
  if (raw.shippingOrFees !== undefined && parseAmount(raw.shippingOrFees) === undefined) {
    warnings.push('Shipping/fees value unreadable, treated as $0.00');
  }

  warnings.push(...identifierWarnings(raw.items ?? []));
  return warnings;
}

//identifier findings hold whether or not the order is complete, so review notes carry them too
export function identifierWarnings(items: LineItem[]): string[] {
  const warnings: string[] = [];
  items.forEach((item, i) => {
    const name = item.rawName?.trim(), sku = item.sku?.trim(), upc = item.upc?.trim();
    const label = `Item ${i + 1}${name ? ` (${name})` : ''}`;
    if (!sku && !upc && !item.productId?.trim()) warnings.push(`${label}: missing SKU/identifier`);
    if (sku && !isValidSku(sku)) warnings.push(`${label}: SKU "${sku}" has an invalid format and was ignored`);
    if (upc && !isValidUpc(upc)) warnings.push(`${label}: UPC "${upc}" has an invalid format and was ignored`);
  });
  return warnings;
}
