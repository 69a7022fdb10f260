//zod schemas for everything that crosses a trust boundary:
//extractor output, and records read back from storage
import { z } from 'zod';
import type { FieldId } from './index.js';

const FIELD_ID = /^(order\.[A-Za-z]+|item\[\d+\]\.[A-Za-z]+)$/;

export const fieldIdSchema = z.custom<FieldId>(v => typeof v === 'string' && FIELD_ID.test(v), 'Invalid field identifier');

//lenient: a field that does not fit is dropped, never an error
const optionalString = z.string().optional().catch(undefined);
const amountSchema = z.union([z.string(), z.number()]).optional().catch(undefined);
const identifierSchema = z.union([z.string(), z.number().transform(String)]).optional().catch(undefined);

const kindSchema = z.preprocess(
  v => (typeof v === 'string' ? v.trim().toLowerCase() : v),
  z.enum(['purchase', 'sale']),
).optional().catch(undefined);

export const lineItemSchema = z.object({
  rawName: optionalString,
  quantity: z.coerce.number().int().positive().optional().catch(undefined),
  unitPrice: amountSchema,
  sku: optionalString,
  upc: identifierSchema,
  productId: identifierSchema,
  resolvedStockId: optionalString,
  allocatedUnitCost: optionalString,
  cogsUnitCost: optionalString,
  adjustmentId: optionalString,
});

export const orderDraftSchema = z.object({
  kind: kindSchema,
  orderNumber: identifierSchema,
  date: optionalString,
  counterparty: optionalString,
  items: z.array(lineItemSchema).optional().catch(undefined),
  subtotal: amountSchema,
  //explicit null stays null: still missing, but distinguishable from an absent key
  tax: z.union([z.string(), z.number(), z.null()]).optional().catch(undefined),
  shippingOrFees: amountSchema,
  total: amountSchema,
  sourceMessageId: optionalString,
});

export const orderStatusSchema = z.enum(['pending_validation', 'complete', 'incomplete_awaiting_review', 'synced', 'failed']);

//stored record: same leniency for order content, strict for pipeline bookkeeping
export const orderRecordSchema = orderDraftSchema.extend({
  externalRecordId: z.string().optional(),
  confidenceScore: z.number().min(0).max(1).catch(0),
  status: orderStatusSchema,
  missingFields: z.array(fieldIdSchema).catch([]),
  failureReason: z.string().optional(),
  submissionStartedAt: z.string().optional(),
  createdAt: z.string().optional(),
  updatedAt: z.string().optional(),
});

export const fieldListSchema = z.array(fieldIdSchema);

export const ticketStatusSchema = z.enum(['open', 'resolved_pending_revalidation', 'closed']);
