//extraction boundary: turns loosely shaped JSON into an OrderDraft without ever rejecting
//unusable fields are dropped so the validator can flag them
import { z } from 'zod';
import type { Logger } from 'pino';
import type { ExtractionResult, OrderDraft, RawMessage, StructuredExtractor } from '../models/index.js';
import { orderDraftSchema } from '../models/schema.js';
import { createChildLogger } from '../utils/logger.js';
import { normalizeDraft } from './normalize.js';

export function parseOrderDraft(input: unknown): OrderDraft {
  const parsed = orderDraftSchema.safeParse(input);
  return parsed.success ? normalizeDraft(parsed.data) : {};
}

const confidenceSchema = z.coerce.number().min(0).max(1).catch(0);

//extractor for messages whose body is already a JSON order document,
//optionally carrying a `confidence` value. Anything unreadable yields an empty draft.
export class JsonMessageExtractor implements StructuredExtractor {
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createChildLogger({ component: 'extractor' });
  }

  extract(message: RawMessage): Promise<ExtractionResult> {
    let body: unknown;
    try {
      body = JSON.parse(message.body);
    } catch (err) {
      this.logger.warn({ messageId: message.id, err }, 'message body is not JSON, extracted nothing');
      return Promise.resolve({ draft: { sourceMessageId: message.id }, confidenceScore: 0 });
    }
    const confidence = typeof body === 'object' && body !== null && 'confidence' in body ? body.confidence : 0;
    return Promise.resolve({
      draft: { ...parseOrderDraft(body), sourceMessageId: message.id },
      confidenceScore: confidenceSchema.parse(confidence),
    });
  }
}
