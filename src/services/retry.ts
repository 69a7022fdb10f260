//RetryPolicy: bounded attempts with exponential backoff around stock backend and ledger calls
import type { Logger } from 'pino';
import type { RetrySettings } from '../models/index.js';
import { RetryExhaustedError, isTransientError } from '../errors.js';
import { createChildLogger } from '../utils/logger.js';

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export class RetryPolicy {
  private logger: Logger;

  constructor(readonly settings: RetrySettings, private sleep: Sleep = defaultSleep, logger?: Logger) {
    this.logger = logger ?? createChildLogger({ component: 'retry' });
  }

  //no waiting between attempts; used by tests and one-off tooling
  static immediate(maxAttempts = 3, logger?: Logger): RetryPolicy {
    return new RetryPolicy({ maxAttempts, baseDelayMs: 0, maxDelayMs: 0, factor: 1 }, () => Promise.resolve(), logger);
  }

  //delay before attempt `attempt + 1`: base, base*factor, base*factor^2 ... capped
  delayFor(attempt: number): number {
    const { baseDelayMs, maxDelayMs, factor } = this.settings;
    return Math.min(maxDelayMs, baseDelayMs * Math.pow(factor, attempt - 1));
  }

  //run `fn`, retrying transient failures. Non-transient errors are rethrown at once.
  //throws RetryExhaustedError when every attempt failed transiently
  async execute<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const { maxAttempts } = this.settings;
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (err) {
        if (!isTransientError(err)) throw err;
        if (attempt >= maxAttempts) throw new RetryExhaustedError(operation, attempt, err);
        const delay = this.delayFor(attempt);
        this.logger.warn({ operation, attempt, delayMs: delay, err }, 'transient failure, retrying');
        await this.sleep(delay);
      }
    }
  }
}
