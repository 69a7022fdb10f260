//error hierarchy for the reconciliation workflow
//validation failures, allocation anomalies and duplicates are outcomes, not errors, so they are not here

export const ErrorCodes = {
  RESOLUTION_FAILED: 'RESOLUTION_FAILED',
  ADJUSTMENT_REJECTED: 'ADJUSTMENT_REJECTED',
  LEDGER_UNAVAILABLE: 'LEDGER_UNAVAILABLE',
  RETRY_EXHAUSTED: 'RETRY_EXHAUSTED',
  CONTRACT_VIOLATION: 'CONTRACT_VIOLATION',
  SUBMISSION_INTERRUPTED: 'SUBMISSION_INTERRUPTED',
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export class ReconciliationError extends Error {
  constructor(message: string, readonly code: ErrorCode, readonly recoverable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

//retryable failures talking to the stock backend or the ledger
export class TransientError extends ReconciliationError {
  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, code, true, options);
  }
}

export class ResolutionError extends TransientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCodes.RESOLUTION_FAILED, options);
  }
}

export class AdjustmentSubmissionError extends TransientError {
  constructor(message: string, readonly stockId?: string, options?: { cause?: unknown }) {
    super(message, ErrorCodes.ADJUSTMENT_REJECTED, options);
  }
}

export class LedgerUnavailableError extends TransientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCodes.LEDGER_UNAVAILABLE, options);
  }
}

export class RetryExhaustedError extends ReconciliationError {
  constructor(readonly operation: string, readonly attempts: number, readonly lastError: unknown) {
    super(`${operation} failed after ${attempts} attempt(s): ${describeError(lastError)}`, ErrorCodes.RETRY_EXHAUSTED, false, { cause: lastError });
  }
}

//a caller broke the pipeline's contract; fatal, never retried
export class ContractViolationError extends ReconciliationError {
  constructor(message: string) {
    super(message, ErrorCodes.CONTRACT_VIOLATION, false);
  }
}

//stock submission stopped part way; which adjustments landed cannot be told from the ledger alone
export class SubmissionInterruptedError extends ReconciliationError {
  constructor(readonly orderNumber: string, readonly confirmed: number, readonly total: number) {
    super(
      `Stock submission for ${orderNumber} was interrupted: ${confirmed} of ${total} adjustment(s) confirmed, stock must be checked by hand`,
      ErrorCodes.SUBMISSION_INTERRUPTED, false,
    );
  }
}

export class ConfigError extends ReconciliationError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, ErrorCodes.CONFIG_INVALID, false);
  }
}

export function isTransientError(error: unknown): boolean {
  if (error instanceof ReconciliationError) return error.recoverable;
  if (error instanceof Error) {
    return ['ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN'].some(c => error.message.includes(c));
  }
  return false;
}

//human-readable cause for notifications and failure reasons
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
