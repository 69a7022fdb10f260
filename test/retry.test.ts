import { describe, it, expect } from 'vitest';
import { AdjustmentSubmissionError, ContractViolationError, RetryExhaustedError } from '../src/errors.js';
import { RetryPolicy } from '../src/services/retry.js';
import { silentLogger } from './setup.js';

function recordingPolicy(maxAttempts = 3): { policy: RetryPolicy; sleeps: number[] } {
  const sleeps: number[] = [];
  const policy = new RetryPolicy({ maxAttempts, baseDelayMs: 500, maxDelayMs: 8000, factor: 2 }, ms => {
    sleeps.push(ms);
    return Promise.resolve();
  }, silentLogger);
  return { policy, sleeps };
}

// fails `times` times with the given error, then returns 'ok'
function failing(times: number, error: () => Error): { fn: () => Promise<string>; calls: () => number } {
  let calls = 0;
  return {
    fn: () => (++calls <= times ? Promise.reject(error()) : Promise.resolve('ok')),
    calls: () => calls,
  };
}

describe('RetryPolicy', () => {
  it('backs off exponentially up to the cap', () => {
    const { policy } = recordingPolicy();
    expect([1, 2, 3, 4, 5, 6].map(a => policy.delayFor(a))).toEqual([500, 1000, 2000, 4000, 8000, 8000]);
  });

  it('retries transient failures until one succeeds', async () => {
    const { policy, sleeps } = recordingPolicy();
    const op = failing(2, () => new AdjustmentSubmissionError('timeout', 'stk_a'));
    await expect(policy.execute('adjust', op.fn)).resolves.toBe('ok');
    expect(op.calls()).toBe(3);
    expect(sleeps).toEqual([500, 1000]);
  });

  it('gives up after the last attempt', async () => {
    const { policy, sleeps } = recordingPolicy();
    const op = failing(5, () => new Error('read ECONNRESET'));
    const error = await policy.execute('adjust stk_a', op.fn).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({ attempts: 3, message: 'adjust stk_a failed after 3 attempt(s): read ECONNRESET' });
    expect(op.calls()).toBe(3);
    expect(sleeps).toEqual([500, 1000]);
  });

  it('does not retry errors that are not transient', async () => {
    const { policy, sleeps } = recordingPolicy();
    const op = failing(1, () => new ContractViolationError('bad input'));
    await expect(policy.execute('adjust', op.fn)).rejects.toBeInstanceOf(ContractViolationError);
    expect(op.calls()).toBe(1);
    expect(sleeps).toEqual([]);
  });

  it('has an immediate variant with no backoff', async () => {
    const policy = RetryPolicy.immediate(2, silentLogger);
    const op = failing(1, () => new Error('connect ETIMEDOUT'));
    await expect(policy.execute('lookup', op.fn)).resolves.toBe('ok');
    expect(policy.delayFor(1)).toBe(0);
  });
});
