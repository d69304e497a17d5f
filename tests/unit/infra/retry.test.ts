import { describe, it, expect, vi } from 'vitest';
import { backoffDelayMs, withRetry } from '../../../src/infra/retry.js';
import { StoreError, ValidationError } from '../../../src/domain/errors.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

const transient = () => new StoreError('quota exceeded', 'transient', 'rate_limited');

describe('backoffDelayMs', () => {
  it('doubles per attempt up to the cap', () => {
    expect([0, 1, 2, 3, 4, 5].map((attempt) => backoffDelayMs(attempt, 10))).toEqual([
      1000, 2000, 4000, 8000, 10000, 10000,
    ]);
  });
});

describe('withRetry', () => {
  it('returns the first successful result without sleeping', async () => {
    const sleep = vi.fn(async () => {});
    const result = await withRetry('read Data', async () => 'ok', { attempts: 5, maxDelaySeconds: 10, sleep });

    expect(result).toBe('ok');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries transient failures with exponential backoff', async () => {
    const sleep = vi.fn(async () => {});
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(transient())
      .mockRejectedValueOnce(transient())
      .mockResolvedValueOnce('rows');

    const result = await withRetry('read Data', operation, { attempts: 5, maxDelaySeconds: 10, sleep });

    expect(result).toBe('rows');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('throws a transient StoreError naming the step once attempts run out', async () => {
    const sleep = vi.fn(async () => {});
    const operation = vi.fn(async () => {
      throw transient();
    });

    const error = await withRetry('read Data', operation, { attempts: 5, maxDelaySeconds: 10, sleep }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(StoreError);
    expect(error).toMatchObject({
      kind: 'transient',
      reason: 'rate_limited',
      details: { kind: 'transient', reason: 'rate_limited', step: 'read Data', attempts: 5 },
    });
    expect(operation).toHaveBeenCalledTimes(5);
    expect(sleep.mock.calls).toEqual([[1000], [2000], [4000], [8000]]);
  });

  it('does not retry permanent failures', async () => {
    const sleep = vi.fn(async () => {});
    const permanent = new StoreError('bad credentials', 'permanent', 'auth');
    const operation = vi.fn(async () => {
      throw permanent;
    });

    await expect(withRetry('read Data', operation, { attempts: 5, maxDelaySeconds: 10, sleep })).rejects.toBe(
      permanent
    );
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('honours a custom retry predicate', async () => {
    const sleep = vi.fn(async () => {});
    const outage = new StoreError('down', 'transient', 'unavailable');
    const operation = vi.fn(async () => {
      throw outage;
    });

    await expect(
      withRetry('append Data', operation, {
        attempts: 5,
        maxDelaySeconds: 10,
        sleep,
        shouldRetry: (error) => error instanceof StoreError && error.reason === 'rate_limited',
      })
    ).rejects.toBe(outage);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('passes non-store errors through untouched', async () => {
    const invalid = new ValidationError('nope');
    await expect(
      withRetry(
        'read Data',
        async () => {
          throw invalid;
        },
        { attempts: 3, maxDelaySeconds: 10, sleep: async () => {} }
      )
    ).rejects.toBe(invalid);
  });
});
