import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CachedReader } from '../../../src/infra/CachedReader.js';
import { StoreError } from '../../../src/domain/errors.js';
import { MemoryStore, noSleep, unavailable } from '../../helpers/MemoryStore.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

describe('CachedReader', () => {
  let store: MemoryStore;
  let clock: number;
  let reader: CachedReader;

  beforeEach(async () => {
    store = new MemoryStore();
    await store.ensureSchema('Data', ['A']);
    await store.appendRow('Data', ['1']);
    clock = 1_000_000;
    reader = new CachedReader(store, {
      ttlSeconds: 60,
      retryAttempts: 5,
      retryMaxDelaySeconds: 10,
      now: () => clock,
      sleep: noSleep,
    });
  });

  const readCount = () => store.calls.filter((call) => call.op === 'readAll').length;

  it('serves repeated reads within the TTL from cache', async () => {
    expect(await reader.read('Data')).toEqual([{ A: '1' }]);
    await store.appendRow('Data', ['2']);
    clock += 59_000;

    expect(await reader.read('Data')).toEqual([{ A: '1' }]);
    expect(readCount()).toBe(1);
  });

  it('hands out copies so callers cannot change the cached rows', async () => {
    const first = await reader.read('Data');
    first.push({ A: 'x' });
    first.splice(0, 1);

    expect(await reader.read('Data')).toEqual([{ A: '1' }]);
    expect(readCount()).toBe(1);
  });

  it('reloads after the TTL expires', async () => {
    await reader.read('Data');
    await store.appendRow('Data', ['2']);
    clock += 60_000;

    expect(await reader.read('Data')).toEqual([{ A: '1' }, { A: '2' }]);
    expect(readCount()).toBe(2);
  });

  it('reloads after invalidation', async () => {
    await reader.read('Data');
    await store.appendRow('Data', ['2']);
    reader.invalidate('Data');

    expect(await reader.read('Data')).toHaveLength(2);
  });

  it('caches each table separately', async () => {
    await store.ensureSchema('Logs', ['TS']);
    await reader.read('Data');
    await reader.read('Logs');
    reader.invalidate('Logs');
    await reader.read('Data');

    expect(readCount()).toBe(2);
  });

  it('retries transient read failures', async () => {
    store.failNext('readAll', 'Data', unavailable(), 2);

    expect(await reader.read('Data')).toEqual([{ A: '1' }]);
    expect(readCount()).toBe(3);
  });

  it('gives up after the configured attempts', async () => {
    store.failNext('readAll', 'Data', unavailable(), 5);

    await expect(reader.read('Data')).rejects.toBeInstanceOf(StoreError);
    expect(readCount()).toBe(5);
  });
});
