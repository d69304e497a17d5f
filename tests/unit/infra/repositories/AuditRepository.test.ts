import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AuditRepository } from '../../../../src/infra/repositories/AuditRepository.js';
import { CachedReader } from '../../../../src/infra/CachedReader.js';
import { LogError } from '../../../../src/domain/errors.js';
import { MemoryStore, noSleep, rateLimited, unavailable } from '../../../helpers/MemoryStore.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../../src/infra/logger.js', () => loggerMock);

describe('AuditRepository', () => {
  let store: MemoryStore;
  let repo: AuditRepository;

  beforeEach(() => {
    store = new MemoryStore();
    const reader = new CachedReader(store, {
      ttlSeconds: 60,
      retryAttempts: 5,
      retryMaxDelaySeconds: 10,
      sleep: noSleep,
    });
    repo = new AuditRepository(store, reader, { attempts: 5, maxDelaySeconds: 10, sleep: noSleep });
  });

  it('creates the logs table and appends one row per action', async () => {
    const entry = await repo.log('Logs', 'alice', 'submit', { erxNumber: 'ERX-1', override: false });

    expect(store.tables.get('Logs')?.columns).toEqual(['TS', 'User', 'Action', 'DetailsJSON']);
    expect(store.rows('Logs')).toEqual([
      {
        TS: entry.timestamp,
        User: 'alice',
        Action: 'submit',
        DetailsJSON: '{"erxNumber":"ERX-1","override":false}',
      },
    ]);
  });

  it('ensures the header only once per table', async () => {
    await repo.log('Logs', 'alice', 'submit', {});
    await repo.log('Logs', 'bob', 'submit', {});

    expect(store.calls.filter((call) => call.op === 'ensureSchema')).toHaveLength(1);
    expect(store.rows('Logs')).toHaveLength(2);
  });

  it('retries rate-limited appends', async () => {
    await store.ensureSchema('Logs', ['TS', 'User', 'Action', 'DetailsJSON']);
    store.failNext('appendRow', 'Logs', rateLimited(), 2);

    await repo.log('Logs', 'alice', 'send-report', { rowCount: 3, periodDays: 7 });

    expect(store.rows('Logs')).toHaveLength(1);
  });

  it('reports other write failures as LogError', async () => {
    await store.ensureSchema('Logs', ['TS', 'User', 'Action', 'DetailsJSON']);
    store.failNext('appendRow', 'Logs', unavailable());

    const error = await repo.log('Logs', 'alice', 'submit', {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LogError);
    expect(error).toMatchObject({
      message: 'Audit log: failed to record submit: service unavailable',
      details: { step: 'audit', action: 'submit', cause: 'service unavailable' },
    });
    expect(store.rows('Logs')).toHaveLength(0);
  });

  it('returns recent entries newest first and skips unknown actions', async () => {
    await store.ensureSchema('Logs', ['TS', 'User', 'Action', 'DetailsJSON']);
    await store.appendRow('Logs', ['2025-01-01T00:00:00.000Z', 'alice', 'submit', '{"erxNumber":"ERX-1"}']);
    await store.appendRow('Logs', ['2025-01-02T00:00:00.000Z', 'bob', 'legacy-action', '']);
    await store.appendRow('Logs', ['2025-01-03T00:00:00.000Z', 'carol', 'export-report', 'not json']);
    await store.appendRow('Logs', ['2025-01-04T00:00:00.000Z', 'dave', 'send-report', '{"rowCount":2}']);

    expect(await repo.getRecent('Logs', 2)).toEqual([
      { timestamp: '2025-01-04T00:00:00.000Z', user: 'dave', action: 'send-report', detail: { rowCount: 2 } },
      { timestamp: '2025-01-03T00:00:00.000Z', user: 'carol', action: 'export-report', detail: null },
    ]);
    expect((await repo.getRecent('Logs')).map((entry) => entry.user)).toEqual(['dave', 'carol', 'alice']);
  });

  it('sees its own writes on the next read', async () => {
    await repo.log('Logs', 'alice', 'submit', {});
    expect(await repo.getRecent('Logs')).toHaveLength(1);

    await repo.log('Logs', 'bob', 'submit', {});
    expect(await repo.getRecent('Logs')).toHaveLength(2);
  });
});
