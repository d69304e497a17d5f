import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DEFAULT_REFERENCE_OPTIONS } from '../../../src/domain/entities/ReferenceOption.js';
import { unavailable } from '../../helpers/MemoryStore.js';
import { createTestServices } from '../../helpers/services.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

describe('ReferenceService', () => {
  let services: Awaited<ReturnType<typeof createTestServices>>;

  beforeEach(async () => {
    services = await createTestServices();
  });

  it('falls back to defaults when the table is empty', async () => {
    expect(await services.referenceService.getOptions('payer')).toEqual([
      'Daman',
      'NAS',
      'NextCare',
      'MedNet',
      'Neuron',
      'Cash',
    ]);
    expect(await services.referenceService.getOptions('clinician')).toEqual([]);
  });

  it('reads stored options, trimmed and de-duplicated', async () => {
    await services.store.appendRow('Reference', ['payer:thiqa', 'payer', ' Thiqa ']);
    await services.store.appendRow('Reference', ['payer:thiqa2', 'Payer', 'Thiqa']);
    await services.store.appendRow('Reference', ['clinician:dr. test', 'clinician', 'Dr. Test']);

    expect(await services.referenceService.getOptions('payer')).toEqual(['Thiqa']);
    expect(await services.referenceService.getOptions('clinician')).toEqual(['Dr. Test']);
    expect(await services.referenceService.getOptions('insurance')).toEqual([...DEFAULT_REFERENCE_OPTIONS.insurance]);
  });

  it('falls back to defaults and warns when the store is unreachable', async () => {
    services.store.failNext('readAll', 'Reference', unavailable(), 5);

    expect(await services.referenceService.getOptions('insurance')).toEqual([...DEFAULT_REFERENCE_OPTIONS.insurance]);
    expect(loggerMock.logger.warn).toHaveBeenCalledWith(
      'Reference options unavailable, using defaults',
      expect.objectContaining({ category: 'insurance' })
    );
  });

  it('returns all categories', async () => {
    const all = await services.referenceService.getAll();

    expect(Object.keys(all)).toEqual(['payer', 'insurance', 'clinician']);
    expect(all.insurance).toEqual([...DEFAULT_REFERENCE_OPTIONS.insurance]);
  });

  it('seeds defaults once', async () => {
    const first = await services.referenceService.seedDefaults();
    const second = await services.referenceService.seedDefaults();

    expect(first).toBe(12);
    expect(second).toBe(0);
    expect(services.store.rows('Reference')).toHaveLength(12);
    expect(services.store.rows('Reference')[0]).toEqual({ Key: 'payer:daman', Category: 'payer', Value: 'Daman' });
  });

  it('leaves populated categories alone when seeding', async () => {
    await services.store.appendRow('Reference', ['payer:thiqa', 'payer', 'Thiqa']);

    expect(await services.referenceService.seedDefaults()).toBe(6);
    expect(await services.referenceService.getOptions('payer')).toEqual(['Thiqa']);
    expect(await services.referenceService.getOptions('insurance')).toEqual([...DEFAULT_REFERENCE_OPTIONS.insurance]);
  });
});
