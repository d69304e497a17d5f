import { describe, it, expect, vi } from 'vitest';
import { classifyGoogleError, googleSheetsConfigFromEnv } from '../../../src/infra/store/GoogleSheetsGateway.js';
import { parseEnv } from '../../../src/infra/env.js';
import { StoreError } from '../../../src/domain/errors.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

describe('classifyGoogleError', () => {
  it('maps quota and server failures to transient reasons', () => {
    expect(classifyGoogleError({ status: 429 })).toEqual({ transient: true, reason: 'rate_limited' });
    expect(classifyGoogleError({ response: { status: 503 } })).toEqual({ transient: true, reason: 'unavailable' });
    expect(classifyGoogleError({ code: 500 })).toEqual({ transient: true, reason: 'unavailable' });
    expect(classifyGoogleError({ code: 'ECONNRESET' })).toEqual({ transient: true, reason: 'unavailable' });
  });

  it('maps client failures to permanent reasons', () => {
    expect(classifyGoogleError({ code: 403 })).toEqual({ transient: false, reason: 'auth' });
    expect(classifyGoogleError({ status: 404 })).toEqual({ transient: false, reason: 'not_found' });
    expect(classifyGoogleError({ status: 400 })).toEqual({ transient: false, reason: 'schema' });
    expect(classifyGoogleError(new Error('odd'))).toEqual({ transient: false, reason: 'unknown' });
  });
});

describe('googleSheetsConfigFromEnv', () => {
  it('takes the spreadsheet id from the sheet URL', () => {
    const env = parseEnv({
      STORE_BACKEND: 'sheets',
      GOOGLE_SERVICE_ACCOUNT_EMAIL: 'intake@test.iam.example.com',
      GOOGLE_PRIVATE_KEY: 'test-secret',
      GOOGLE_SHEET_URL: 'https://docs.google.com/spreadsheets/d/sheet-id_123/edit#gid=0',
    });

    expect(googleSheetsConfigFromEnv(env)).toEqual({
      clientEmail: 'intake@test.iam.example.com',
      privateKey: 'test-secret',
      spreadsheetId: 'sheet-id_123',
    });
  });

  it('refuses to build a config without credentials', () => {
    const env = parseEnv({});
    expect(() => googleSheetsConfigFromEnv(env)).toThrow(StoreError);
  });
});
