import { describe, it, expect } from 'vitest';
import { redactSecrets } from '../../../src/infra/redact.js';

describe('redactSecrets', () => {
  it('masks secret values inside strings', () => {
    expect(redactSecrets('token=test-secret rest')).toBe('token=***REDACTED*** rest');
    expect(redactSecrets('Authorization: Bearer test-secret')).toBe('Authorization: Bearer ***REDACTED***');
  });

  it('masks sensitive keys at any depth', () => {
    expect(
      redactSecrets({ fields: ['erx'], nested: { emiratesId: '784-0000-0000000-0', erx: 'ERX-1' }, token: 'x' })
    ).toEqual({
      fields: ['erx'],
      nested: { emiratesId: '***REDACTED***', erx: 'ERX-1' },
      token: '***REDACTED***',
    });
  });

  it('reduces errors to name and message', () => {
    expect(redactSecrets(new TypeError('password=test-secret'))).toEqual({
      name: 'TypeError',
      message: 'password=***REDACTED***',
    });
  });
});
