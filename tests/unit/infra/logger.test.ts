import { describe, expect, it } from 'vitest';
import { redactSecrets } from '../../../src/infra/logger.js';

describe('redactSecrets', () => {
  it('should redact secret fields at any depth', () => {
    expect(
      redactSecrets({
        path: '/home/user/.config/ledger-bank-sync/config.json',
        config: { refreshToken: 'test-refresh', ledgers: {} },
        pairs: [{ access: 'test-access' }],
      })
    ).toEqual({
      path: '/home/user/.config/ledger-bank-sync/config.json',
      config: { refreshToken: '***REDACTED***', ledgers: {} },
      pairs: [{ access: '***REDACTED***' }],
    });
  });

  it('should redact bearer tokens inside strings', () => {
    expect(redactSecrets('Authorization: Bearer test.token')).toBe(
      'Authorization: Bearer ***REDACTED***'
    );
  });

  it('should redact secret key assignments inside strings', () => {
    expect(redactSecrets('secret_key=test-secret')).toBe('secret_key=***REDACTED***');
  });

  it('should leave other values alone', () => {
    expect(redactSecrets(42)).toBe(42);
    expect(redactSecrets('Account reconciled')).toBe('Account reconciled');
  });
});
