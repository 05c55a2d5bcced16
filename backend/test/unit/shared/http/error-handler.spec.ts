import { describe, it, expect } from 'vitest';
import { redactMeta } from '../../../../src/shared/http/error-handler';

describe('redactMeta', () => {
  it('redacts sensitive keys and keeps the rest', () => {
    expect(redactMeta({ password: 'test-secret', userId: 7 })).toEqual({
      password: '[REDACTED]',
      userId: 7,
    });
  });

  it('matches keys case-insensitively', () => {
    expect(redactMeta({ Authorization: 'Bearer test-token' })).toEqual({
      Authorization: '[REDACTED]',
    });
  });

  it('passes non-objects through', () => {
    expect(redactMeta(undefined)).toBeUndefined();
    expect(redactMeta('plain')).toBe('plain');
  });
});
