/**
 * Tests for error codes and RetryKitError
 */

import { describe, expect, it } from 'vitest';
import { ErrorCode, type ErrorContext } from './codes.js';
import { ErrorHelpers, isRetryKitError, RetryKitError } from './index.js';

describe('ErrorCode', () => {
  it('should have unique error codes', () => {
    const codes = Object.values(ErrorCode);
    expect(new Set(codes).size).toBe(codes.length);
  });

  it('should follow naming convention', () => {
    for (const code of Object.values(ErrorCode)) {
      expect(code).toMatch(/^E_[A-Z]+(_[A-Z]+)*$/);
    }
  });

  it('should group config codes under E_CONFIG_', () => {
    const configCodes = Object.values(ErrorCode).filter((code) => code.startsWith('E_CONFIG_'));
    expect(configCodes).toEqual(['E_CONFIG_INVALID', 'E_CONFIG_NOT_FOUND', 'E_CONFIG_PARSE_ERROR']);
  });
});

describe('ErrorContext', () => {
  it('should accept additional fields', () => {
    const context: ErrorContext = { configPath: '/tmp/retry.jsonc', attempts: 3 };
    expect(context.attempts).toBe(3);
  });
});

describe('RetryKitError', () => {
  it('should carry code, name and context', () => {
    const error = new RetryKitError(ErrorCode.E_CONFIG_INVALID, 'bad', { field: 'maxRetries' });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('RetryKitError');
    expect(error.code).toBe('E_CONFIG_INVALID');
    expect(error.message).toBe('bad');
    expect(error.context).toEqual({ field: 'maxRetries' });
    expect(isRetryKitError(error)).toBe(true);
    expect(isRetryKitError(new Error('bad'))).toBe(false);
  });

  it('should build helper errors with readable messages', () => {
    const notFound = ErrorHelpers.configNotFound('/etc/retry.json');
    expect(notFound.code).toBe('E_CONFIG_NOT_FOUND');
    expect(notFound.message).toBe('Config file not found: /etc/retry.json');
    expect(notFound.context.configPath).toBe('/etc/retry.json');

    const policy = ErrorHelpers.invalidPolicy('maxRetries: Expected number, received string');
    expect(policy.code).toBe('E_POLICY_INVALID');
    expect(policy.message).toBe(
      'Invalid retry policy:\nmaxRetries: Expected number, received string'
    );
  });
});
