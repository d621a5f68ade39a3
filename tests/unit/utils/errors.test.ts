import { describe, it, expect, afterEach } from 'vitest';
import {
  AccessDeniedError,
  AccountDisabledError,
  AuthError,
  AuthErrors,
  DecodeError,
  FeatureNotLicensedError,
  InvalidCredentialError,
  PasswordReuseError,
  createErrorResponse,
  isSecurityRejection,
  sanitizeError,
} from '../../../src/utils/errors.js';

describe('errors', () => {
  const originalEnv = process.env.NODE_ENV;

  afterEach(() => {
    if (originalEnv === undefined) {
      delete process.env.NODE_ENV;
    } else {
      process.env.NODE_ENV = originalEnv;
    }
  });

  describe('error classes', () => {
    it('should give every rejection a stable code and status', () => {
      const cases: Array<[AuthError, string, number]> = [
        [new DecodeError('integrity'), 'TOKEN_DECODE_FAILED', 400],
        [new InvalidCredentialError(), 'INVALID_CREDENTIAL', 401],
        [new AccountDisabledError('u-1'), 'ACCOUNT_DISABLED', 403],
        [new FeatureNotLicensedError('ldap'), 'FEATURE_NOT_LICENSED', 402],
        [new AccessDeniedError('u-1', ['project:edit']), 'ACCESS_DENIED', 403],
        [new PasswordReuseError(), 'PASSWORD_REUSE', 400],
      ];

      for (const [error, code, statusCode] of cases) {
        expect(error).toBeInstanceOf(AuthError);
        expect({ code: error.code, statusCode: error.statusCode }).toEqual({ code, statusCode });
      }
    });

    it('should use the fixed user-facing messages', () => {
      expect(new InvalidCredentialError().message).toBe('Invalid username or password.');
      expect(new AccountDisabledError('u-1').message).toBe('Account disabled.');
      expect(new FeatureNotLicensedError('ldap').message).toBe(
        'Your tariff plan does not support this option.'
      );
    });

    it('should describe the denied actions and resource', () => {
      const error = new AccessDeniedError('u-1', ['project:view', 'project:edit'], 'project:p-1');

      expect(error.message).toBe('Access denied for u-1: project:view, project:edit on project:p-1');
      expect(error.actions).toEqual(['project:view', 'project:edit']);
      expect(error.actorId).toBe('u-1');
    });

    it('should keep the decode reason', () => {
      const error = new DecodeError('unsupported_version', 'Unsupported token version: 2');

      expect(error.reason).toBe('unsupported_version');
      expect(error.details).toEqual({ reason: 'unsupported_version' });
    });

    it('should serialise to JSON', () => {
      expect(JSON.parse(JSON.stringify(AuthErrors.LOOKUP_TIMEOUT('IdentityRegistry.getUser', 250)))).toEqual({
        name: 'AuthError',
        code: 'LOOKUP_TIMEOUT',
        message: 'IdentityRegistry.getUser timed out after 250ms',
        statusCode: 504,
        details: { operation: 'IdentityRegistry.getUser', timeoutMs: 250 },
      });
    });
  });

  describe('isSecurityRejection', () => {
    it('should separate expected rejections from faults', () => {
      expect(isSecurityRejection(new InvalidCredentialError())).toBe(true);
      expect(isSecurityRejection(new DecodeError('malformed'))).toBe(true);
      expect(isSecurityRejection(AuthErrors.STORE_FAILURE('store', 'down'))).toBe(false);
      expect(isSecurityRejection(new Error('boom'))).toBe(false);
    });
  });

  describe('sanitizeError', () => {
    it('should hide details in production', () => {
      process.env.NODE_ENV = 'production';

      expect(sanitizeError(new AccountDisabledError('u-1'))).toEqual({
        type: 'AuthError',
        code: 'ACCOUNT_DISABLED',
        message: 'Account disabled.',
        statusCode: 403,
      });
    });

    it('should include details outside production', () => {
      process.env.NODE_ENV = 'test';

      expect(sanitizeError(new AccountDisabledError('u-1'))).toMatchObject({
        details: { accountId: 'u-1' },
      });
    });

    it('should reduce plain errors to name and message', () => {
      process.env.NODE_ENV = 'test';

      expect(sanitizeError(new TypeError('bad'))).toEqual({
        type: 'Error',
        message: 'bad',
        name: 'TypeError',
      });
    });

    it('should not echo unknown values', () => {
      expect(sanitizeError('test-secret')).toEqual({
        type: 'Unknown',
        message: 'An unknown error occurred',
      });
    });
  });

  describe('createErrorResponse', () => {
    it('should map an error to a status and body', () => {
      process.env.NODE_ENV = 'production';

      expect(createErrorResponse(new InvalidCredentialError())).toEqual({
        statusCode: 401,
        body: { error: { code: 'INVALID_CREDENTIAL', message: 'Invalid username or password.' } },
      });
    });
  });
});
