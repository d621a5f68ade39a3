/**
 * Authentication / Authorization Error Taxonomy
 *
 * Every error the core raises or returns extends AuthError so callers can
 * map it to a transport response with a single instanceof check.
 *
 * - DecodeError: malformed, tampered or unsupported-version token
 * - InvalidCredentialError: wrong password OR unknown login (same message)
 * - AccountDisabledError: account exists but is not active
 * - FeatureNotLicensedError: tenant plan lacks a required entitlement
 * - AccessDeniedError: Demand failed; carries actions and actor for audit
 * - PasswordReuseError: new password hash equals the current one
 */

export interface SecurityErrorShape {
  code: string;
  message: string;
  statusCode: number;
  details?: Record<string, unknown>;
}

export class AuthError extends Error implements SecurityErrorShape {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AuthError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

/** Why a token could not be decoded. */
export type DecodeFailure = 'malformed' | 'integrity' | 'unsupported_version';

export class DecodeError extends AuthError {
  readonly reason: DecodeFailure;

  constructor(reason: DecodeFailure, message?: string) {
    super('TOKEN_DECODE_FAILED', message ?? `Token could not be decoded (${reason})`, 400, {
      reason,
    });
    this.name = 'DecodeError';
    this.reason = reason;
  }
}

/**
 * Message is fixed so that "no such login" and "wrong password" are
 * indistinguishable to the caller.
 */
export const INVALID_CREDENTIAL_MESSAGE = 'Invalid username or password.';

export class InvalidCredentialError extends AuthError {
  constructor() {
    super('INVALID_CREDENTIAL', INVALID_CREDENTIAL_MESSAGE, 401);
    this.name = 'InvalidCredentialError';
  }
}

export class AccountDisabledError extends AuthError {
  constructor(accountId: string) {
    super('ACCOUNT_DISABLED', 'Account disabled.', 403, { accountId });
    this.name = 'AccountDisabledError';
  }
}

export class FeatureNotLicensedError extends AuthError {
  readonly feature: string;

  constructor(feature: string) {
    super('FEATURE_NOT_LICENSED', 'Your tariff plan does not support this option.', 402, {
      feature,
    });
    this.name = 'FeatureNotLicensedError';
    this.feature = feature;
  }
}

export class AccessDeniedError extends AuthError {
  readonly actions: readonly string[];
  readonly actorId: string;
  readonly resource?: string;

  constructor(actorId: string, actions: readonly string[], resource?: string) {
    const target = resource ? ` on ${resource}` : '';
    super(
      'ACCESS_DENIED',
      `Access denied for ${actorId}: ${actions.join(', ')}${target}`,
      403,
      { actorId, actions: [...actions], resource }
    );
    this.name = 'AccessDeniedError';
    this.actorId = actorId;
    this.actions = [...actions];
    this.resource = resource;
  }
}

export class PasswordReuseError extends AuthError {
  constructor() {
    super('PASSWORD_REUSE', 'A new password must be used', 400);
    this.name = 'PasswordReuseError';
  }
}

/** Errors assignIdentity may hand back instead of throwing. */
export type IdentityRejection =
  | InvalidCredentialError
  | AccountDisabledError
  | FeatureNotLicensedError;

export function createAuthError(
  code: string,
  message: string,
  statusCode: number = 500,
  details?: Record<string, unknown>
): AuthError {
  return new AuthError(code, message, statusCode, details);
}

export const AuthErrors = {
  NO_REQUEST_SCOPE: () =>
    createAuthError(
      'NO_REQUEST_SCOPE',
      'Current identity can only be set inside runInRequestScope()',
      500
    ),

  INVALID_ARGUMENT: (message: string) => createAuthError('INVALID_ARGUMENT', message, 400),

  LOOKUP_TIMEOUT: (operation: string, timeoutMs: number) =>
    createAuthError('LOOKUP_TIMEOUT', `${operation} timed out after ${timeoutMs}ms`, 504, {
      operation,
      timeoutMs,
    }),

  STORE_FAILURE: (store: string, reason: string) =>
    createAuthError('STORE_FAILURE', `${store} failed: ${reason}`, 500),

  AUTHENTICATION_UNAVAILABLE: () =>
    createAuthError('AUTHENTICATION_UNAVAILABLE', 'Authentication is temporarily unavailable', 503),

  CONFIGURATION_ERROR: (message: string) =>
    createAuthError('CONFIGURATION_ERROR', `Configuration error: ${message}`, 500),
} as const;

/**
 * Expected security outcomes (as opposed to bugs or infrastructure faults).
 * Authentication logs these at debug level; anything else at error level.
 */
export function isSecurityRejection(error: unknown): error is IdentityRejection | DecodeError {
  return (
    error instanceof InvalidCredentialError ||
    error instanceof AccountDisabledError ||
    error instanceof FeatureNotLicensedError ||
    error instanceof DecodeError
  );
}

export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof AuthError) {
    return {
      type: 'AuthError',
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
      ...(process.env.NODE_ENV !== 'production' && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}

export function createErrorResponse(error: SecurityErrorShape): {
  statusCode: number;
  body: Record<string, unknown>;
} {
  return {
    statusCode: error.statusCode,
    body: {
      error: {
        code: error.code,
        message: error.message,
        ...(process.env.NODE_ENV === 'development' && error.details && { details: error.details }),
      },
    },
  };
}
