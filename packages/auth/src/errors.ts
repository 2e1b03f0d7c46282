/**
 * Authentication error taxonomy
 *
 * Every failure surfaced by the auth core is an AuthError with a stable code.
 * Callers branch on `code` (or instanceof), never on the message text.
 */

export type AuthErrorCode =
  | 'INVALID_CREDENTIALS'
  | 'TOKEN_EXPIRED'
  | 'TOKEN_INVALID'
  | 'SESSION_EXPIRED'
  | 'SESSION_NOT_FOUND'
  | 'TOKEN_ALREADY_USED'
  | 'TOKEN_NOT_FOUND'
  | 'PASSWORD_TOO_WEAK'
  | 'USER_INACTIVE'
  | 'USER_NOT_VERIFIED'
  | 'USER_ALREADY_EXISTS'
  | 'USER_NOT_FOUND'
  | 'INVALID_INPUT'
  | 'INFRASTRUCTURE_FAILURE';

export class AuthError extends Error {
  readonly code: AuthErrorCode;

  constructor(code: AuthErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidCredentialsError extends AuthError {
  constructor(message = 'Invalid email or password') {
    super('INVALID_CREDENTIALS', message);
  }
}

export class TokenExpiredError extends AuthError {
  constructor(message = 'Token has expired', options?: ErrorOptions) {
    super('TOKEN_EXPIRED', message, options);
  }
}

export class TokenInvalidError extends AuthError {
  constructor(message = 'Token is invalid', options?: ErrorOptions) {
    super('TOKEN_INVALID', message, options);
  }
}

export class SessionExpiredError extends AuthError {
  constructor(message = 'Session has expired') {
    super('SESSION_EXPIRED', message);
  }
}

export class SessionNotFoundError extends AuthError {
  constructor(message = 'Session not found') {
    super('SESSION_NOT_FOUND', message);
  }
}

export class TokenAlreadyUsedError extends AuthError {
  constructor(message = 'Token has already been used') {
    super('TOKEN_ALREADY_USED', message);
  }
}

export class TokenNotFoundError extends AuthError {
  constructor(message = 'Token not found') {
    super('TOKEN_NOT_FOUND', message);
  }
}

export class PasswordTooWeakError extends AuthError {
  readonly reasons: readonly string[];

  constructor(reasons: readonly string[]) {
    super('PASSWORD_TOO_WEAK', `Password is too weak: ${reasons.join('; ')}`);
    this.reasons = reasons;
  }
}

export class UserInactiveError extends AuthError {
  constructor(message = 'User account is inactive') {
    super('USER_INACTIVE', message);
  }
}

export class UserNotVerifiedError extends AuthError {
  constructor(message = 'Email address has not been verified') {
    super('USER_NOT_VERIFIED', message);
  }
}

export class UserAlreadyExistsError extends AuthError {
  constructor(message = 'A user with this email already exists') {
    super('USER_ALREADY_EXISTS', message);
  }
}

export class UserNotFoundError extends AuthError {
  constructor(message = 'User not found') {
    super('USER_NOT_FOUND', message);
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends AuthError {
  readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[], message = 'Invalid input') {
    super('INVALID_INPUT', message);
    this.issues = issues;
  }
}

/**
 * Raised when the cache or database cannot answer in time.
 * `operation` names the guarded call for logs; it never reaches clients.
 */
export class InfrastructureError extends AuthError {
  readonly operation: string;

  constructor(operation: string, options?: ErrorOptions) {
    super('INFRASTRUCTURE_FAILURE', `Infrastructure call failed: ${operation}`, options);
    this.operation = operation;
  }
}

export function isAuthError(error: unknown): error is AuthError {
  return error instanceof AuthError;
}
