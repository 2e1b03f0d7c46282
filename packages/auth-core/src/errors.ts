import { AuthError, type AuthErrorCode } from '@warden/auth';
import type { Logger } from '@warden/observability';

export type ErrorResponse = {
  status: number;
  body: { error: { code: string; message: string } };
};

const STATUS_BY_CODE: Record<AuthErrorCode, number> = {
  INVALID_CREDENTIALS: 401,
  TOKEN_EXPIRED: 401,
  TOKEN_INVALID: 401,
  SESSION_EXPIRED: 401,
  SESSION_NOT_FOUND: 401,
  TOKEN_ALREADY_USED: 400,
  TOKEN_NOT_FOUND: 400,
  PASSWORD_TOO_WEAK: 400,
  USER_INACTIVE: 403,
  USER_NOT_VERIFIED: 403,
  USER_ALREADY_EXISTS: 409,
  USER_NOT_FOUND: 404,
  INVALID_INPUT: 400,
  INFRASTRUCTURE_FAILURE: 503,
};

/**
 * Maps a thrown value to an HTTP status and a stable JSON body.
 * Infrastructure and unexpected failures are logged here and rendered
 * without internal detail.
 */
export function toErrorResponse(error: unknown, logger: Logger): ErrorResponse {
  if (error instanceof AuthError) {
    if (error.code === 'INFRASTRUCTURE_FAILURE') {
      logger.error({ err: error }, 'Auth request failed: infrastructure unavailable');
      return {
        status: STATUS_BY_CODE.INFRASTRUCTURE_FAILURE,
        body: {
          error: {
            code: error.code,
            message: 'Service temporarily unavailable, please retry',
          },
        },
      };
    }

    return {
      status: STATUS_BY_CODE[error.code],
      body: { error: { code: error.code, message: error.message } },
    };
  }

  logger.error({ err: error }, 'Auth request failed: unexpected error');
  return {
    status: 500,
    body: { error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } },
  };
}
