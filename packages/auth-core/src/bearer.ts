import { TokenInvalidError } from '@warden/auth';

const BEARER_PREFIX = 'Bearer ';

/**
 * Extracts the token from an `Authorization: Bearer <token>` header value.
 * The scheme is matched case-sensitively.
 */
export function extractBearerToken(header: string | null | undefined): string {
  if (!header) {
    throw new TokenInvalidError('Authorization header is required');
  }

  if (!header.startsWith(BEARER_PREFIX)) {
    throw new TokenInvalidError("Authorization header must start with 'Bearer '");
  }

  const token = header.slice(BEARER_PREFIX.length).trim();
  if (!token) {
    throw new TokenInvalidError('Bearer token is empty');
  }

  return token;
}
