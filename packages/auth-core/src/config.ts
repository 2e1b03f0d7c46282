import {
  DEFAULT_ACCESS_TOKEN_TTL_SECONDS,
  DEFAULT_PASSWORD_HASH_COST,
  DEFAULT_PASSWORD_MIN_LENGTH,
  DEFAULT_PASSWORD_RESET_TTL_SECONDS,
  DEFAULT_REFRESH_TOKEN_TTL_SECONDS,
  DEFAULT_VERIFICATION_TOKEN_TTL_SECONDS,
  MAX_PASSWORD_HASH_COST,
  MIN_PASSWORD_HASH_COST,
  type PasswordPolicy,
} from '@warden/auth';
import { z } from 'zod';

export const DEFAULT_JWT_ISSUER = 'warden';
export const DEFAULT_CACHE_TIMEOUT_MS = 2000;
export const MIN_JWT_SECRET_LENGTH = 32;

// Local development only; production refuses to start with it
const DEVELOPMENT_JWT_SECRET = 'dev-only-jwt-secret-change-me-before-deploying';

export type RevocationFailurePolicy = 'fail-closed' | 'fail-open';

export type AuthCoreConfig = {
  environment: 'development' | 'test' | 'production';
  jwtSecret: string;
  issuer: string;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  clockToleranceSeconds: number;
  passwordHashCost: number;
  passwordPolicy: PasswordPolicy;
  tokenHashSecret: string;
  revocationFailurePolicy: RevocationFailurePolicy;
  cacheTimeoutMs: number;
  userRevocationTtlSeconds: number;
  sessionTtlSeconds: number;
  verificationTokenTtlSeconds: number;
  passwordResetTtlSeconds: number;
  requireVerifiedEmail: boolean;
  redis: { url: string; token: string } | null;
};

const emptyToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

function integer(defaultValue: number, min: number, max = Number.MAX_SAFE_INTEGER) {
  return z.preprocess(emptyToUndefined, z.coerce.number().int().min(min).max(max).default(defaultValue));
}

function optionalInteger(min: number) {
  return z.preprocess(emptyToUndefined, z.coerce.number().int().min(min).optional());
}

function flag(defaultValue: boolean) {
  return z.preprocess(
    emptyToUndefined,
    z
      .enum(['true', 'false', '1', '0'])
      .optional()
      .transform((value) => (value === undefined ? defaultValue : value === 'true' || value === '1'))
  );
}

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());

const AuthEnvSchema = z.object({
  NODE_ENV: z.preprocess(
    emptyToUndefined,
    z.enum(['development', 'test', 'production']).default('development')
  ),
  AUTH_JWT_SECRET: optionalString,
  JWT_SECRET: optionalString,
  AUTH_JWT_ISSUER: z.preprocess(emptyToUndefined, z.string().default(DEFAULT_JWT_ISSUER)),
  AUTH_ACCESS_TOKEN_TTL_SECONDS: integer(DEFAULT_ACCESS_TOKEN_TTL_SECONDS, 1),
  AUTH_REFRESH_TOKEN_TTL_SECONDS: integer(DEFAULT_REFRESH_TOKEN_TTL_SECONDS, 1),
  AUTH_CLOCK_TOLERANCE_SECONDS: integer(0, 0, 300),
  PASSWORD_HASH_COST: integer(
    DEFAULT_PASSWORD_HASH_COST,
    MIN_PASSWORD_HASH_COST,
    MAX_PASSWORD_HASH_COST
  ),
  PASSWORD_MIN_LENGTH: integer(DEFAULT_PASSWORD_MIN_LENGTH, 1, 256),
  PASSWORD_REQUIRE_UPPERCASE: flag(true),
  PASSWORD_REQUIRE_LOWERCASE: flag(true),
  PASSWORD_REQUIRE_DIGIT: flag(true),
  PASSWORD_REQUIRE_SPECIAL: flag(true),
  TOKEN_HASH_SECRET: optionalString,
  AUTH_REVOCATION_FAILURE_POLICY: z.preprocess(
    emptyToUndefined,
    z.enum(['fail-closed', 'fail-open']).default('fail-closed')
  ),
  AUTH_CACHE_TIMEOUT_MS: integer(DEFAULT_CACHE_TIMEOUT_MS, 1, 60_000),
  AUTH_USER_REVOCATION_TTL_SECONDS: optionalInteger(1),
  AUTH_SESSION_TTL_SECONDS: optionalInteger(1),
  AUTH_VERIFICATION_TOKEN_TTL_SECONDS: integer(DEFAULT_VERIFICATION_TOKEN_TTL_SECONDS, 1),
  AUTH_PASSWORD_RESET_TTL_SECONDS: integer(DEFAULT_PASSWORD_RESET_TTL_SECONDS, 1),
  AUTH_REQUIRE_VERIFIED_EMAIL: flag(false),
  UPSTASH_REDIS_REST_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  UPSTASH_REDIS_REST_TOKEN: optionalString,
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

function resolveJwtSecret(
  env: z.infer<typeof AuthEnvSchema>
): string {
  const configured = env.AUTH_JWT_SECRET ?? env.JWT_SECRET;

  if (!configured) {
    if (env.NODE_ENV === 'production') {
      throw new Error('AUTH_JWT_SECRET or JWT_SECRET must be set in production');
    }
    return DEVELOPMENT_JWT_SECRET;
  }

  if (env.NODE_ENV === 'production' && configured.length < MIN_JWT_SECRET_LENGTH) {
    throw new Error(`AUTH_JWT_SECRET must be at least ${MIN_JWT_SECRET_LENGTH} characters long`);
  }

  return configured;
}

export function loadAuthCoreConfig(env: NodeJS.ProcessEnv = process.env): AuthCoreConfig {
  const result = AuthEnvSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`Invalid auth configuration: ${formatIssues(result.error)}`);
  }

  const parsed = result.data;
  const jwtSecret = resolveJwtSecret(parsed);

  if (Boolean(parsed.UPSTASH_REDIS_REST_URL) !== Boolean(parsed.UPSTASH_REDIS_REST_TOKEN)) {
    throw new Error('UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN must be set together');
  }

  const userRevocationTtlSeconds =
    parsed.AUTH_USER_REVOCATION_TTL_SECONDS ?? parsed.AUTH_REFRESH_TOKEN_TTL_SECONDS;
  // The user-wide entry must outlive every access token it revokes
  if (userRevocationTtlSeconds < parsed.AUTH_ACCESS_TOKEN_TTL_SECONDS) {
    throw new Error(
      'AUTH_USER_REVOCATION_TTL_SECONDS must be at least AUTH_ACCESS_TOKEN_TTL_SECONDS'
    );
  }

  return {
    environment: parsed.NODE_ENV,
    jwtSecret,
    issuer: parsed.AUTH_JWT_ISSUER,
    accessTokenTtlSeconds: parsed.AUTH_ACCESS_TOKEN_TTL_SECONDS,
    refreshTokenTtlSeconds: parsed.AUTH_REFRESH_TOKEN_TTL_SECONDS,
    clockToleranceSeconds: parsed.AUTH_CLOCK_TOLERANCE_SECONDS,
    passwordHashCost: parsed.PASSWORD_HASH_COST,
    passwordPolicy: {
      minLength: parsed.PASSWORD_MIN_LENGTH,
      requireUppercase: parsed.PASSWORD_REQUIRE_UPPERCASE,
      requireLowercase: parsed.PASSWORD_REQUIRE_LOWERCASE,
      requireDigit: parsed.PASSWORD_REQUIRE_DIGIT,
      requireSpecial: parsed.PASSWORD_REQUIRE_SPECIAL,
    },
    tokenHashSecret: parsed.TOKEN_HASH_SECRET ?? jwtSecret,
    revocationFailurePolicy: parsed.AUTH_REVOCATION_FAILURE_POLICY,
    cacheTimeoutMs: parsed.AUTH_CACHE_TIMEOUT_MS,
    userRevocationTtlSeconds,
    sessionTtlSeconds: parsed.AUTH_SESSION_TTL_SECONDS ?? parsed.AUTH_REFRESH_TOKEN_TTL_SECONDS,
    verificationTokenTtlSeconds: parsed.AUTH_VERIFICATION_TOKEN_TTL_SECONDS,
    passwordResetTtlSeconds: parsed.AUTH_PASSWORD_RESET_TTL_SECONDS,
    requireVerifiedEmail: parsed.AUTH_REQUIRE_VERIFIED_EMAIL,
    redis:
      parsed.UPSTASH_REDIS_REST_URL && parsed.UPSTASH_REDIS_REST_TOKEN
        ? { url: parsed.UPSTASH_REDIS_REST_URL, token: parsed.UPSTASH_REDIS_REST_TOKEN }
        : null,
  };
}
