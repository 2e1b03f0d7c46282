import pino from 'pino';

export type Logger = pino.Logger;

/**
 * Redact sensitive data from logs
 * - Authorization headers (Bearer tokens)
 * - Passwords, password hashes and token fields
 */
const REDACTION_PATHS = [
  'req.headers.authorization',
  'req.headers.Authorization',
  'headers.authorization',
  'headers.Authorization',
  'authorization',
  'Authorization',
  'password',
  'currentPassword',
  'newPassword',
  'passwordHash',
  'token',
  'accessToken',
  'refreshToken',
  'secret',
];

const JWT_PATTERN = /eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g;
const OPAQUE_TOKEN_PATTERN = /\b(ev|pr)_[A-Za-z0-9_-]{16,}/g;

function redactString(value: string): string {
  if (value.startsWith('Bearer ')) {
    return 'Bearer [REDACTED]';
  }
  return value.replace(JWT_PATTERN, '[REDACTED_JWT]').replace(OPAQUE_TOKEN_PATTERN, '$1_[REDACTED]');
}

/**
 * Recursively mask bearer values, JWT-shaped strings and verification tokens
 */
export function redactSecrets(value: unknown): unknown {
  if (typeof value === 'string') {
    return redactString(value);
  }
  if (Array.isArray(value)) {
    return value.map(redactSecrets);
  }
  if (value instanceof Error || value instanceof Date) {
    return value;
  }
  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = redactSecrets(entry);
    }
    return result;
  }
  return value;
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels
 * - Automatic redaction of sensitive data (tokens, passwords)
 * - Structured JSON output with ISO 8601 timestamps
 */
export function createLogger(
  options?: pino.LoggerOptions,
  destination?: pino.DestinationStream
): Logger {
  const loggerOptions: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    hooks: {
      logMethod(args, method) {
        // Merge object and message arguments are both scrubbed before pino formats them
        Reflect.apply(method, this, args.map(redactSecrets));
      },
    },
    ...options,
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
