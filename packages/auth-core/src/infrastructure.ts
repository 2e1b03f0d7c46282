import { AuthError, InfrastructureError } from '@warden/auth';
import { logger as defaultLogger, type Logger } from '@warden/observability';
import { DEFAULT_CACHE_TIMEOUT_MS } from './config.js';

export class OperationTimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
  }
}

/**
 * Races an operation against a deadline. The timer is always cleared, so a
 * settled operation never keeps the process alive.
 */
export async function withTimeout<T>(
  operation: () => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new OperationTimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export type InfrastructureGuardOptions = {
  timeoutMs?: number;
  /** Extra attempts for idempotent reads; writes are never retried */
  readRetries?: number;
  logger?: Logger;
};

/**
 * Wraps every cache and database round-trip: deadline, bounded retry for
 * reads, and conversion of whatever the driver throws into InfrastructureError.
 */
export class InfrastructureGuard {
  private readonly timeoutMs: number;
  private readonly readRetries: number;
  private readonly logger: Logger;

  constructor(options: InfrastructureGuardOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CACHE_TIMEOUT_MS;
    this.readRetries = options.readRetries ?? 1;
    this.logger = options.logger ?? defaultLogger;
  }

  read<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return this.run(label, operation, 1 + this.readRetries);
  }

  write<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return this.run(label, operation, 1);
  }

  private async run<T>(label: string, operation: () => Promise<T>, attempts: number): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      try {
        return await withTimeout(operation, this.timeoutMs, label);
      } catch (error) {
        if (error instanceof AuthError) {
          throw error;
        }
        lastError = error;
        if (attempt < attempts) {
          this.logger.warn({ err: error, operation: label, attempt }, 'Retrying infrastructure call');
        }
      }
    }

    this.logger.error({ err: lastError, operation: label, attempts }, 'Infrastructure call failed');
    throw new InfrastructureError(label, { cause: lastError });
  }
}
