import { InfrastructureError, TokenInvalidError } from '@warden/auth';
import { createLogger } from '@warden/observability';
import { describe, expect, it, vi } from 'vitest';
import { InfrastructureGuard, OperationTimeoutError, withTimeout } from '../infrastructure.js';

const never = () => new Promise<never>(() => undefined);

describe('withTimeout', () => {
  it('resolves with the operation result', async () => {
    await expect(withTimeout(async () => 'ok', 50, 'fast')).resolves.toBe('ok');
  });

  it('rejects once the deadline passes', async () => {
    await expect(withTimeout(never, 10, 'cache.get')).rejects.toThrow(
      'cache.get timed out after 10ms'
    );
  });
});

describe('InfrastructureGuard', () => {
  function createGuard() {
    const logs: string[] = [];
    const logger = createLogger({ level: 'warn' }, { write: (line: string) => logs.push(line) });
    return { guard: new InfrastructureGuard({ timeoutMs: 10, logger }), logs };
  }

  it('retries a failed read once', async () => {
    const { guard } = createGuard();
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce('value');

    await expect(guard.read('cache.get', operation)).resolves.toBe('value');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('converts repeated read failures into InfrastructureError', async () => {
    const { guard, logs } = createGuard();
    const cause = new Error('socket hang up');
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(cause);

    const error = await guard.read('cache.get', operation).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(InfrastructureError);
    expect(error).toMatchObject({ operation: 'cache.get', code: 'INFRASTRUCTURE_FAILURE', cause });
    expect(operation).toHaveBeenCalledTimes(2);
    const messages = logs.map((line) => (JSON.parse(line) as { msg: string }).msg);
    expect(messages).toEqual(['Retrying infrastructure call', 'Infrastructure call failed']);
  });

  it('times out hung reads', async () => {
    const { guard } = createGuard();

    const error = await guard.read('cache.exists', never).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(InfrastructureError);
    expect(error instanceof Error ? error.cause : undefined).toBeInstanceOf(OperationTimeoutError);
  });

  it('never retries writes', async () => {
    const { guard } = createGuard();
    const operation = vi.fn<() => Promise<void>>().mockRejectedValue(new Error('read only'));

    await expect(guard.write('cache.set', operation)).rejects.toBeInstanceOf(InfrastructureError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('passes domain errors through untouched', async () => {
    const { guard } = createGuard();
    const domainError = new TokenInvalidError();
    const operation = vi.fn<() => Promise<void>>().mockRejectedValue(domainError);

    await expect(guard.read('lookup', operation)).rejects.toBe(domainError);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
