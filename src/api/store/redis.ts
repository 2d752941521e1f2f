import Redis from 'ioredis';
import { ServiceUnavailableError } from '../../shared/errors';

export interface RedisOptions {
  url: string;
  commandTimeoutMs: number;
}

export async function connectRedis(options: RedisOptions): Promise<Redis> {
  const client = new Redis(options.url, {
    maxRetriesPerRequest: 3,
    commandTimeout: options.commandTimeoutMs,
    retryStrategy: (times) => {
      if (times > 3) return null;
      return Math.min(times * 100, 1000);
    },
  });

  await client.ping();
  return client;
}

/**
 * Runs a store command, turning connection failures and timeouts into a
 * retryable 503 for the caller.
 */
export async function storeCall<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new ServiceUnavailableError(`Store unavailable during ${operation}, please retry.`, error);
  }
}

export type ExecResult = [error: Error | null, result: unknown][] | null;

/**
 * Runs a MULTI that writes on behalf of index keys claimed just before it.
 * If the transaction rejects, is aborted, or any queued command failed, the
 * claims are released and the caller gets a 503.
 */
export async function execClaimed(
  operation: string,
  exec: () => Promise<ExecResult>,
  release: () => Promise<unknown>,
): Promise<void> {
  const failure: unknown = await exec().then(
    results => (results === null ? new Error('Transaction aborted') : results.find(([error]) => error !== null)?.[0] ?? null),
    (error: unknown) => error,
  );
  if (failure === null) return;

  await storeCall(`${operation} rollback`, release);
  throw new ServiceUnavailableError(`Store unavailable during ${operation}, please retry.`, failure);
}
