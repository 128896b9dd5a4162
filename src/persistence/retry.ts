import { StorageUnavailableError } from '../errors';
import { logger } from '../observability/logger';
import { storageRetries } from '../observability/metrics';

const TRANSIENT_SOCKET_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'EPIPE', 'ETIMEDOUT', 'EHOSTUNREACH', 'EAI_AGAIN']);

// admin_shutdown, crash_shutdown, cannot_connect_now
const TRANSIENT_SQLSTATES = new Set(['57P01', '57P02', '57P03']);

const TRANSIENT_MESSAGES = /Connection terminated|connection timeout|Client has encountered a connection error/i;

export interface RetryOptions {
  /** Total attempts including the first one */
  attempts: number;
  baseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Connection-level failures that a fresh pooled connection can recover from.
 * Constraint violations and malformed queries are never transient.
 */
export function isTransientStorageError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if ('code' in err && typeof err.code === 'string') {
    const code = err.code;
    if (TRANSIENT_SOCKET_CODES.has(code) || TRANSIENT_SQLSTATES.has(code)) return true;
    // Class 08: connection exception
    if (/^08[0-9A-Z]{3}$/.test(code)) return true;
  }
  return TRANSIENT_MESSAGES.test(err.message);
}

/**
 * Run a storage operation, retrying transient failures with a linear backoff
 * of `baseDelayMs × attempt`. Throws StorageUnavailableError once attempts run out.
 */
export async function withRetry<T>(operation: string, fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isTransientStorageError(err)) throw err;
      lastError = err;
      if (attempt < options.attempts) {
        const delayMs = options.baseDelayMs * attempt;
        storageRetries.inc({ operation });
        logger.warn({ err, operation, attempt, delayMs }, 'Transient storage failure; retrying');
        await sleep(delayMs);
      }
    }
  }

  logger.error({ err: lastError, operation, attempts: options.attempts }, 'Storage unavailable after retries');
  throw new StorageUnavailableError(operation, options.attempts, lastError);
}
