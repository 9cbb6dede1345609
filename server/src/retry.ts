import { TransientStoreError } from '../../src/domain/errors.js';
import type { Db } from './db.js';

export interface RetryOptions {
  attempts?: number;
  baseDelayMs?: number;
  /** Blocking wait; swapped out in tests */
  sleep?: (ms: number) => void;
}

const BUSY_CODES = new Set(['SQLITE_BUSY', 'SQLITE_BUSY_SNAPSHOT', 'SQLITE_LOCKED']);

export function isBusyError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) return false;
  const { code } = error;
  return typeof code === 'string' && BUSY_CODES.has(code);
}

/** better-sqlite3 is synchronous, so the backoff blocks too */
export function sleepSync(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

/**
 * Run a write, retrying while SQLite reports the database busy.
 * Delays double from baseDelayMs; any other error propagates at once.
 */
export function withBusyRetry<T>(fn: () => T, options: RetryOptions = {}): T {
  const attempts = options.attempts ?? 6;
  const baseDelayMs = options.baseDelayMs ?? 80;
  const sleep = options.sleep ?? sleepSync;

  let lastError: unknown;
  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return fn();
    } catch (error) {
      if (!isBusyError(error)) throw error;
      lastError = error;
      if (attempt < attempts - 1) {
        const delay = baseDelayMs * 2 ** attempt;
        console.warn(`[retry] Database busy, attempt ${attempt + 1}/${attempts}; waiting ${delay}ms`);
        sleep(delay);
      }
    }
  }
  throw new TransientStoreError(`Database stayed busy after ${attempts} attempts`, { cause: lastError });
}

/** The one way stores write: an IMMEDIATE transaction under the busy retry */
export function writeTransaction<T>(db: Db, fn: () => T, options?: RetryOptions): T {
  return withBusyRetry(() => db.transaction(fn).immediate(), options);
}
