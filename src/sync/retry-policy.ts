import { PermanentStoreError, TransientStoreError } from '../shared/errors.js';

export type FailureClass = 'transient' | 'permanent';

const TRANSIENT_NODE_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
]);

const TRANSIENT_SQLITE_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED']);

// SQLSTATE: serialization failure, deadlock, lock not available.
const TRANSIENT_SQLSTATES = new Set(['40001', '40P01', '55P03']);

// Connection exception, insufficient resources, operator intervention.
const TRANSIENT_SQLSTATE_CLASSES = new Set(['08', '53', '57']);

const TRANSIENT_MESSAGE = /timed? ?out|timeout|connection terminated|connection reset/i;

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

/**
 * Decides whether a failed apply is worth retrying. Anything not known to be
 * transient is permanent and waits for an operator.
 */
export function classifyStoreError(err: unknown): FailureClass {
  if (err instanceof TransientStoreError) return 'transient';
  if (err instanceof PermanentStoreError) return 'permanent';

  const code = errorCode(err);
  if (code !== undefined) {
    if (TRANSIENT_NODE_CODES.has(code) || TRANSIENT_SQLITE_CODES.has(code)) return 'transient';
    if (/^[0-9A-Z]{5}$/.test(code)) {
      return TRANSIENT_SQLSTATES.has(code) || TRANSIENT_SQLSTATE_CLASSES.has(code.slice(0, 2))
        ? 'transient'
        : 'permanent';
    }
    if (code.startsWith('SQLITE_')) return 'permanent';
  }

  if (err instanceof Error && TRANSIENT_MESSAGE.test(err.message)) return 'transient';
  return 'permanent';
}

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
}

/** `min(base * 2^retryCount, cap)` after `now`: 30s, 60s, 120s, ... with the defaults. */
export function computeNextRetry(retryCount: number, now: Date, opts: BackoffOptions): Date {
  const delayMs = Math.min(opts.baseDelayMs * Math.pow(2, retryCount), opts.maxDelayMs);
  return new Date(now.getTime() + delayMs);
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const code = errorCode(err);
    return code ? `${err.name} [${code}]: ${err.message}` : `${err.name}: ${err.message}`;
  }
  return String(err);
}
