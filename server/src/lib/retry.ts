import logger from './logger';

export interface RetryPolicy {
  /** Total number of tries, the first one included */
  attempts: number;
  /** Wait before the second try */
  delayMs: number;
  /** Upper bound for any single wait */
  maxDelayMs: number;
  /** Growth of the wait between consecutive tries; 1 polls at a fixed rate */
  multiplier: number;
  shouldRetry: (error: unknown) => boolean;
  /** Shown in retry logs */
  label: string;
}

const TRANSIENT_SYSTEM_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

function field(value: unknown, key: string): unknown {
  return value !== null && typeof value === 'object' ? Reflect.get(value, key) : undefined;
}

/**
 * HTTP status carried by an error (`statusCode` on our error classes)
 */
export function readStatusCode(error: unknown): number | undefined {
  const statusCode = field(error, 'statusCode');
  return typeof statusCode === 'number' ? statusCode : undefined;
}

/**
 * Whether a failed HTTP call is worth repeating. An HTTP status decides on its
 * own: 5xx and 429 are transient. Otherwise the failure must come from the
 * connection: undici reports those as `TypeError: fetch failed` with the
 * system error on `cause`, and `AbortSignal.timeout` aborts with a
 * `TimeoutError`.
 */
export function isTransientError(error: unknown): boolean {
  const status = readStatusCode(error);
  if (status !== undefined) {
    return status >= 500 || status === 429;
  }

  if (field(error, 'name') === 'TimeoutError') {
    return true;
  }

  const code = field(error, 'code') ?? field(field(error, 'cause'), 'code');
  if (typeof code === 'string' && TRANSIENT_SYSTEM_CODES.has(code)) {
    return true;
  }

  return error instanceof TypeError && error.message === 'fetch failed';
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 4,
  delayMs: 500,
  maxDelayMs: 5000,
  multiplier: 2,
  shouldRetry: isTransientError,
  label: 'request',
};

/**
 * Wait before try number `attempt + 1` (attempt counts from 1)
 */
export function backoffDelay(policy: Pick<RetryPolicy, 'delayMs' | 'maxDelayMs' | 'multiplier'>, attempt: number): number {
  return Math.min(policy.delayMs * policy.multiplier ** (attempt - 1), policy.maxDelayMs);
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Run `fn` until it succeeds, the policy gives up on its error, or the tries
 * run out. The last error is rethrown unchanged.
 */
export async function withRetry<T>(fn: () => Promise<T>, overrides: Partial<RetryPolicy> = {}): Promise<T> {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...overrides };

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= policy.attempts || !policy.shouldRetry(error)) {
        throw error;
      }

      const waitMs = backoffDelay(policy, attempt);
      logger.warn(
        {
          label: policy.label,
          attempt,
          attempts: policy.attempts,
          waitMs,
          statusCode: readStatusCode(error),
          errorMessage: error instanceof Error ? error.message : String(error),
        },
        `${policy.label} failed (try ${attempt}/${policy.attempts}), retrying in ${waitMs}ms`
      );
      await sleep(waitMs);
    }
  }
}
