import type { BackoffKind, RetryPolicy } from './types.js';
import { parseDuration } from './utils.js';

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_MS = 1000;
export const DEFAULT_RETRY_STATUS_CODES: readonly number[] = [429, 502, 503, 504];

export interface ResolvedRetryPolicy {
  maxRetries: number;
  backoff: BackoffKind;
  delayMs: number;
  statusCodes: ReadonlySet<number>;
}

export function resolveRetryPolicy(policy?: RetryPolicy): ResolvedRetryPolicy {
  const maxRetries =
    typeof policy?.maxRetries === 'number' && policy.maxRetries >= 0
      ? Math.floor(policy.maxRetries)
      : DEFAULT_MAX_RETRIES;
  const delayMs = parseDuration(policy?.delay) ?? DEFAULT_RETRY_DELAY_MS;
  const statusCodes = policy?.statusCodes?.length ? policy.statusCodes : DEFAULT_RETRY_STATUS_CODES;
  return {
    maxRetries,
    backoff: policy?.backoff ?? 'exponential',
    delayMs,
    statusCodes: new Set(statusCodes),
  };
}

/** Wait before the retry that follows attempt `attempt` (0-based). */
export function computeDelay(policy: ResolvedRetryPolicy, attempt: number): number {
  switch (policy.backoff) {
    case 'linear':
      return policy.delayMs * (attempt + 1);
    case 'fixed':
      return policy.delayMs;
    case 'exponential':
    default:
      return policy.delayMs * 2 ** attempt;
  }
}

export function shouldRetryStatus(policy: ResolvedRetryPolicy, status: number): boolean {
  return policy.statusCodes.has(status);
}
