import axios from 'axios';
import { InvalidInputError, NotFoundError, UpstreamError } from '../utils/errors';

/**
 * Retry decisions as pure functions of the attempt history,
 * kept apart from the fetcher that sleeps and calls the network.
 */

export type FailureKind = 'retryable' | 'fatal' | 'not-found';

export interface RetryPolicy {
  maxRetries: number; // total attempts, including the first
  retryDelayMs: number;
  backoffFactor: number; // 1 = constant delay, 2 = doubling
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxRetries: 3,
  retryDelayMs: 5000,
  backoffFactor: 1,
  maxDelayMs: 60_000,
};

export interface AttemptRecord {
  attempt: number;
  kind: FailureKind;
  error: unknown;
}

export type RetryDecision = { retry: true; delayMs: number } | { retry: false };

const RETRYABLE_NETWORK_CODES = new Set([
  'ECONNABORTED',
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ERR_NETWORK',
  'ERR_CANCELED',
]);

/**
 * Map an HTTP status to a failure kind.
 * 429 is the upstream asking us to slow down, so it is retried.
 */
export function classifyStatus(status: number): FailureKind {
  if (status === 404) return 'not-found';
  if (status === 429 || status === 408) return 'retryable';
  if (status >= 500) return 'retryable';
  return 'fatal';
}

export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof NotFoundError) {
    return 'not-found';
  }
  if (error instanceof UpstreamError) {
    return error.status === undefined ? 'retryable' : classifyStatus(error.status);
  }
  if (error instanceof InvalidInputError) {
    return 'fatal';
  }
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return classifyStatus(error.response.status);
    }
    // No response at all: timeout, abort or connection failure
    return 'retryable';
  }
  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return 'retryable';
    }
    if ('code' in error && typeof error.code === 'string' && RETRYABLE_NETWORK_CODES.has(error.code)) {
      return 'retryable';
    }
  }
  return 'fatal';
}

/**
 * Delay before the attempt following `attemptsMade` failures
 */
export function backoffDelay(attemptsMade: number, policy: RetryPolicy): number {
  const delay = policy.retryDelayMs * Math.pow(policy.backoffFactor, Math.max(0, attemptsMade - 1));
  return Math.min(delay, policy.maxDelayMs);
}

export function decideRetry(history: readonly AttemptRecord[], policy: RetryPolicy): RetryDecision {
  const last = history[history.length - 1];

  if (!last || last.kind !== 'retryable') {
    return { retry: false };
  }

  if (history.length >= policy.maxRetries) {
    return { retry: false };
  }

  return { retry: true, delayMs: backoffDelay(history.length, policy) };
}
