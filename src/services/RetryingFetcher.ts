import { NotFoundError, UpstreamError, describeError } from '../utils/errors';
import { createLogger, type Logger } from '../utils/logger';
import type { Scheduler } from './Scheduler';
import {
  DEFAULT_RETRY_POLICY,
  classifyFailure,
  decideRetry,
  type AttemptRecord,
  type FailureKind,
  type RetryPolicy,
} from './RetryPolicy';

export type FetchOperation<K, T> = (key: K, signal: AbortSignal) => Promise<T>;

/**
 * 'aborted' means the caller cancelled the call; it is not an upstream failure
 */
export type FetchFailureKind = FailureKind | 'aborted';

export type FetchResult<T> =
  | { success: true; value: T; attemptsMade: number }
  | { success: false; errorKind: FetchFailureKind; error: unknown; attemptsMade: number };

export interface RetryingFetcherOptions extends Partial<RetryPolicy> {
  name: string;
  requestTimeoutMs?: number;
  scheduler: Scheduler;
}

/**
 * Wraps one upstream call with a per-attempt timeout and bounded retries.
 *
 * Only failures classified as retryable are retried. A not-found or fatal
 * failure ends the call after that attempt. The fetcher reports outcomes
 * and leaves error accounting to its caller.
 */
export class RetryingFetcher<K, T> {
  private readonly logger: Logger;
  private readonly policy: RetryPolicy;
  private readonly requestTimeoutMs: number;
  private readonly scheduler: Scheduler;

  constructor(
    private readonly operation: FetchOperation<K, T>,
    options: RetryingFetcherOptions
  ) {
    this.logger = createLogger({ component: 'RetryingFetcher', fetcher: options.name });
    this.policy = {
      maxRetries: options.maxRetries ?? DEFAULT_RETRY_POLICY.maxRetries,
      retryDelayMs: options.retryDelayMs ?? DEFAULT_RETRY_POLICY.retryDelayMs,
      backoffFactor: options.backoffFactor ?? DEFAULT_RETRY_POLICY.backoffFactor,
      maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
    };
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
    this.scheduler = options.scheduler;

    if (!Number.isInteger(this.policy.maxRetries) || this.policy.maxRetries < 1) {
      throw new RangeError(`maxRetries must be a positive integer, got ${this.policy.maxRetries}`);
    }
  }

  getPolicy(): RetryPolicy {
    return { ...this.policy };
  }

  /**
   * Run the operation until it succeeds or the policy gives up.
   * Never throws; the outcome is in the result.
   */
  async attempt(key: K, signal?: AbortSignal): Promise<FetchResult<T>> {
    const history: AttemptRecord[] = [];

    while (true) {
      const attempt = history.length + 1;

      try {
        const value = await this.runOnce(key, signal);
        if (attempt > 1) {
          this.logger.info({ key, attempt }, 'Fetch succeeded after retry');
        }
        return { success: true, value, attemptsMade: attempt };
      } catch (error) {
        if (signal?.aborted) {
          this.logger.debug({ key, attempt }, 'Fetch cancelled');
          return { success: false, errorKind: 'aborted', error, attemptsMade: attempt };
        }

        const kind = classifyFailure(error);
        history.push({ attempt, kind, error });

        const decision = decideRetry(history, this.policy);

        if (!decision.retry) {
          if (kind !== 'not-found') {
            this.logger.error({ key, attempt, kind, error: describeError(error) }, 'Fetch failed');
          }
          return { success: false, errorKind: kind, error, attemptsMade: attempt };
        }

        this.logger.warn(
          { key, attempt, maxRetries: this.policy.maxRetries, delayMs: decision.delayMs, error: describeError(error) },
          'Fetch failed, retrying'
        );
        await this.scheduler.sleep(decision.delayMs, signal);
      }
    }
  }

  /**
   * Same as attempt, but throws NotFoundError or UpstreamError on failure
   */
  async fetch(key: K, signal?: AbortSignal): Promise<T> {
    const result = await this.attempt(key, signal);
    if (result.success) {
      return result.value;
    }

    if (result.errorKind === 'not-found') {
      throw result.error instanceof NotFoundError
        ? result.error
        : new NotFoundError(`No record for ${String(key)}`, { cause: result.error });
    }

    if (result.errorKind === 'aborted') {
      throw new UpstreamError('Upstream call cancelled', { cause: result.error, attemptsMade: result.attemptsMade });
    }

    const detail = describeError(result.error);
    throw new UpstreamError(`Upstream call failed after ${result.attemptsMade} attempt(s): ${detail.message}`, {
      cause: result.error,
      status: detail.status,
      attemptsMade: result.attemptsMade,
    });
  }

  /**
   * One attempt with its own timeout, cancelled too when the caller aborts
   */
  private async runOnce(key: K, parent?: AbortSignal): Promise<T> {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new UpstreamError(`Request timed out after ${this.requestTimeoutMs}ms`));
    }, this.requestTimeoutMs);
    const onParentAbort = () => controller.abort(parent?.reason);

    if (parent?.aborted) {
      clearTimeout(timer);
      throw abortReason(parent);
    }
    parent?.addEventListener('abort', onParentAbort, { once: true });

    try {
      return await raceAbort(this.operation(key, controller.signal), controller.signal);
    } finally {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    }
  }
}

/**
 * Reject as soon as the signal aborts, even if the operation ignores it
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason instanceof Error ? signal.reason : new UpstreamError('Request aborted');
}
