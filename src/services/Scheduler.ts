/**
 * Clock and sleep behind one seam so the detection loop and the retry
 * backoff can run against a virtual clock in tests.
 */
export interface Scheduler {
  now(): number;

  /**
   * Resolve after `ms`, or as soon as `signal` aborts.
   * Never rejects; callers check `signal.aborted` afterwards.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class TimerScheduler implements Scheduler {
  now(): number {
    return Date.now();
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }

      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };

      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, Math.max(0, ms));

      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
