import { performance } from 'perf_hooks';

/**
 * Monotonic time source used by the pacing loop
 */
export interface Clock {
  /**
   * Milliseconds on a monotonic scale
   */
  now(): number;

  /**
   * Wait for ms milliseconds. Resolves early, without error, when the signal aborts.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),

  sleep: (ms: number, signal?: AbortSignal): Promise<void> =>
    new Promise((resolve) => {
      if (ms <= 0 || signal?.aborted) {
        resolve();
        return;
      }

      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);

      signal?.addEventListener('abort', onAbort, { once: true });
    }),
};
