/** Longest delay a single timer can hold; longer ones fire after 1 ms */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * Suspends for `ms`, chaining timers for delays beyond MAX_TIMER_DELAY_MS.
 * An abort rejects with the signal's reason and clears the pending timer.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const arm = (remaining: number) => {
      const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS);
      timer = setTimeout(() => {
        if (remaining > chunk) {
          arm(remaining - chunk);
          return;
        }
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, chunk);
    };

    signal?.addEventListener('abort', onAbort, { once: true });
    arm(Math.max(ms, 0));
  });
}

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;
