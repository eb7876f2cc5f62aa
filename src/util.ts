// src/util.ts

// Largest delay setTimeout honours; anything above fires after 1 ms.
export const MAX_TIMER_MS = 2 ** 31 - 1;

/**
 * Sleep for `ms`, waking early when `signal` aborts.
 * Resolves true when interrupted, false when the full delay elapsed.
 * Delays beyond MAX_TIMER_MS are slept in consecutive chunks.
 */
export function wait(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(true);
  if (ms <= 0) return Promise.resolve(false);
  return new Promise((resolve) => {
    let remaining = ms;
    let timer: NodeJS.Timeout | undefined;
    const onAbort = () => {
      clearTimeout(timer);
      resolve(true);
    };
    const arm = () => {
      const step = Math.min(remaining, MAX_TIMER_MS);
      remaining -= step;
      timer = setTimeout(() => {
        if (remaining > 0) {
          arm();
          return;
        }
        signal?.removeEventListener("abort", onAbort);
        resolve(false);
      }, step);
    };
    arm();
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}

export function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}
