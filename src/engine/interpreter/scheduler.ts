import { durationMsAsNumber } from "../../types/brands";

import type { DurationMs } from "../../types/brands";

/**
 * Source of the pause between executed steps. `wait` resolves when the
 * delay elapses or as soon as `signal` aborts, whichever comes first; it
 * never rejects on abort. Callers re-check the signal afterwards.
 */
export type Scheduler = {
  wait(delay: DurationMs, signal: AbortSignal): Promise<void>;
};

export const timerScheduler: Scheduler = {
  wait(delay, signal) {
    return new Promise<void>((resolve) => {
      if (signal.aborted) {
        resolve();
        return;
      }
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal.removeEventListener("abort", onAbort);
        resolve();
      }, durationMsAsNumber(delay));
      signal.addEventListener("abort", onAbort, { once: true });
    });
  },
};

// Skips pacing entirely; runs finish within a few microtask turns
export const immediateScheduler: Scheduler = {
  wait() {
    return Promise.resolve();
  },
};
