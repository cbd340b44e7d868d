import type { TimerService, DelayFn } from "../ports/timer.js";

/**
 * Real timer service using global setTimeout/clearTimeout.
 */
export const realTimerService: TimerService = {
  setTimeout: (fn, ms) => globalThis.setTimeout(fn, ms),
  clearTimeout: (id) => globalThis.clearTimeout(id),
};

/**
 * Delay built on a timer service, so fake timers drive it in tests.
 */
export function createDelay(timers: TimerService = realTimerService): DelayFn {
  return (ms) => new Promise((resolve) => timers.setTimeout(resolve, ms));
}

export const realDelay: DelayFn = createDelay();
