import { performance } from "perf_hooks";

/**
 * Monotonic time source in milliseconds
 */
export interface Clock {
  now(): number;
}

/**
 * Clock backed by performance.now()
 */
export const systemClock: Clock = {
  now: () => performance.now(),
};
