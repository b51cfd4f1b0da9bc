/**
 * Timer Registry
 *
 * Tracks armed timers and decides which of them are due. Repeating timers
 * are rearmed on their original grid (`nextDeadline += interval`), and any
 * ticks missed while the loop was busy collapse into a single expiry.
 */

import type { LoopCallback, TargetRef, TimerMode } from "../types/events.js";
import type { Clock } from "../utils/clock.js";
import { TimerArmError } from "./errors.js";
import { createContextLogger } from "../utils/logger.js";

const logger = createContextLogger("TimerRegistry");

/**
 * Where an expiry goes: a target, or a callback run on the application target
 */
export type TimerOwner =
  | { kind: "target"; target: TargetRef }
  | { kind: "callback"; callback: LoopCallback };

/**
 * Handle returned by arm()
 */
export interface TimerHandle {
  readonly id: number;
}

/**
 * Armed timer state, owned by the registry
 */
interface TimerEntry {
  id: number;
  interval: number;
  mode: TimerMode;
  nextDeadline: number;
  owner: TimerOwner;
}

/**
 * One fired timer, as reported by collectDue()
 */
export interface TimerExpiry {
  timerId: number;
  owner: TimerOwner;
  /** Deadline that was reached */
  deadline: number;
  /** Intervals that elapsed since the deadline was due, coalesced into this expiry */
  missed: number;
}

/**
 * TimerRegistry class
 *
 * @example
 * ```ts
 * const timers = new TimerRegistry(systemClock);
 * const handle = timers.arm(250, 'repeating', { kind: 'target', target });
 * const due = timers.collectDue(); // expirations at or before now
 * timers.cancel(handle);
 * ```
 */
export class TimerRegistry {
  private timers = new Map<number, TimerEntry>();
  private nextId = 1;

  constructor(private clock: Clock) {}

  /**
   * Arm a timer
   *
   * @param interval - Milliseconds until the first expiry (and between repeats)
   * @param mode - 'oneshot' or 'repeating'
   * @param owner - Target or callback receiving the expiry
   * @throws {TimerArmError} If the interval is negative or not finite
   */
  arm(interval: number, mode: TimerMode, owner: TimerOwner): TimerHandle {
    if (!Number.isFinite(interval) || interval < 0) {
      throw new TimerArmError(
        `Timer interval must be a non-negative finite number, got ${interval}`,
      );
    }
    if (mode !== "oneshot" && mode !== "repeating") {
      throw new TimerArmError(`Unknown timer mode: ${String(mode)}`);
    }

    const id = this.nextId++;
    this.timers.set(id, {
      id,
      interval,
      mode,
      nextDeadline: this.clock.now() + interval,
      owner,
    });

    logger.debug("Timer armed", { id, interval, mode });
    return { id };
  }

  /**
   * Cancel a timer
   *
   * @returns True if the timer was armed
   */
  cancel(handle: TimerHandle): boolean {
    const removed = this.timers.delete(handle.id);
    if (removed) {
      logger.debug("Timer cancelled", { id: handle.id });
    }
    return removed;
  }

  /**
   * Cancel every timer addressed to a target
   *
   * @returns Number of timers cancelled
   */
  cancelForTarget(target: TargetRef): number {
    let count = 0;
    for (const [id, entry] of this.timers) {
      if (entry.owner.kind === "target" && entry.owner.target.id === target.id) {
        this.timers.delete(id);
        count++;
      }
    }
    return count;
  }

  isArmed(handle: TimerHandle): boolean {
    return this.timers.has(handle.id);
  }

  /**
   * Deadline of an armed timer, or undefined if it is not armed
   */
  deadlineOf(handle: TimerHandle): number | undefined {
    return this.timers.get(handle.id)?.nextDeadline;
  }

  get size(): number {
    return this.timers.size;
  }

  /**
   * Earliest deadline among armed timers, or null if none are armed
   */
  nextDeadline(): number | null {
    let earliest: number | null = null;
    for (const entry of this.timers.values()) {
      if (earliest === null || entry.nextDeadline < earliest) {
        earliest = entry.nextDeadline;
      }
    }
    return earliest;
  }

  /**
   * Collect every timer due at the current time
   *
   * Each due timer yields exactly one expiry. One-shot timers are removed;
   * repeating timers advance by whole intervals until their deadline lies
   * after now. Expirations are ordered by deadline, ties in arm order.
   */
  collectDue(): TimerExpiry[] {
    const now = this.clock.now();
    const due: TimerExpiry[] = [];

    for (const entry of this.timers.values()) {
      if (entry.nextDeadline > now) {
        continue;
      }

      const deadline = entry.nextDeadline;
      let missed = 0;

      if (entry.mode === "oneshot") {
        this.timers.delete(entry.id);
      } else if (entry.interval === 0) {
        entry.nextDeadline = now;
      } else {
        const elapsed = Math.floor((now - deadline) / entry.interval) + 1;
        missed = elapsed - 1;
        entry.nextDeadline = deadline + elapsed * entry.interval;
      }

      due.push({ timerId: entry.id, owner: entry.owner, deadline, missed });
    }

    // Map iteration is arm order and sort is stable
    due.sort((a, b) => a.deadline - b.deadline);
    return due;
  }

  /**
   * Cancel every timer
   */
  clear(): void {
    this.timers.clear();
  }
}
