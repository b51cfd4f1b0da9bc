/**
 * Timer object
 *
 * A target that owns one loop timer and turns its Timer events into a
 * `timeout` signal, so any number of slots can react to it.
 */

import type { LoopEvent, Slot, TargetRef } from "../types/events.js";
import type { Connection } from "./signal-bus.js";
import type { TimerHandle } from "./timer-registry.js";
import { BuiltinEventType } from "./event-types.js";
import { baseHandler, type EventLoop } from "./event-loop.js";

/**
 * Signal emitted on every expiry
 */
export const TIMEOUT = "timeout";

/**
 * Options for creating a Timer
 */
export interface TimerOptions {
  name?: string;
  parent?: TargetRef;
  /** Fire once per start() instead of repeating */
  singleShot?: boolean;
  /** Interval used by start() when none is given */
  interval?: number;
}

/**
 * Timer class
 *
 * @example
 * ```ts
 * const ticker = new Timer(loop, { name: 'ticker' });
 * ticker.onTimeout(() => console.log('tick'));
 * ticker.start(250);
 * ```
 */
export class Timer {
  readonly ref: TargetRef;
  private handle: TimerHandle | null = null;
  private interval: number;
  private singleShot: boolean;

  constructor(
    private loop: EventLoop,
    options: TimerOptions = {},
  ) {
    this.interval = options.interval ?? 0;
    this.singleShot = options.singleShot ?? false;
    this.ref = loop.register(
      { handle: (event) => this.handleEvent(event) },
      { name: options.name ?? "timer", parent: options.parent },
    );
  }

  /**
   * Start, or restart, the timer
   *
   * @param interval - Milliseconds; defaults to the last interval used
   */
  start(interval: number = this.interval): void {
    this.stop();
    this.interval = interval;
    this.handle = this.loop.arm(
      interval,
      this.singleShot ? "oneshot" : "repeating",
      this.ref,
    );
  }

  stop(): void {
    if (this.handle) {
      this.loop.cancel(this.handle);
      this.handle = null;
    }
  }

  get isActive(): boolean {
    return this.handle !== null && this.loop.isTimerArmed(this.handle);
  }

  get currentInterval(): number {
    return this.interval;
  }

  /**
   * Connect a slot to the timeout signal
   */
  onTimeout(slot: Slot, observer?: TargetRef): Connection {
    return this.loop.connect(this.ref, TIMEOUT, slot, observer);
  }

  /**
   * Stop the timer and remove its target from the loop
   */
  destroy(): void {
    this.stop();
    this.loop.destroy(this.ref);
  }

  private handleEvent(event: LoopEvent): boolean {
    if (event.type !== BuiltinEventType.Timer || !this.isOwnExpiry(event)) {
      return baseHandler.handle(event);
    }
    this.loop.emit(this.ref, TIMEOUT);
    return true;
  }

  private isOwnExpiry(event: LoopEvent): boolean {
    const payload = event.payload;
    return (
      this.handle !== null &&
      typeof payload === "object" &&
      payload !== null &&
      "timerId" in payload &&
      payload.timerId === this.handle.id
    );
  }
}
