/**
 * Errors raised by the dispatch runtime
 *
 * Anything detectable at a call boundary (post, arm, connect, install) is
 * thrown synchronously by that call. Faults that only appear during
 * delivery surface from run() as a HandlerFaultError.
 */

import type { LoopEvent, TargetRef } from "../types/events.js";

/**
 * Error codes carried by every LoopError
 */
export type LoopErrorCode =
  | "TARGET_VANISHED"
  | "UNKNOWN_EVENT_TYPE"
  | "HANDLER_FAULT"
  | "TIMER_ARM"
  | "LOOP_STATE";

/**
 * Base class for runtime errors
 */
export class LoopError extends Error {
  constructor(
    message: string,
    public readonly code: LoopErrorCode,
    public cause?: unknown,
  ) {
    super(message);
    this.name = "LoopError";
  }
}

/**
 * A target was destroyed before it could be used
 */
export class TargetVanishedError extends LoopError {
  constructor(public readonly target: TargetRef) {
    super(
      `Target "${target.name}" (#${target.id}) no longer exists`,
      "TARGET_VANISHED",
    );
    this.name = "TargetVanishedError";
  }
}

/**
 * An event was posted with a type id no registry handed out
 */
export class UnknownEventTypeError extends LoopError {
  constructor(public readonly eventType: number) {
    super(`Event type ${eventType} is not registered`, "UNKNOWN_EVENT_TYPE");
    this.name = "UnknownEventTypeError";
  }
}

/**
 * A handler, slot, interceptor or callback threw while the loop ran it
 *
 * The loop that raised it is stopped. Events delivered before the fault
 * are not rolled back. `event` is the event being delivered; it is absent
 * for faults raised by `aboutToQuit` slots. `cause` is whatever was thrown.
 */
export class HandlerFaultError extends LoopError {
  constructor(
    cause: unknown,
    public readonly event?: LoopEvent,
    origin?: string,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const where = event
      ? `Handler for "${event.target.name}" failed on event type ${event.type}`
      : `${origin ?? "Loop callback"} failed`;
    super(`${where}: ${reason}`, "HANDLER_FAULT", cause);
    this.name = "HandlerFaultError";
  }
}

/**
 * A timer could not be armed
 */
export class TimerArmError extends LoopError {
  constructor(message: string) {
    super(message, "TIMER_ARM");
    this.name = "TimerArmError";
  }
}

/**
 * An operation is not allowed in the loop's current state
 */
export class LoopStateError extends LoopError {
  constructor(message: string) {
    super(message, "LOOP_STATE");
    this.name = "LoopStateError";
  }
}
