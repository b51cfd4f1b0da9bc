/**
 * Event types for the slotloop dispatch runtime
 *
 * This module defines the values that flow through the loop: events,
 * target references, handlers, interceptors and signal slots.
 */

/**
 * Numeric event kind, allocated by an EventTypeRegistry
 */
export type EventTypeId = number;

/**
 * Stable identity of an addressable target
 *
 * Holding a TargetRef does not keep the target alive; the loop checks
 * that the target still exists when an event is delivered.
 */
export interface TargetRef {
  /** Unique id within the owning loop */
  readonly id: number;
  /** Debug name, used in logs and by the event spy */
  readonly name: string;
}

/**
 * Immutable unit of work addressed to a target
 */
export interface LoopEvent<P = unknown> {
  /** Event kind */
  readonly type: EventTypeId;
  /** Opaque payload supplied by the poster */
  readonly payload: P;
  /** Addressed target */
  readonly target: TargetRef;
  /** Post order, unique within a loop */
  readonly sequence: number;
}

/**
 * Capability of handling events delivered by the loop
 *
 * `handle` returns true when the event was handled. False is informational
 * only and never re-routes the event.
 */
export interface EventHandler {
  handle(event: LoopEvent): boolean;
}

/**
 * Plain function form of an EventHandler
 */
export type EventHandlerFn = (event: LoopEvent) => boolean;

/**
 * Verdict of an interceptor
 */
export type FilterResult = "consumed" | "pass";

/**
 * Interceptor installed in the filter chain
 *
 * @param event - Event about to be delivered (read only)
 * @param watched - Scope the interceptor was installed on
 */
export type Interceptor = (
  event: LoopEvent,
  watched: TargetRef,
) => FilterResult;

/**
 * Timer firing mode
 */
export type TimerMode = "oneshot" | "repeating";

/**
 * Callback run on the loop when a callback timer or deferred call comes due
 */
export type LoopCallback = () => void;

/**
 * Payload of a timer-expiry event
 */
export interface TimerPayload {
  /** Id of the timer that fired */
  timerId: number;
  /** Callback for timers armed with a function instead of a target */
  callback?: LoopCallback;
}

/**
 * Payload of a deferred-call event
 */
export interface DeferredCallPayload {
  callback: LoopCallback;
}

/**
 * Observer connected to a signal
 */
export type Slot = (...args: unknown[]) => void;
