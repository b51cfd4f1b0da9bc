/**
 * Event Loop
 *
 * Single-threaded driver that merges due timers into the queue, pops one
 * event per iteration, runs it through the filter chain and delivers it to
 * its target. Quit requests are cooperative: they are honored between
 * iterations, never inside a running handler.
 *
 * The loop works in passes. A pass starts once the events of the previous
 * pass are exhausted: due timer expirations are placed at the head of the
 * queue and the pass covers every event present at that moment. Events
 * posted during a pass are delivered in the next one.
 */

import { setImmediate as yieldToHost } from "timers/promises";
import type {
  DeferredCallPayload,
  EventHandler,
  EventHandlerFn,
  EventTypeId,
  Interceptor,
  LoopCallback,
  LoopEvent,
  Slot,
  TargetRef,
  TimerMode,
  TimerPayload,
} from "../types/events.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { createContextLogger } from "../utils/logger.js";
import {
  BuiltinEventType,
  defaultEventTypeRegistry,
  type EventTypeRegistry,
} from "./event-types.js";
import { EventQueue } from "./event-queue.js";
import {
  TimerRegistry,
  type TimerExpiry,
  type TimerHandle,
  type TimerOwner,
} from "./timer-registry.js";
import { FilterChain, type FilterHandle } from "./filter-chain.js";
import { SignalBus, type Connection } from "./signal-bus.js";
import { TimeoutWakeSource, type WakeSource } from "./wake-source.js";
import {
  HandlerFaultError,
  LoopStateError,
  TargetVanishedError,
  UnknownEventTypeError,
} from "./errors.js";

const logger = createContextLogger("EventLoop");

/**
 * Signal emitted on the application target right before run() returns
 */
export const ABOUT_TO_QUIT = "aboutToQuit";

/**
 * Default number of deliveries between yields to the host
 */
export const DEFAULT_YIELD_EVERY = 64;

/**
 * Lifecycle of a loop
 */
export type LoopState = "idle" | "running" | "quit-pending" | "stopped";

/**
 * Handler that handles nothing; hosts delegate to it for unknown kinds
 */
export const baseHandler: EventHandler = {
  handle: () => false,
};

/**
 * Options for constructing an EventLoop
 */
export interface EventLoopOptions {
  /** Time source for timers (default: performance.now) */
  clock?: Clock;
  /** What the loop waits on when idle (default: TimeoutWakeSource) */
  wakeSource?: WakeSource;
  /** Registry that validates posted event types (default: process-wide) */
  eventTypes?: EventTypeRegistry;
  /** Deliveries between yields to the host inside run() */
  yieldEvery?: number;
  /** Name of the application target */
  name?: string;
}

/**
 * Options for registering a target
 */
export interface RegisterOptions {
  name?: string;
  /** Parent target; its filters see this target's events, destroying it destroys this one */
  parent?: TargetRef;
}

interface TargetEntry {
  ref: TargetRef;
  handler: EventHandler;
  parent: TargetRef | undefined;
  children: Set<number>;
}

function hasCallback(payload: unknown): payload is { callback: LoopCallback } {
  return (
    typeof payload === "object" &&
    payload !== null &&
    "callback" in payload &&
    typeof payload.callback === "function"
  );
}

function isExpiryOf(payload: unknown, timerId: number): boolean {
  return (
    typeof payload === "object" &&
    payload !== null &&
    "timerId" in payload &&
    payload.timerId === timerId
  );
}

/**
 * EventLoop class
 *
 * Owns the queue, timer registry, filter chain and connection table. All
 * operations are safe to call from inside a running handler.
 *
 * @example
 * ```ts
 * const loop = new EventLoop();
 * const Greeting = registerEventType('greeting');
 *
 * const receiver = loop.register((event) => {
 *   if (event.type !== Greeting) return false;
 *   console.log(event.payload);
 *   loop.requestQuit(0);
 *   return true;
 * }, { name: 'receiver' });
 *
 * loop.post(receiver, Greeting, 'hello');
 * const exitCode = await loop.run();
 * ```
 */
export class EventLoop {
  /** Root target; owns callback timers and deferred calls */
  readonly application: TargetRef;

  private targets = new Map<number, TargetEntry>();
  private queue = new EventQueue();
  private timers: TimerRegistry;
  private filters = new FilterChain();
  private signals = new SignalBus();
  private clock: Clock;
  private wakeSource: WakeSource;
  private eventTypes: EventTypeRegistry;
  private yieldEvery: number;

  private state: LoopState = "idle";
  private quitRequested = false;
  private code = 0;
  private passRemaining = 0;
  private nextTargetId = 1;
  private nextSequence = 1;

  constructor(options: EventLoopOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.wakeSource = options.wakeSource ?? new TimeoutWakeSource();
    this.eventTypes = options.eventTypes ?? defaultEventTypeRegistry;
    this.yieldEvery = Math.max(1, options.yieldEvery ?? DEFAULT_YIELD_EVERY);
    this.timers = new TimerRegistry(this.clock);
    this.application = this.register(
      { handle: (event) => this.handleApplicationEvent(event) },
      { name: options.name ?? "application" },
    );
  }

  /**
   * Bound slot requesting quit with exit code 0
   *
   * @example
   * ```ts
   * loop.connect(worker, 'finished', loop.quit);
   * ```
   */
  readonly quit: Slot = () => {
    this.requestQuit(0);
  };

  // ---------------------------------------------------------------------------
  // Targets
  // ---------------------------------------------------------------------------

  /**
   * Register an addressable target
   *
   * @param handler - EventHandler or plain handler function
   * @param options - Debug name and optional parent
   * @throws {TargetVanishedError} If the parent no longer exists
   */
  register(
    handler: EventHandler | EventHandlerFn,
    options: RegisterOptions = {},
  ): TargetRef {
    const parentEntry = options.parent
      ? this.requireTarget(options.parent)
      : undefined;

    const id = this.nextTargetId++;
    const ref: TargetRef = Object.freeze({
      id,
      name: options.name ?? `target-${id}`,
    });

    this.targets.set(id, {
      ref,
      handler: typeof handler === "function" ? { handle: handler } : handler,
      parent: parentEntry?.ref,
      children: new Set(),
    });
    parentEntry?.children.add(id);

    return ref;
  }

  /**
   * Destroy a target and its children
   *
   * Disconnects every connection it takes part in, cancels timers addressed
   * to it and removes interceptors scoped to it. Events already queued for
   * it are dropped at delivery.
   *
   * @returns True if the target existed
   * @throws {LoopStateError} If asked to destroy the application target
   */
  destroy(target: TargetRef): boolean {
    if (target.id === this.application.id) {
      throw new LoopStateError("The application target cannot be destroyed");
    }

    const entry = this.targets.get(target.id);
    if (!entry) {
      return false;
    }

    for (const childId of [...entry.children]) {
      const child = this.targets.get(childId);
      if (child) {
        this.destroy(child.ref);
      }
    }

    if (entry.parent) {
      this.targets.get(entry.parent.id)?.children.delete(target.id);
    }

    this.targets.delete(target.id);
    const connections = this.signals.disconnectTarget(target);
    const timers = this.timers.cancelForTarget(target);
    const filters = this.filters.uninstallScope(target);

    logger.debug("Target destroyed", {
      target: target.name,
      connections,
      timers,
      filters,
    });
    return true;
  }

  isAlive(target: TargetRef): boolean {
    return this.targets.has(target.id);
  }

  /**
   * Parent of a live target, if it has one
   */
  parentOf(target: TargetRef): TargetRef | undefined {
    return this.targets.get(target.id)?.parent;
  }

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  /**
   * Append an event to the queue
   *
   * Never delivers synchronously. Posting to a target that is destroyed
   * before delivery is allowed; the event is then dropped.
   *
   * @throws {UnknownEventTypeError} If the type was never registered
   */
  post<P>(target: TargetRef, type: EventTypeId, payload?: P): void {
    if (!this.eventTypes.isRegistered(type)) {
      throw new UnknownEventTypeError(type);
    }
    this.queue.post(this.createEvent(type, payload, target));
    this.wakeSource.wake();
  }

  /**
   * Queue a callback to run on the loop
   */
  invokeLater(callback: LoopCallback): void {
    const payload: DeferredCallPayload = { callback };
    this.post(this.application, BuiltinEventType.DeferredCall, payload);
  }

  /**
   * Number of events waiting in the queue
   */
  get pendingEvents(): number {
    return this.queue.size;
  }

  // ---------------------------------------------------------------------------
  // Timers
  // ---------------------------------------------------------------------------

  /**
   * Arm a timer
   *
   * Expirations are delivered as Timer events: to the target, or to the
   * application target which runs the callback.
   *
   * @param interval - Milliseconds (0 = as soon as the loop gets to it)
   * @param mode - 'oneshot' or 'repeating'
   * @param target - Target receiving Timer events, or a callback
   * @throws {TimerArmError} If the interval is invalid
   * @throws {TargetVanishedError} If the target no longer exists
   */
  arm(
    interval: number,
    mode: TimerMode,
    target: TargetRef | LoopCallback,
  ): TimerHandle {
    let owner: TimerOwner;
    if (typeof target === "function") {
      owner = { kind: "callback", callback: target };
    } else {
      this.requireTarget(target);
      owner = { kind: "target", target };
    }

    const handle = this.timers.arm(interval, mode, owner);
    this.wakeSource.wake();
    return handle;
  }

  /**
   * Run a callback once after a delay
   *
   * @example
   * ```ts
   * loop.singleShot(0, () => startup()); // runs once the loop is running
   * ```
   */
  singleShot(interval: number, callback: LoopCallback): TimerHandle {
    return this.arm(interval, "oneshot", callback);
  }

  /**
   * Cancel a timer
   *
   * An expiry already merged into the queue is removed with it, so the
   * target or callback never sees the timer again.
   *
   * @returns True if the timer was armed or had an expiry pending
   */
  cancel(handle: TimerHandle): boolean {
    const armed = this.timers.cancel(handle);
    const dropped = this.dropQueuedExpiries(handle.id);
    return armed || dropped > 0;
  }

  isTimerArmed(handle: TimerHandle): boolean {
    return this.timers.isArmed(handle);
  }

  /**
   * Deadline of an armed timer on the loop's clock
   */
  timerDeadline(handle: TimerHandle): number | undefined {
    return this.timers.deadlineOf(handle);
  }

  // ---------------------------------------------------------------------------
  // Filters
  // ---------------------------------------------------------------------------

  /**
   * Install an interceptor on a scope
   *
   * @param scope - Target whose events (and descendants' events) are watched;
   *   `loop.application` watches everything
   * @throws {TargetVanishedError} If the scope no longer exists
   */
  install(scope: TargetRef, interceptor: Interceptor): FilterHandle {
    this.requireTarget(scope);
    return this.filters.install(scope, interceptor);
  }

  uninstall(handle: FilterHandle): boolean {
    return this.filters.uninstall(handle);
  }

  // ---------------------------------------------------------------------------
  // Signals
  // ---------------------------------------------------------------------------

  /**
   * Connect a slot to a signal of an emitter
   *
   * @param observer - Optional owner of the slot; destroying it disconnects
   * @throws {TargetVanishedError} If emitter or observer no longer exists
   */
  connect(
    emitter: TargetRef,
    signal: string,
    slot: Slot,
    observer?: TargetRef,
  ): Connection {
    this.requireTarget(emitter);
    if (observer) {
      this.requireTarget(observer);
    }
    return this.signals.connect(emitter, signal, slot, observer);
  }

  disconnect(connection: Connection): boolean {
    return this.signals.disconnect(connection);
  }

  /**
   * Emit a signal; connected slots run before this returns
   *
   * @returns Number of slots invoked
   */
  emit(emitter: TargetRef, signal: string, ...args: unknown[]): number {
    return this.signals.emit(emitter, signal, ...args);
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Ask the loop to stop at the next iteration boundary
   *
   * Returns normally; the calling handler and every emission it is part of
   * finish before the loop stops.
   *
   * @param code - Exit code returned by run()
   */
  requestQuit(code: number = 0): void {
    this.quitRequested = true;
    this.code = code;
    if (this.state === "running") {
      this.state = "quit-pending";
    }
    this.wakeSource.wake();
  }

  get isQuitRequested(): boolean {
    return this.quitRequested;
  }

  getState(): LoopState {
    return this.state;
  }

  /**
   * Exit code of the last honored quit request
   */
  get exitCode(): number {
    return this.code;
  }

  /**
   * Run until a quit request is honored
   *
   * @returns Exit code passed to requestQuit()
   * @throws {LoopStateError} If the loop is already running
   * @throws {HandlerFaultError} If delivery or an aboutToQuit slot throws;
   *   the loop is stopped
   */
  async run(): Promise<number> {
    this.begin();
    logger.info("Event loop started", { application: this.application.name });

    let sinceYield = 0;
    while (!this.quitRequested) {
      if (this.step()) {
        if (++sinceYield >= this.yieldEvery) {
          sinceYield = 0;
          await yieldToHost();
        }
        continue;
      }

      sinceYield = 0;
      await this.wakeSource.wait(this.timeUntilNextTimer());
    }

    return this.finish();
  }

  /**
   * Deliver everything available right now without waiting
   *
   * Cooperative counterpart of run(): stops when no event is queued and no
   * timer is due, or when a quit request is honored (the loop is then
   * stopped, as after run()).
   *
   * @returns Number of events taken off the queue: delivered, consumed by
   *   an interceptor, or dropped because their target vanished
   * @throws {LoopStateError} If the loop is already running
   * @throws {HandlerFaultError} If delivery or an aboutToQuit slot throws;
   *   the loop is stopped
   */
  processEvents(): number {
    this.begin();

    let processed = 0;
    while (!this.quitRequested && this.step()) {
      processed++;
    }

    if (this.quitRequested) {
      this.finish();
    } else {
      this.state = "idle";
    }
    return processed;
  }

  private begin(): void {
    if (this.state === "running" || this.state === "quit-pending") {
      throw new LoopStateError("Event loop is already running");
    }
    this.quitRequested = false;
    this.code = 0;
    this.passRemaining = 0;
    this.state = "running";
  }

  private finish(): number {
    try {
      this.signals.emit(this.application, ABOUT_TO_QUIT);
    } catch (error) {
      this.fail(error, undefined, `Slot connected to "${ABOUT_TO_QUIT}"`);
    } finally {
      this.state = "stopped";
      this.passRemaining = 0;
    }
    logger.info("Event loop stopped", { exitCode: this.code });
    return this.code;
  }

  /**
   * One iteration
   *
   * @returns False if there was nothing to deliver
   */
  private step(): boolean {
    if (this.passRemaining === 0) {
      this.mergeDueTimers();
      this.passRemaining = this.queue.size;
    }

    const event = this.queue.popNext();
    if (!event) {
      this.passRemaining = 0;
      return false;
    }
    this.passRemaining--;

    try {
      this.deliver(event);
    } catch (error) {
      this.fail(error, event);
    }
    return true;
  }

  /**
   * Stop the loop and raise a HandlerFaultError
   */
  private fail(error: unknown, event?: LoopEvent, origin?: string): never {
    this.state = "stopped";
    this.passRemaining = 0;
    logger.error("Handler fault, stopping event loop", {
      target: event?.target.name,
      type: event ? this.eventTypes.nameOf(event.type) : undefined,
      origin,
      error: error instanceof Error ? error.message : String(error),
    });
    throw new HandlerFaultError(error, event, origin);
  }

  private deliver(event: LoopEvent): void {
    const entry = this.targets.get(event.target.id);
    if (!entry) {
      this.dropVanished(event);
      return;
    }

    if (this.filters.run(event, this.pathOf(entry)) === "consumed") {
      return;
    }

    // An interceptor may have destroyed the target
    if (!this.targets.has(event.target.id)) {
      this.dropVanished(event);
      return;
    }

    entry.handler.handle(event);
  }

  private dropVanished(event: LoopEvent): void {
    logger.warn("Dropping event for vanished target", {
      target: event.target.name,
      type: this.eventTypes.nameOf(event.type),
    });
  }

  private dropQueuedExpiries(timerId: number): number {
    const positions = this.queue.removeWhere(
      (event) =>
        event.type === BuiltinEventType.Timer &&
        isExpiryOf(event.payload, timerId),
    );
    // Removed events that belonged to the current pass shorten it
    this.passRemaining -= positions.filter(
      (position) => position < this.passRemaining,
    ).length;
    return positions.length;
  }

  private mergeDueTimers(): void {
    const due = this.timers.collectDue();
    if (due.length === 0) {
      return;
    }
    this.queue.pushFront(due.map((expiry) => this.expiryEvent(expiry)));
  }

  private expiryEvent(expiry: TimerExpiry): LoopEvent {
    if (expiry.owner.kind === "target") {
      const payload: TimerPayload = { timerId: expiry.timerId };
      return this.createEvent(BuiltinEventType.Timer, payload, expiry.owner.target);
    }
    const payload: TimerPayload = {
      timerId: expiry.timerId,
      callback: expiry.owner.callback,
    };
    return this.createEvent(BuiltinEventType.Timer, payload, this.application);
  }

  private handleApplicationEvent(event: LoopEvent): boolean {
    if (
      (event.type === BuiltinEventType.DeferredCall ||
        event.type === BuiltinEventType.Timer) &&
      hasCallback(event.payload)
    ) {
      event.payload.callback();
      return true;
    }
    return baseHandler.handle(event);
  }

  private timeUntilNextTimer(): number | null {
    const deadline = this.timers.nextDeadline();
    if (deadline === null) {
      return null;
    }
    return Math.max(0, deadline - this.clock.now());
  }

  private pathOf(entry: TargetEntry): TargetRef[] {
    const path: TargetRef[] = [entry.ref];
    let parent = entry.parent;
    while (parent) {
      path.push(parent);
      parent = this.targets.get(parent.id)?.parent;
    }
    if (entry.ref.id !== this.application.id) {
      path.push(this.application);
    }
    return path;
  }

  private requireTarget(target: TargetRef): TargetEntry {
    const entry = this.targets.get(target.id);
    if (!entry) {
      throw new TargetVanishedError(target);
    }
    return entry;
  }

  private createEvent<P>(
    type: EventTypeId,
    payload: P,
    target: TargetRef,
  ): LoopEvent<P> {
    return Object.freeze({
      type,
      payload,
      target,
      sequence: this.nextSequence++,
    });
  }
}
