/**
 * slotloop
 *
 * Single-threaded event-dispatch runtime: posted events, timers, event
 * filters and synchronous signal/slot notification.
 */

export {
  EventLoop,
  ABOUT_TO_QUIT,
  DEFAULT_YIELD_EVERY,
  baseHandler,
} from "./core/event-loop.js";
export type {
  EventLoopOptions,
  LoopState,
  RegisterOptions,
} from "./core/event-loop.js";
export {
  EventTypeRegistry,
  BuiltinEventType,
  FIRST_USER_EVENT_TYPE,
  defaultEventTypeRegistry,
  registerEventType,
  isRegisteredEventType,
  eventTypeName,
} from "./core/event-types.js";
export { EventQueue } from "./core/event-queue.js";
export { TimerRegistry } from "./core/timer-registry.js";
export type {
  TimerHandle,
  TimerOwner,
  TimerExpiry,
} from "./core/timer-registry.js";
export { FilterChain } from "./core/filter-chain.js";
export type { FilterEntry, FilterHandle } from "./core/filter-chain.js";
export { SignalBus } from "./core/signal-bus.js";
export type { Connection } from "./core/signal-bus.js";
export { Timer, TIMEOUT } from "./core/timer.js";
export type { TimerOptions } from "./core/timer.js";
export { createEventSpy } from "./core/event-spy.js";
export type { EventSpyOptions } from "./core/event-spy.js";
export {
  TimeoutWakeSource,
  MAX_TIMEOUT_MS,
} from "./core/wake-source.js";
export type { WakeSource } from "./core/wake-source.js";
export {
  LoopError,
  TargetVanishedError,
  UnknownEventTypeError,
  HandlerFaultError,
  TimerArmError,
  LoopStateError,
} from "./core/errors.js";
export type { LoopErrorCode } from "./core/errors.js";
export {
  loadConfig,
  validateConfig,
  defaultConfig,
  formatValidationErrors,
  loopOptionsFromConfig,
  createEventLoop,
  ConfigLoadError,
  DEFAULT_CONFIG_FILE,
} from "./config/loader.js";
export type { SlotloopConfig } from "./config/types.js";
export { systemClock } from "./utils/clock.js";
export type { Clock } from "./utils/clock.js";
export {
  createLogger,
  createContextLogger,
  configureLogging,
} from "./utils/logger.js";
export type { LoggerOptions } from "./utils/logger.js";
export type {
  EventTypeId,
  TargetRef,
  LoopEvent,
  EventHandler,
  EventHandlerFn,
  FilterResult,
  Interceptor,
  TimerMode,
  LoopCallback,
  TimerPayload,
  DeferredCallPayload,
  Slot,
} from "./types/events.js";
