/**
 * Event spy
 *
 * An interceptor that logs the events it sees and always lets them pass.
 */

import type winston from "winston";
import type { EventTypeId, Interceptor, LoopEvent } from "../types/events.js";
import { eventTypeName } from "./event-types.js";
import { createContextLogger } from "../utils/logger.js";

/**
 * Options for createEventSpy
 */
export interface EventSpyOptions {
  /** Logger to write to (default: 'EventSpy' context logger at debug) */
  logger?: winston.Logger;
  /** Level used for each line (default: 'debug') */
  level?: string;
  /** Only log events of these types */
  types?: readonly EventTypeId[];
  /** Resolve type ids to names (default: process-wide registry) */
  nameOf?: (type: EventTypeId) => string;
  /** Called with every line instead of the logger */
  sink?: (line: string, event: LoopEvent) => void;
}

/**
 * Create an event spy
 *
 * @example
 * ```ts
 * loop.install(loop.application, createEventSpy({ types: [BuiltinEventType.Timer] }));
 * // [EventSpy]: Event=Timer, Target=ticker
 * ```
 */
export function createEventSpy(options: EventSpyOptions = {}): Interceptor {
  const log = options.logger ?? createContextLogger("EventSpy");
  const level = options.level ?? "debug";
  const nameOf = options.nameOf ?? eventTypeName;
  const types = options.types ? new Set(options.types) : null;

  return (event) => {
    if (types && !types.has(event.type)) {
      return "pass";
    }

    const line = `Event=${nameOf(event.type)}, Target=${event.target.name}`;
    if (options.sink) {
      options.sink(line, event);
    } else {
      log.log(level, line);
    }
    return "pass";
  };
}
