/**
 * Event type registry
 *
 * Hands out unique event type ids so that user-defined kinds never collide
 * with the built-in ones. Ids are allocated monotonically and never reused.
 */

import type { EventTypeId } from "../types/events.js";

/**
 * Kinds the runtime itself posts
 */
export const BuiltinEventType = {
  /** Timer expiry */
  Timer: 1,
  /** Callback queued with invokeLater */
  DeferredCall: 2,
} as const;

/**
 * First id handed out to user-defined kinds
 */
export const FIRST_USER_EVENT_TYPE = 1000;

/**
 * EventTypeRegistry class
 *
 * @example
 * ```ts
 * const registry = new EventTypeRegistry();
 * const Greeting = registry.register('greeting'); // 1000
 * registry.isRegistered(Greeting); // true
 * registry.nameOf(Greeting); // 'greeting'
 * ```
 */
export class EventTypeRegistry {
  private names = new Map<EventTypeId, string>([
    [BuiltinEventType.Timer, "Timer"],
    [BuiltinEventType.DeferredCall, "DeferredCall"],
  ]);
  private nextId = FIRST_USER_EVENT_TYPE;

  /**
   * Allocate a new event type id
   *
   * @param name - Optional debug name (defaults to `User<id>`)
   */
  register(name?: string): EventTypeId {
    const id = this.nextId++;
    this.names.set(id, name ?? `User${id}`);
    return id;
  }

  isRegistered(id: EventTypeId): boolean {
    return this.names.has(id);
  }

  /**
   * Debug name of a type id, or `Unknown(<id>)` for ids never allocated
   */
  nameOf(id: EventTypeId): string {
    return this.names.get(id) ?? `Unknown(${id})`;
  }
}

/**
 * Process-wide registry used by loops that are not given their own
 */
export const defaultEventTypeRegistry = new EventTypeRegistry();

/**
 * Register a new event kind in the process-wide registry
 *
 * @example
 * ```ts
 * const PayloadReady = registerEventType('payload-ready');
 * loop.post(receiver, PayloadReady, 'hello');
 * ```
 */
export function registerEventType(name?: string): EventTypeId {
  return defaultEventTypeRegistry.register(name);
}

export function isRegisteredEventType(id: EventTypeId): boolean {
  return defaultEventTypeRegistry.isRegistered(id);
}

export function eventTypeName(id: EventTypeId): string {
  return defaultEventTypeRegistry.nameOf(id);
}
