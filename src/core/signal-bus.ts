/**
 * Signal Bus
 *
 * Synchronous observer notification keyed by (emitter, signal). Slots run
 * on the caller's stack, in connection order, before emit() returns.
 */

import type { Slot, TargetRef } from "../types/events.js";
import { createContextLogger } from "../utils/logger.js";

const logger = createContextLogger("SignalBus");

/**
 * Handle returned by connect()
 */
export interface Connection {
  readonly id: number;
  readonly emitter: TargetRef;
  readonly signal: string;
}

interface ConnectionRecord {
  id: number;
  emitter: TargetRef;
  signal: string;
  slot: Slot;
  observer: TargetRef | undefined;
  connected: boolean;
}

/**
 * SignalBus class
 *
 * Each emission works on a snapshot of the connections present when it
 * started: slots connected during the emission are not called by it, and
 * slots disconnected during it are skipped if not yet reached. Emissions
 * may nest to any depth.
 *
 * @example
 * ```ts
 * const bus = new SignalBus();
 * const conn = bus.connect(worker, 'finished', () => loop.requestQuit(0));
 * bus.emit(worker, 'finished');
 * bus.disconnect(conn);
 * ```
 */
export class SignalBus {
  private table = new Map<string, ConnectionRecord[]>();
  private byId = new Map<number, ConnectionRecord>();
  private nextId = 1;

  /**
   * Connect a slot to a signal
   *
   * @param emitter - Target that emits the signal
   * @param signal - Signal name
   * @param slot - Function invoked on emission
   * @param observer - Optional target owning the slot; destroying it disconnects the slot
   */
  connect(
    emitter: TargetRef,
    signal: string,
    slot: Slot,
    observer?: TargetRef,
  ): Connection {
    const record: ConnectionRecord = {
      id: this.nextId++,
      emitter,
      signal,
      slot,
      observer,
      connected: true,
    };

    const key = this.keyOf(emitter, signal);
    const list = this.table.get(key) ?? [];
    // Copy on write: running emissions iterate the old array
    this.table.set(key, [...list, record]);
    this.byId.set(record.id, record);

    logger.debug("Slot connected", {
      emitter: emitter.name,
      signal,
      connection: record.id,
    });
    return { id: record.id, emitter, signal };
  }

  /**
   * Disconnect a slot
   *
   * @returns True if the connection was still active
   */
  disconnect(connection: Connection): boolean {
    const record = this.byId.get(connection.id);
    if (!record) {
      return false;
    }
    this.remove(record);
    return true;
  }

  /**
   * Disconnect every connection where the target is emitter or observer
   *
   * @returns Number of connections removed
   */
  disconnectTarget(target: TargetRef): number {
    let count = 0;
    for (const record of [...this.byId.values()]) {
      if (record.emitter.id === target.id || record.observer?.id === target.id) {
        this.remove(record);
        count++;
      }
    }
    return count;
  }

  isConnected(connection: Connection): boolean {
    return this.byId.has(connection.id);
  }

  /**
   * Number of slots currently connected to a signal
   */
  receivers(emitter: TargetRef, signal: string): number {
    return this.table.get(this.keyOf(emitter, signal))?.length ?? 0;
  }

  /**
   * Emit a signal
   *
   * Errors thrown by a slot propagate to the caller; the remaining slots
   * of this emission are not invoked.
   *
   * @returns Number of slots invoked
   */
  emit(emitter: TargetRef, signal: string, ...args: unknown[]): number {
    const snapshot = this.table.get(this.keyOf(emitter, signal));
    if (!snapshot) {
      return 0;
    }

    let invoked = 0;
    for (const record of snapshot) {
      if (!record.connected) {
        continue;
      }
      record.slot(...args);
      invoked++;
    }
    return invoked;
  }

  private remove(record: ConnectionRecord): void {
    record.connected = false;
    this.byId.delete(record.id);

    const key = this.keyOf(record.emitter, record.signal);
    const remaining = (this.table.get(key) ?? []).filter(
      (entry) => entry.id !== record.id,
    );
    if (remaining.length === 0) {
      this.table.delete(key);
    } else {
      this.table.set(key, remaining);
    }

    logger.debug("Slot disconnected", {
      emitter: record.emitter.name,
      signal: record.signal,
      connection: record.id,
    });
  }

  private keyOf(emitter: TargetRef, signal: string): string {
    return `${emitter.id}:${signal}`;
  }
}
