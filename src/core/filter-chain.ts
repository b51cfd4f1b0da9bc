/**
 * Filter Chain
 *
 * Ordered interceptors that see events before their target does. An
 * interceptor is installed on a scope and sees every event whose path
 * (target, its ancestors, the application) contains that scope.
 */

import type {
  FilterResult,
  Interceptor,
  LoopEvent,
  TargetRef,
} from "../types/events.js";
import { createContextLogger } from "../utils/logger.js";

const logger = createContextLogger("FilterChain");

/**
 * Handle returned by install()
 */
export interface FilterHandle {
  readonly id: number;
}

/**
 * Installed interceptor
 */
export interface FilterEntry {
  readonly watchedScope: TargetRef;
  readonly interceptor: Interceptor;
  readonly installOrder: number;
}

/**
 * FilterChain class
 *
 * @example
 * ```ts
 * const chain = new FilterChain();
 * chain.install(loop.application, (event) =>
 *   event.type === Noise ? 'consumed' : 'pass',
 * );
 * chain.run(event, [target, loop.application]); // 'consumed' | 'pass'
 * ```
 */
export class FilterChain {
  private entries: FilterEntry[] = [];
  private nextOrder = 1;

  /**
   * Append an interceptor for a scope
   */
  install(scope: TargetRef, interceptor: Interceptor): FilterHandle {
    const entry: FilterEntry = {
      watchedScope: scope,
      interceptor,
      installOrder: this.nextOrder++,
    };
    // Copy on write so a running chain keeps its own view
    this.entries = [...this.entries, entry];
    logger.debug("Interceptor installed", {
      scope: scope.name,
      order: entry.installOrder,
    });
    return { id: entry.installOrder };
  }

  /**
   * Remove an interceptor
   *
   * @returns True if it was installed
   */
  uninstall(handle: FilterHandle): boolean {
    const before = this.entries.length;
    this.entries = this.entries.filter(
      (entry) => entry.installOrder !== handle.id,
    );
    return this.entries.length !== before;
  }

  /**
   * Remove every interceptor installed on a scope
   *
   * @returns Number of interceptors removed
   */
  uninstallScope(scope: TargetRef): number {
    const before = this.entries.length;
    this.entries = this.entries.filter(
      (entry) => entry.watchedScope.id !== scope.id,
    );
    return before - this.entries.length;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Run the chain for an event
   *
   * Interceptors whose scope lies on `path` run in install order. The first
   * 'consumed' verdict stops the chain. Changes made to the chain while it
   * runs apply from the next event on.
   *
   * @param event - Event about to be delivered
   * @param path - Target followed by its ancestors
   */
  run(event: LoopEvent, path: readonly TargetRef[]): FilterResult {
    const scopes = new Set(path.map((ref) => ref.id));
    const snapshot = this.entries;

    for (const entry of snapshot) {
      if (!scopes.has(entry.watchedScope.id)) {
        continue;
      }
      if (entry.interceptor(event, entry.watchedScope) === "consumed") {
        logger.debug("Event consumed by interceptor", {
          type: event.type,
          target: event.target.name,
          order: entry.installOrder,
        });
        return "consumed";
      }
    }

    return "pass";
  }
}
