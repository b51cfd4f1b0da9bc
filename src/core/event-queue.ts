/**
 * Event Queue
 *
 * FIFO buffer of pending events across all targets. Posting is a pure
 * append: nothing is delivered from inside `post`.
 */

import type { LoopEvent } from "../types/events.js";

/**
 * Number of consumed slots after which the backing array is compacted
 */
const COMPACT_THRESHOLD = 1024;

/**
 * EventQueue class
 *
 * @example
 * ```ts
 * const queue = new EventQueue();
 * queue.post(event);
 * const next = queue.popNext(); // event, or undefined when empty
 * ```
 */
export class EventQueue {
  private items: LoopEvent[] = [];
  private head = 0;

  /**
   * Append an event at the tail
   */
  post(event: LoopEvent): void {
    this.items.push(event);
  }

  /**
   * Insert events at the head, keeping their relative order
   *
   * Used by the loop to merge timer expirations ahead of posted events.
   */
  pushFront(events: readonly LoopEvent[]): void {
    if (events.length === 0) {
      return;
    }
    this.items = [...events, ...this.items.slice(this.head)];
    this.head = 0;
  }

  /**
   * Remove and return the head, or undefined when the queue is empty
   */
  popNext(): LoopEvent | undefined {
    if (this.head >= this.items.length) {
      return undefined;
    }

    const event = this.items[this.head];
    this.head++;

    if (this.head >= this.items.length) {
      this.items = [];
      this.head = 0;
    } else if (this.head >= COMPACT_THRESHOLD) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return event;
  }

  /**
   * Remove every pending event matching a predicate
   *
   * @returns Queue positions (0 = head) the removed events held
   */
  removeWhere(predicate: (event: LoopEvent) => boolean): number[] {
    const removed: number[] = [];
    const kept: LoopEvent[] = [];

    this.items.slice(this.head).forEach((event, position) => {
      if (predicate(event)) {
        removed.push(position);
      } else {
        kept.push(event);
      }
    });

    if (removed.length > 0) {
      this.items = kept;
      this.head = 0;
    }
    return removed;
  }

  get size(): number {
    return this.items.length - this.head;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  /**
   * Drop every pending event
   */
  clear(): void {
    this.items = [];
    this.head = 0;
  }
}
