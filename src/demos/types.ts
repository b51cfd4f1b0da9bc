/**
 * Demo types
 */

import type { EventLoop } from "../core/event-loop.js";

/**
 * What a demo gets to work with
 */
export interface DemoContext {
  /** Fresh loop; the caller runs it after setup */
  loop: EventLoop;
  /** Line-oriented output */
  out: (line: string) => void;
  /** Quit after this many milliseconds, where the demo would otherwise run forever */
  durationMs?: number;
}

/**
 * A runnable demonstration of the dispatch runtime
 */
export interface Demo {
  name: string;
  description: string;
  /**
   * Wire targets, timers and connections onto the loop
   *
   * @returns Optional cleanup, called after the loop stops
   */
  setup(ctx: DemoContext): (() => void) | void;
}
