import type { Demo } from "./types.js";
import { customEventDemo } from "./custom-event.js";
import { signalsAndQuitDemo } from "./signals-and-quit.js";
import { timersDemo } from "./timers.js";
import { blockedLoopDemo } from "./blocked-loop.js";

export type { Demo, DemoContext } from "./types.js";

/**
 * Every demo the CLI can run, in listing order
 */
export const demos: readonly Demo[] = [
  customEventDemo,
  signalsAndQuitDemo,
  timersDemo,
  blockedLoopDemo,
];

export function findDemo(name: string): Demo | undefined {
  return demos.find((demo) => demo.name === name);
}
