/**
 * Blocked loop demo
 *
 * A handler that blocks the loop stops all delivery. When it returns, a
 * repeating timer that missed several ticks fires once, not once per tick.
 */

import { Timer } from "../core/timer.js";
import { systemClock } from "../utils/clock.js";
import type { Demo } from "./types.js";

/**
 * How long the blocking slot holds the loop
 */
const BLOCK_MS = 1200;

function busyWait(ms: number): void {
  const end = systemClock.now() + ms;
  while (systemClock.now() < end) {
    // spin
  }
}

export const blockedLoopDemo: Demo = {
  name: "blocked-loop",
  description: "Block the loop in a slot and watch a repeating timer catch up once",
  setup({ loop, out, durationMs }) {
    const started = systemClock.now();
    const elapsed = (): string => `${Math.round(systemClock.now() - started)}ms`;

    const ticker = new Timer(loop, { name: "ticker" });
    ticker.onTimeout(() => out(`[${elapsed()}] tick`));
    ticker.start(250);

    loop.singleShot(600, () => {
      out(`[${elapsed()}] entering blocking slot`);
      busyWait(BLOCK_MS);
      out(`[${elapsed()}] leaving blocking slot`);
    });

    loop.singleShot(durationMs ?? 2500, () => loop.requestQuit(0));

    return () => ticker.destroy();
  },
};
