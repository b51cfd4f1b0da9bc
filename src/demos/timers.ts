/**
 * Timers demo
 *
 * Two repeating timers with an application-wide spy logging every timer
 * event. Runs until SIGINT, or for `durationMs` when given.
 */

import { BuiltinEventType } from "../core/event-types.js";
import { createEventSpy } from "../core/event-spy.js";
import { Timer } from "../core/timer.js";
import type { Demo } from "./types.js";

function stamp(): string {
  return new Date().toISOString();
}

export const timersDemo: Demo = {
  name: "timers",
  description: "Two repeating timers, an event spy and SIGINT to quit",
  setup({ loop, out, durationMs }) {
    loop.install(
      loop.application,
      createEventSpy({
        types: [BuiltinEventType.Timer],
        sink: (line) => out(`[${stamp()}] ${line}`),
      }),
    );

    const slow = new Timer(loop, { name: "timer-1000ms" });
    slow.onTimeout(() => out(`[${stamp()}] (1000ms) TIMER SLOT`));
    slow.start(1000);

    const fast = new Timer(loop, { name: "timer-0250ms" });
    fast.onTimeout(() => out(`[${stamp()}] (0250ms) TIMER SLOT`));
    fast.start(250);

    if (durationMs !== undefined) {
      loop.singleShot(durationMs, () => loop.requestQuit(0));
    }

    const onSigint = (): void => {
      out("SIGINT received, requesting quit");
      loop.requestQuit(0);
    };
    process.on("SIGINT", onSigint);

    return () => {
      process.off("SIGINT", onSigint);
      slow.destroy();
      fast.destroy();
    };
  },
};
