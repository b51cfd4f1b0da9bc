/**
 * Signals and quit demo
 *
 * Slots connected on the same loop run inside emit(). Quitting from a slot
 * only takes effect once the handler that emitted has returned, so every
 * line below prints before the loop stops.
 */

import { baseHandler } from "../core/event-loop.js";
import type { Demo } from "./types.js";

export const signalsAndQuitDemo: Demo = {
  name: "signals-and-quit",
  description: "Emit signals from startup work; quit waits for the handler to return",
  setup({ loop, out }) {
    const foo = loop.register(baseHandler, { name: "foo" });

    loop.connect(foo, "signal1", () => out("Execute slot one"));
    loop.connect(foo, "signal2", () => out("Execute slot two"));
    loop.connect(foo, "finished", loop.quit);

    const doStuff = (): void => {
      out("Emit signal one");
      loop.emit(foo, "signal1");

      out("Emit finished");
      loop.emit(foo, "finished"); // quit requested, handler keeps going

      out("Emit signal two");
      loop.emit(foo, "signal2");
    };

    // Startup work runs once the loop is running
    loop.singleShot(0, () => {
      doStuff();
      out("Bye!");
    });
  },
};
