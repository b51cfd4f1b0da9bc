/**
 * Custom event demo
 *
 * [event] --post--> [queue] --> [loop] --> [receiver]
 *
 * A user event kind is registered, one event is posted to a receiver and
 * the receiver asks the loop to quit after printing the payload.
 */

import { ABOUT_TO_QUIT, baseHandler } from "../core/event-loop.js";
import { registerEventType } from "../core/event-types.js";
import type { Demo } from "./types.js";

const MessageEvent = registerEventType("Message");

export const customEventDemo: Demo = {
  name: "custom-event",
  description: "Post a user-defined event and quit from its handler",
  setup({ loop, out }) {
    const receiver = loop.register(
      (event) => {
        if (event.type === MessageEvent) {
          out(`[recv] Received Message with payload: '${String(event.payload)}'`);
          loop.requestQuit(0);
          return true;
        }
        return baseHandler.handle(event);
      },
      { name: "receiver" },
    );

    loop.connect(
      loop.application,
      ABOUT_TO_QUIT,
      () => out("[recv] Loop is about to quit"),
      receiver,
    );

    out(`[main] Posting Message to ${receiver.name}`);
    loop.post(receiver, MessageEvent, "This is my custom event");
  },
};
