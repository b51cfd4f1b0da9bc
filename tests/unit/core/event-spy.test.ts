import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import winston from "winston";
import { EventLoop } from "../../../src/core/event-loop.js";
import {
  BuiltinEventType,
  EventTypeRegistry,
} from "../../../src/core/event-types.js";
import { createEventSpy } from "../../../src/core/event-spy.js";
import type { EventTypeId, TargetRef } from "../../../src/types/events.js";
import { ManualClock, ManualWakeSource } from "../../helpers/manual-time.js";

describe("createEventSpy", () => {
  let registry: EventTypeRegistry;
  let loop: EventLoop;
  let receiver: TargetRef;
  let Ping: EventTypeId;

  beforeEach(() => {
    const clock = new ManualClock();
    registry = new EventTypeRegistry();
    Ping = registry.register("Ping");
    loop = new EventLoop({
      clock,
      wakeSource: new ManualWakeSource(clock),
      eventTypes: registry,
    });
    receiver = loop.register(() => true, { name: "receiver" });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should describe each event and let it pass", () => {
    const lines: string[] = [];
    const handler = vi.fn(() => true);
    const target = loop.register(handler, { name: "watched" });
    loop.install(
      loop.application,
      createEventSpy({
        nameOf: (type) => registry.nameOf(type),
        sink: (line) => lines.push(line),
      }),
    );

    loop.post(target, Ping);
    loop.processEvents();

    expect(lines).toEqual(["Event=Ping, Target=watched"]);
    expect(handler).toHaveBeenCalledOnce();
  });

  it("should only report the requested types", () => {
    const lines: string[] = [];
    loop.install(
      loop.application,
      createEventSpy({
        types: [BuiltinEventType.Timer],
        nameOf: (type) => registry.nameOf(type),
        sink: (line) => lines.push(line),
      }),
    );

    loop.post(receiver, Ping);
    loop.arm(0, "oneshot", receiver);
    loop.processEvents();

    expect(lines).toEqual(["Event=Timer, Target=receiver"]);
  });

  it("should write to the logger at the configured level", () => {
    const logger = winston.createLogger({ silent: true });
    const log = vi.spyOn(logger, "log");
    loop.install(
      receiver,
      createEventSpy({
        logger,
        level: "info",
        nameOf: (type) => registry.nameOf(type),
      }),
    );

    loop.post(receiver, Ping);
    loop.processEvents();

    expect(log).toHaveBeenCalledWith("info", "Event=Ping, Target=receiver");
  });
});
