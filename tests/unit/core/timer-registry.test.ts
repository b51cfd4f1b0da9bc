import { describe, it, expect, beforeEach } from "vitest";
import {
  TimerRegistry,
  type TimerOwner,
} from "../../../src/core/timer-registry.js";
import { TimerArmError } from "../../../src/core/errors.js";
import type { TargetRef } from "../../../src/types/events.js";
import { ManualClock } from "../../helpers/manual-time.js";

const target: TargetRef = { id: 7, name: "receiver" };
const other: TargetRef = { id: 8, name: "other" };
const toTarget: TimerOwner = { kind: "target", target };

describe("TimerRegistry", () => {
  let clock: ManualClock;
  let timers: TimerRegistry;

  beforeEach(() => {
    clock = new ManualClock();
    timers = new TimerRegistry(clock);
  });

  describe("arm", () => {
    it("should schedule the first deadline one interval from now", () => {
      clock.set(40);
      const handle = timers.arm(100, "repeating", toTarget);

      expect(timers.deadlineOf(handle)).toBe(140);
      expect(timers.isArmed(handle)).toBe(true);
    });

    it("should hand out distinct ids", () => {
      const a = timers.arm(10, "oneshot", toTarget);
      const b = timers.arm(10, "oneshot", toTarget);

      expect(a.id).not.toBe(b.id);
      expect(timers.size).toBe(2);
    });

    it("should reject a negative interval", () => {
      expect(() => timers.arm(-1, "oneshot", toTarget)).toThrow(TimerArmError);
    });

    it("should reject non-finite intervals", () => {
      expect(() => timers.arm(Number.NaN, "oneshot", toTarget)).toThrow(
        TimerArmError,
      );
      expect(() =>
        timers.arm(Number.POSITIVE_INFINITY, "repeating", toTarget),
      ).toThrow(TimerArmError);
    });
  });

  describe("collectDue", () => {
    it("should return nothing before the deadline", () => {
      timers.arm(100, "repeating", toTarget);
      clock.set(99);

      expect(timers.collectDue()).toEqual([]);
    });

    it("should fire at the deadline and rearm on the interval grid", () => {
      const handle = timers.arm(100, "repeating", toTarget);
      clock.set(100);

      const due = timers.collectDue();

      expect(due).toEqual([
        { timerId: handle.id, owner: toTarget, deadline: 100, missed: 0 },
      ]);
      expect(timers.deadlineOf(handle)).toBe(200);
    });

    it("should not drift when serviced late", () => {
      const handle = timers.arm(100, "repeating", toTarget);
      clock.set(130);
      timers.collectDue();

      expect(timers.deadlineOf(handle)).toBe(200);
    });

    it("should coalesce missed ticks into a single expiry", () => {
      const handle = timers.arm(100, "repeating", toTarget);
      clock.set(350);

      const due = timers.collectDue();

      expect(due).toHaveLength(1);
      expect(due[0]?.missed).toBe(2);
      expect(timers.deadlineOf(handle)).toBe(400);
      expect(timers.collectDue()).toEqual([]);
    });

    it("should remove one-shot timers after firing", () => {
      const handle = timers.arm(50, "oneshot", toTarget);
      clock.set(50);

      expect(timers.collectDue()).toHaveLength(1);
      expect(timers.isArmed(handle)).toBe(false);
      expect(timers.size).toBe(0);
    });

    it("should fire a zero-interval one-shot without advancing time", () => {
      const handle = timers.arm(0, "oneshot", toTarget);

      const due = timers.collectDue();

      expect(due.map((expiry) => expiry.timerId)).toEqual([handle.id]);
    });

    it("should fire a zero-interval repeating timer on every collection", () => {
      const handle = timers.arm(0, "repeating", toTarget);

      expect(timers.collectDue()).toHaveLength(1);
      expect(timers.collectDue()).toHaveLength(1);
      expect(timers.deadlineOf(handle)).toBe(0);
    });

    it("should order expirations by deadline", () => {
      const late = timers.arm(30, "oneshot", toTarget);
      const early = timers.arm(10, "oneshot", toTarget);
      clock.set(50);

      const ids = timers.collectDue().map((expiry) => expiry.timerId);

      expect(ids).toEqual([early.id, late.id]);
    });

    it("should keep arm order for equal deadlines", () => {
      const first = timers.arm(20, "oneshot", toTarget);
      const second = timers.arm(20, "repeating", toTarget);
      const third = timers.arm(20, "oneshot", toTarget);
      clock.set(20);

      const ids = timers.collectDue().map((expiry) => expiry.timerId);

      expect(ids).toEqual([first.id, second.id, third.id]);
    });

    it("should report callback owners", () => {
      const callback = (): void => {};
      timers.arm(0, "oneshot", { kind: "callback", callback });

      const [expiry] = timers.collectDue();

      expect(expiry?.owner).toEqual({ kind: "callback", callback });
    });
  });

  describe("cancel", () => {
    it("should stop a timer from firing", () => {
      const handle = timers.arm(10, "repeating", toTarget);

      expect(timers.cancel(handle)).toBe(true);
      clock.set(100);
      expect(timers.collectDue()).toEqual([]);
    });

    it("should report timers that were not armed", () => {
      const handle = timers.arm(10, "oneshot", toTarget);
      timers.cancel(handle);

      expect(timers.cancel(handle)).toBe(false);
    });

    it("should cancel every timer of a target", () => {
      timers.arm(10, "oneshot", toTarget);
      timers.arm(20, "repeating", toTarget);
      const kept = timers.arm(30, "repeating", {
        kind: "target",
        target: other,
      });

      expect(timers.cancelForTarget(target)).toBe(2);
      expect(timers.size).toBe(1);
      expect(timers.isArmed(kept)).toBe(true);
    });
  });

  describe("nextDeadline", () => {
    it("should be null without timers", () => {
      expect(timers.nextDeadline()).toBeNull();
    });

    it("should return the earliest deadline", () => {
      timers.arm(300, "oneshot", toTarget);
      timers.arm(120, "repeating", toTarget);
      timers.arm(200, "oneshot", toTarget);

      expect(timers.nextDeadline()).toBe(120);
    });
  });

  describe("clear", () => {
    it("should cancel every timer", () => {
      timers.arm(10, "oneshot", toTarget);
      timers.arm(10, "repeating", toTarget);
      timers.clear();

      expect(timers.size).toBe(0);
      expect(timers.nextDeadline()).toBeNull();
    });
  });
});
