import { describe, it, expect } from "vitest";
import { EventQueue } from "../../../src/core/event-queue.js";
import type { LoopEvent, TargetRef } from "../../../src/types/events.js";

const target: TargetRef = { id: 1, name: "target" };

function makeEvent(sequence: number): LoopEvent {
  return { type: 1000, payload: sequence, target, sequence };
}

describe("EventQueue", () => {
  it("should start empty", () => {
    const queue = new EventQueue();

    expect(queue.size).toBe(0);
    expect(queue.isEmpty()).toBe(true);
    expect(queue.popNext()).toBeUndefined();
  });

  it("should pop events in post order", () => {
    const queue = new EventQueue();
    queue.post(makeEvent(1));
    queue.post(makeEvent(2));
    queue.post(makeEvent(3));

    expect(queue.popNext()?.sequence).toBe(1);
    expect(queue.popNext()?.sequence).toBe(2);
    expect(queue.popNext()?.sequence).toBe(3);
    expect(queue.popNext()).toBeUndefined();
  });

  it("should keep order when posting between pops", () => {
    const queue = new EventQueue();
    queue.post(makeEvent(1));
    queue.post(makeEvent(2));
    queue.popNext();
    queue.post(makeEvent(3));

    expect(queue.size).toBe(2);
    expect(queue.popNext()?.sequence).toBe(2);
    expect(queue.popNext()?.sequence).toBe(3);
  });

  it("should put pushed-front events ahead of pending ones", () => {
    const queue = new EventQueue();
    queue.post(makeEvent(1));
    queue.post(makeEvent(2));
    queue.popNext();
    queue.pushFront([makeEvent(10), makeEvent(11)]);

    const order: number[] = [];
    let event = queue.popNext();
    while (event) {
      order.push(event.sequence);
      event = queue.popNext();
    }

    expect(order).toEqual([10, 11, 2]);
  });

  it("should remove matching events and report their positions", () => {
    const queue = new EventQueue();
    queue.post(makeEvent(1));
    queue.post(makeEvent(2));
    queue.post(makeEvent(3));
    queue.post(makeEvent(4));
    queue.popNext();

    const removed = queue.removeWhere((event) => event.sequence % 2 === 0);

    expect(removed).toEqual([0, 2]);
    expect(queue.size).toBe(1);
    expect(queue.popNext()?.sequence).toBe(3);
  });

  it("should leave the queue untouched when nothing matches", () => {
    const queue = new EventQueue();
    queue.post(makeEvent(1));

    expect(queue.removeWhere(() => false)).toEqual([]);
    expect(queue.popNext()?.sequence).toBe(1);
  });

  it("should ignore an empty pushFront", () => {
    const queue = new EventQueue();
    queue.post(makeEvent(1));
    queue.pushFront([]);

    expect(queue.size).toBe(1);
  });

  it("should keep FIFO order across compaction", () => {
    const queue = new EventQueue();
    for (let i = 0; i < 3000; i++) {
      queue.post(makeEvent(i));
    }

    for (let i = 0; i < 2000; i++) {
      expect(queue.popNext()?.sequence).toBe(i);
    }

    expect(queue.size).toBe(1000);
    expect(queue.popNext()?.sequence).toBe(2000);
  });

  it("should clear pending events", () => {
    const queue = new EventQueue();
    queue.post(makeEvent(1));
    queue.post(makeEvent(2));
    queue.clear();

    expect(queue.isEmpty()).toBe(true);
    expect(queue.popNext()).toBeUndefined();
  });
});
