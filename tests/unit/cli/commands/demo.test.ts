/**
 * Unit tests for the demo command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { demoCommand } from "../../../../src/cli/commands/demo.js";

describe("Demo Command", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should run signals-and-quit to completion", async () => {
    const exitCode = await demoCommand("signals-and-quit");

    expect(exitCode).toBe(0);
    const lines = vi.mocked(console.log).mock.calls.map((call) => call[0]);
    const start = lines.indexOf("Emit signal one");
    expect(lines.slice(start, start + 6)).toEqual([
      "Emit signal one",
      "Execute slot one",
      "Emit finished",
      "Emit signal two",
      "Execute slot two",
      "Bye!",
    ]);
  });

  it("should run custom-event to completion", async () => {
    const exitCode = await demoCommand("custom-event");

    expect(exitCode).toBe(0);
    expect(console.log).toHaveBeenCalledWith("[main] Posting Message to receiver");
    expect(console.log).toHaveBeenCalledWith(
      "[recv] Received Message with payload: 'This is my custom event'",
    );
    expect(console.log).toHaveBeenCalledWith("[recv] Loop is about to quit");
  });

  it("should fail for an unknown demo", async () => {
    const exitCode = await demoCommand("does-not-exist");

    expect(exitCode).toBe(1);
    expect(console.error).toHaveBeenCalled();
  });

  describe("with a config file", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), "slotloop-demo-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("should fail on an invalid config", async () => {
      const file = path.join(dir, "slotloop.json");
      await writeFile(file, JSON.stringify({ loop: { yield_every: "many" } }));

      const exitCode = await demoCommand("custom-event", { config: file });

      expect(exitCode).toBe(1);
      expect(console.error).toHaveBeenCalled();
    });

    it("should fail on a missing config", async () => {
      const exitCode = await demoCommand("custom-event", {
        config: path.join(dir, "missing.json"),
      });

      expect(exitCode).toBe(1);
    });
  });
});
