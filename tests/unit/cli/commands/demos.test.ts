/**
 * Unit tests for the demos command
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { demosCommand } from "../../../../src/cli/commands/demos.js";

describe("Demos Command", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should list every demo", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    const exitCode = await demosCommand();

    expect(exitCode).toBe(0);
    const table = String(log.mock.calls[0]?.[0]);
    expect(table).toContain("custom-event");
    expect(table).toContain("signals-and-quit");
    expect(table).toContain("timers");
    expect(table).toContain("blocked-loop");
  });
});
