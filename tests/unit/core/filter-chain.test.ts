import { describe, it, expect, vi } from "vitest";
import { FilterChain } from "../../../src/core/filter-chain.js";
import type {
  FilterResult,
  LoopEvent,
  TargetRef,
} from "../../../src/types/events.js";

const app: TargetRef = { id: 1, name: "application" };
const panel: TargetRef = { id: 2, name: "panel" };
const button: TargetRef = { id: 3, name: "button" };
const other: TargetRef = { id: 4, name: "other" };

const event: LoopEvent = { type: 1000, payload: "click", target: button, sequence: 1 };
const path = [button, panel, app];

describe("FilterChain", () => {
  it("should pass when nothing is installed", () => {
    const chain = new FilterChain();

    expect(chain.run(event, path)).toBe("pass");
  });

  it("should run matching interceptors in install order", () => {
    const chain = new FilterChain();
    const calls: string[] = [];

    chain.install(app, () => {
      calls.push("app");
      return "pass";
    });
    chain.install(button, () => {
      calls.push("button");
      return "pass";
    });
    chain.install(panel, () => {
      calls.push("panel");
      return "pass";
    });

    expect(chain.run(event, path)).toBe("pass");
    expect(calls).toEqual(["app", "button", "panel"]);
  });

  it("should skip interceptors whose scope is not on the path", () => {
    const chain = new FilterChain();
    const interceptor = vi.fn((): FilterResult => "consumed");
    chain.install(other, interceptor);

    expect(chain.run(event, path)).toBe("pass");
    expect(interceptor).not.toHaveBeenCalled();
  });

  it("should stop at the first consumed verdict", () => {
    const chain = new FilterChain();
    const after = vi.fn((): FilterResult => "pass");

    chain.install(app, () => "pass");
    chain.install(panel, () => "consumed");
    chain.install(app, after);

    expect(chain.run(event, path)).toBe("consumed");
    expect(after).not.toHaveBeenCalled();
  });

  it("should hand the watched scope to the interceptor", () => {
    const chain = new FilterChain();
    const interceptor = vi.fn((): FilterResult => "pass");
    chain.install(panel, interceptor);

    chain.run(event, path);

    expect(interceptor).toHaveBeenCalledWith(event, panel);
  });

  it("should not run an interceptor installed during the same run", () => {
    const chain = new FilterChain();
    const late = vi.fn((): FilterResult => "pass");

    chain.install(app, () => {
      chain.install(app, late);
      return "pass";
    });

    chain.run(event, path);
    expect(late).not.toHaveBeenCalled();

    chain.run(event, path);
    expect(late).toHaveBeenCalledTimes(1);
  });

  describe("uninstall", () => {
    it("should remove a single interceptor", () => {
      const chain = new FilterChain();
      const handle = chain.install(app, () => "consumed");

      expect(chain.uninstall(handle)).toBe(true);
      expect(chain.uninstall(handle)).toBe(false);
      expect(chain.run(event, path)).toBe("pass");
    });

    it("should remove every interceptor of a scope", () => {
      const chain = new FilterChain();
      chain.install(panel, () => "consumed");
      chain.install(panel, () => "consumed");
      chain.install(app, () => "pass");

      expect(chain.uninstallScope(panel)).toBe(2);
      expect(chain.size).toBe(1);
      expect(chain.run(event, path)).toBe("pass");
    });
  });
});
