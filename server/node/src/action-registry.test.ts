/**
 * Unit tests for ActionRegistry: registration, aliases, snapshots.
 */

import { describe, it, expect, vi } from "vitest";
import { ActionRegistry, type ActionHandler, type ActionMiddleware } from "./action-registry.js";
import { Context } from "./context.js";

// ── Mocks ───────────────────────────────────────────────────────────

function createHandler(): ActionHandler {
  return vi.fn(async () => {});
}

// ── Tests ───────────────────────────────────────────────────────────

describe("ActionRegistry", () => {
  describe("register / resolve / unregister", () => {
    it("should resolve a registered handler", () => {
      const registry = new ActionRegistry();
      const h = createHandler();
      registry.register("svc", h);
      expect(registry.resolve("svc")).toBe(h);
      expect(registry.has("svc")).toBe(true);
    });

    it("should report not found after unregister", () => {
      const registry = new ActionRegistry();
      registry.register("svc", createHandler());
      registry.unregister("svc");
      expect(registry.resolve("svc")).toBeUndefined();
      expect(registry.size).toBe(0);
    });

    it("should treat unregister of an unknown name as a no-op", () => {
      const registry = new ActionRegistry();
      expect(() => registry.unregister("missing")).not.toThrow();
    });

    it("should let the last registration win", () => {
      const registry = new ActionRegistry();
      const first = createHandler();
      const second = createHandler();
      registry.register("svc", first);
      registry.register("svc", second);
      expect(registry.resolve("svc")).toBe(second);
      expect(registry.size).toBe(1);
    });

    it("should be case-sensitive", () => {
      const registry = new ActionRegistry();
      registry.register("Svc", createHandler());
      expect(registry.resolve("svc")).toBeUndefined();
    });

    it("should throw on an empty name", () => {
      const registry = new ActionRegistry();
      expect(() => registry.register("", createHandler())).toThrow(/must not be empty/);
      expect(() => registry.unregister("")).toThrow(/must not be empty/);
    });

    it("should throw when the handler is missing", () => {
      const registry = new ActionRegistry();
      expect(() => Reflect.apply(registry.register, registry, ["svc", undefined])).toThrow(
        /handler must not be empty/
      );
    });
  });

  describe("per-action middleware", () => {
    it("should wrap the handler once, at registration", async () => {
      const registry = new ActionRegistry();
      const factory = vi.fn<ActionMiddleware>((next) => next);
      registry.register("svc", createHandler(), factory);
      const resolved = registry.resolve("svc");
      if (!resolved) throw new Error("not registered");
      await resolved(new Context());
      await resolved(new Context());
      expect(factory).toHaveBeenCalledTimes(1);
    });

    it("should apply the first middleware outermost", async () => {
      const registry = new ActionRegistry();
      const steps: string[] = [];
      const mw = (name: string): ActionMiddleware => (next) => async (c) => {
        steps.push(`${name}:in`);
        await next(c);
        steps.push(`${name}:out`);
      };
      registry.register(
        "svc",
        async () => {
          steps.push("handler");
        },
        mw("a"),
        mw("b")
      );
      const handler = registry.resolve("svc");
      if (!handler) throw new Error("not registered");
      await handler(new Context());
      expect(steps).toEqual(["a:in", "b:in", "handler", "b:out", "a:out"]);
    });
  });

  describe("mapping", () => {
    it("should resolve an alias to the target handler", () => {
      const registry = new ActionRegistry();
      const h = createHandler();
      registry.register("new", h);
      registry.mapping("old", "new");
      expect(registry.resolve("old")).toBe(h);
    });

    it("should resolve lazily when the target is registered later", () => {
      const registry = new ActionRegistry();
      registry.mapping("old", "new");
      expect(registry.resolve("old")).toBeUndefined();
      const h = createHandler();
      registry.register("new", h);
      expect(registry.resolve("old")).toBe(h);
    });

    it("should not keep a stale handler after the target is unregistered", () => {
      const registry = new ActionRegistry();
      registry.register("new", createHandler());
      registry.mapping("old", "new");
      registry.unregister("new");
      expect(registry.resolve("old")).toBeUndefined();
    });

    it("should follow only one alias hop", () => {
      const registry = new ActionRegistry();
      const h = createHandler();
      registry.mapping("a", "b");
      registry.mapping("b", "c");
      registry.register("c", h);
      expect(registry.resolve("b")).toBe(h);
      expect(registry.resolve("a")).toBeUndefined();
    });

    it("should prefer a direct registration over an alias", () => {
      const registry = new ActionRegistry();
      const direct = createHandler();
      registry.register("x", direct);
      registry.register("y", createHandler());
      registry.mapping("x", "y");
      expect(registry.resolve("x")).toBe(direct);
    });

    it("should throw on empty names", () => {
      const registry = new ActionRegistry();
      expect(() => registry.mapping("", "b")).toThrow(/must not be empty/);
      expect(() => registry.mapping("a", "")).toThrow(/must not be empty/);
    });
  });

  describe("snapshots", () => {
    it("should list direct names only", () => {
      const registry = new ActionRegistry();
      registry.register("a", createHandler());
      registry.register("b", createHandler());
      registry.mapping("c", "a");
      expect(registry.services().sort()).toEqual(["a", "b"]);
    });

    it("should return a copy of the alias table", () => {
      const registry = new ActionRegistry();
      registry.mapping("old", "new");
      const copy = registry.mappings();
      copy.set("other", "new");
      copy.delete("old");
      expect(registry.mappings()).toEqual(new Map([["old", "new"]]));
    });
  });
});
