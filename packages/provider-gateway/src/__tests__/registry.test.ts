import { MockEvaluationProvider, type MockOutcome } from "@veracity/test-utils";
import { describe, expect, it, vi } from "vitest";
import type { Logger } from "../logger.js";
import { ProviderRegistry } from "../registry.js";

const consistent: MockOutcome = { kind: "consistent", justification: "ok" };
const request = { question: "q", answer: "a", reference: "r" };

function registryWith(...providers: MockEvaluationProvider[]): ProviderRegistry {
  const registry = new ProviderRegistry();
  for (const provider of providers) registry.add(provider);
  registry.autoSelect();
  return registry;
}

function recordingLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

class ExplodingProvider extends MockEvaluationProvider {
  override async evaluate(): Promise<MockOutcome> {
    throw new Error("kaboom");
  }
}

describe("ProviderRegistry", () => {
  describe("selection", () => {
    it("auto-selects the first configured provider", () => {
      const registry = registryWith(
        new MockEvaluationProvider("a", [], { keys: [] }),
        new MockEvaluationProvider("b"),
      );
      expect(registry.getCurrentId()).toBe("b");
    });

    it("falls back to the first provider when none is configured", () => {
      const registry = registryWith(
        new MockEvaluationProvider("a", [], { keys: [] }),
        new MockEvaluationProvider("b", [], { keys: [] }),
      );
      expect(registry.getCurrentId()).toBe("a");
      expect(registry.hasConfiguredProviders()).toBe(false);
    });

    it("switches only to registered ids", () => {
      const registry = registryWith(new MockEvaluationProvider("a"), new MockEvaluationProvider("b"));

      expect(registry.switch("missing")).toBe(false);
      expect(registry.getCurrentId()).toBe("a");
      expect(registry.switch("b")).toBe(true);
      expect(registry.getCurrentId()).toBe("b");
      expect(registry.getProvider()?.id).toBe("b");
    });

    it("ignores a duplicate id", () => {
      const registry = registryWith(new MockEvaluationProvider("a"));
      expect(registry.add(new MockEvaluationProvider("a"))).toBeUndefined();
      expect(registry.listProviders()).toHaveLength(1);
    });
  });

  describe("register", () => {
    it("omits providers whose construction fails", () => {
      const logger = recordingLogger();
      const registry = new ProviderRegistry(
        [
          { id: "good", type: "openai", keys: ["test-key"] },
          { id: "bad", type: "openai", keys: [] },
        ],
        {
          logger,
          factory: (config) => {
            if (config.id === "bad") throw new Error("boom");
            return new MockEvaluationProvider(config.id, [], { keys: config.keys });
          },
        },
      );

      expect(registry.listProviders().map((choice) => choice.id)).toEqual(["good"]);
      expect(logger.error).toHaveBeenCalledWith('failed to initialize provider "bad": boom');
    });

    it("builds gateway providers from configs by default", () => {
      const registry = new ProviderRegistry([
        { id: "openai", type: "openai", keys: ["test-key"], baseUrl: "ftp://invalid" },
        { id: "gemini", type: "gemini", keys: [] },
      ]);

      expect(registry.listProviders()).toEqual([
        { id: "gemini", name: "Google Gemini", type: "gemini", configured: false, current: true },
      ]);
    });
  });

  describe("evaluate", () => {
    it("returns provider unavailable without any provider", async () => {
      expect(await new ProviderRegistry().evaluate(request)).toEqual({
        kind: "error",
        reason: "provider unavailable",
      });
    });

    it("returns provider unavailable for an unknown id", async () => {
      const registry = registryWith(new MockEvaluationProvider("a", [consistent]));
      expect(await registry.evaluate({ ...request, providerId: "zzz" })).toEqual({
        kind: "error",
        reason: "provider unavailable",
      });
    });

    it("returns provider unconfigured without keys", async () => {
      const registry = registryWith(new MockEvaluationProvider("a", [consistent], { keys: [] }));
      expect(await registry.evaluate(request)).toEqual({ kind: "error", reason: "provider unconfigured" });
    });

    it("delegates to the current provider with its default model", async () => {
      const provider = new MockEvaluationProvider("a", [consistent], { models: ["m1", "m2"] });
      const registry = registryWith(provider);

      expect(await registry.evaluate(request)).toEqual(consistent);
      expect(provider.lastRequest).toMatchObject({ ...request, model: "m1" });
    });

    it("routes to an explicit provider and model", async () => {
      const a = new MockEvaluationProvider("a", [consistent]);
      const b = new MockEvaluationProvider("b", [{ kind: "uncertain", justification: "?" }]);
      const registry = registryWith(a, b);

      expect(await registry.evaluate({ ...request, providerId: "b", model: "m2" })).toEqual({
        kind: "uncertain",
        justification: "?",
      });
      expect(a.callCount).toBe(0);
      expect(b.lastRequest?.model).toBe("m2");
    });

    it("turns a throwing provider into an error outcome", async () => {
      const registry = registryWith(new ExplodingProvider("exploding"));
      expect(await registry.evaluate(request)).toEqual({ kind: "error", reason: "exploding: kaboom" });
    });

    it("logs unexpected provider exceptions as internal errors", async () => {
      const logger = recordingLogger();
      const registry = new ProviderRegistry([], { logger });
      registry.add(new ExplodingProvider("exploding"));
      registry.autoSelect();

      await registry.evaluate(request);

      expect(logger.error).toHaveBeenCalledWith("exploding: INTERNAL_ERROR: kaboom");
      expect(logger.warn).not.toHaveBeenCalledWith(expect.stringContaining("kaboom"));
    });
  });

  describe("reports", () => {
    it("summarizes configuration", () => {
      const registry = registryWith(
        new MockEvaluationProvider("a", [], { keys: ["k1", "k2"], models: ["m1", "m2"] }),
        new MockEvaluationProvider("b", [], { keys: [], type: "dify" }),
      );

      expect(registry.getConfigurationSummary()).toEqual({ total: 2, configured: 1, currentId: "a" });
      expect(registry.getStatistics()).toEqual({
        total: 2,
        configured: 1,
        currentId: "a",
        providers: {
          a: { name: "a", type: "openai", configured: true, modelsCount: 2, defaultModel: "m1", keyCount: 2 },
          b: {
            name: "b",
            type: "dify",
            configured: false,
            modelsCount: 1,
            defaultModel: "mock-model",
            keyCount: 0,
          },
        },
      });
      expect(registry.listProviders()).toEqual([
        { id: "a", name: "a", type: "openai", configured: true, current: true },
        { id: "b", name: "b", type: "dify", configured: false, current: false },
      ]);
    });

    it("validates the first key of each configured provider", async () => {
      const a = new MockEvaluationProvider("a", [], { keys: ["good-key", "spare-key"] });
      const b = new MockEvaluationProvider("b", [], { keys: ["bad-key"], validKeys: [] });
      const c = new MockEvaluationProvider("c", [], { keys: [] });
      const registry = registryWith(a, b, c);

      expect(await registry.validationReport()).toEqual({
        total: 3,
        valid: 1,
        invalid: 1,
        unconfigured: 1,
        results: {
          a: { name: "a", status: "valid", message: "API key accepted" },
          b: { name: "b", status: "invalid", message: "API key rejected or backend unreachable" },
          c: { name: "c", status: "unconfigured", message: "no API key configured" },
        },
      });
      expect(a.validatedKeys).toEqual(["good-key"]);
      expect(c.validatedKeys).toEqual([]);
    });

    it("switches to the first provider that validates", async () => {
      const registry = registryWith(
        new MockEvaluationProvider("a", [], { validKeys: [] }),
        new MockEvaluationProvider("b"),
      );

      expect(await registry.switchToFirstValid()).toBe("b");
      expect(registry.getCurrentId()).toBe("b");
    });

    it("keeps the selection when nothing validates", async () => {
      const registry = registryWith(new MockEvaluationProvider("a", [], { validKeys: [] }));

      expect(await registry.switchToFirstValid()).toBeUndefined();
      expect(registry.getCurrentId()).toBe("a");
    });
  });
});
