import { describe, expect, it } from "vitest";
import { buildEngineConfig, defaults } from "../src/config.js";

describe("buildEngineConfig", () => {
  it("returns the defaults without overrides", () => {
    const config = buildEngineConfig();
    expect(config).toEqual(defaults);
    expect(config.backendMode).toBe("claude-code");
    expect(config.interTaskDelayMs).toBe(2000);
    expect(config.backend.maxTokens).toBe(4096);
  });

  it("merges nested overrides", () => {
    const config = buildEngineConfig({ backend: { model: "test-model" }, credential: "test-secret" });
    expect(config.backend.model).toBe("test-model");
    expect(config.backend.apiVersion).toBe("2023-06-01");
    expect(config.credential).toBe("test-secret");
  });

  it("ignores undefined overrides", () => {
    const config = buildEngineConfig({ backend: { subprocessPath: undefined }, interTaskDelayMs: undefined });
    expect(config.backend.subprocessPath).toBe("/home/claude/.local/bin/claude");
    expect(config.interTaskDelayMs).toBe(2000);
  });

  it("returns a fresh value each call", () => {
    const a = buildEngineConfig();
    a.backend.model = "changed";
    expect(buildEngineConfig().backend.model).toBe("claude-sonnet-4-20250514");
    expect(Object.isFrozen(defaults)).toBe(true);
  });
});
