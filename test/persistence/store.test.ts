import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { summarize } from "../../src/engine/aggregate.js";
import { failedResult, successResult } from "../../src/engine/result.js";
import { RunStore } from "../../src/persistence/store.js";
import type { AgentResult } from "../../src/engine/types.js";
import type { RunRecord } from "../../src/persistence/types.js";

function record(runId: string, startedAt: number): RunRecord {
  const timing = { backendLabel: "claude-code", startedAt };
  const results = [successResult("monitor", "all good", timing), failedResult("analyzer", "Timed out after 180s", timing)];
  return {
    runId,
    mode: "auto",
    backendMode: "claude-code",
    parallel: true,
    startedAt,
    finishedAt: startedAt + 1500,
    results,
    summary: summarize(results),
  };
}

let store: RunStore;

beforeEach(() => {
  store = new RunStore(":memory:");
});

afterEach(() => {
  store.close();
});

describe("RunStore", () => {
  it("stores and reads back a run", () => {
    const run = record("run-1", 1_700_000_000_000);
    store.insert(run);

    const loaded = store.get("run-1");
    expect(loaded).toEqual({ ...run, results: run.results.map((r) => ({ ...r })) });
    expect(loaded?.summary).toEqual({ total: 2, succeeded: 1, failed: 1 });
    expect(loaded?.parallel).toBe(true);
  });

  it("returns undefined for an unknown run", () => {
    expect(store.get("missing")).toBeUndefined();
  });

  it("lists the most recent runs first", () => {
    store.insert(record("old", 1_000));
    store.insert(record("new", 3_000));
    store.insert(record("mid", 2_000));

    expect(store.list().map((r) => r.runId)).toEqual(["new", "mid", "old"]);
    expect(store.list(2).map((r) => r.runId)).toEqual(["new", "mid"]);
  });

  it("deletes a run by id", () => {
    store.insert(record("run-1", 1_000));
    expect(store.delete("run-1")).toBe(true);
    expect(store.delete("run-1")).toBe(false);
    expect(store.list()).toEqual([]);
  });

  it("deletes runs started before a cutoff", () => {
    store.insert(record("a", 1_000));
    store.insert(record("b", 2_000));
    store.insert(record("c", 3_000));

    expect(store.deleteOlderThan(2_500)).toBe(2);
    expect(store.list().map((r) => r.runId)).toEqual(["c"]);
  });
});

function result(
  agentName: string,
  backendLabel: string,
  completedAt: string,
  outcome: { output: string } | { error: string },
): AgentResult {
  const base = { agentName, backendLabel, completedAt, durationMs: 10 };
  return "output" in outcome
    ? { ...base, status: "success", output: outcome.output }
    : { ...base, status: "failed", errorMessage: outcome.error };
}

function runOf(runId: string, startedAt: number, results: AgentResult[]): RunRecord {
  return {
    runId,
    mode: "auto",
    backendMode: "api",
    parallel: false,
    startedAt,
    finishedAt: startedAt + 100,
    results,
    summary: summarize(results),
  };
}

const firstRun = runOf("run-1", 1_000, [
  result("monitor", "api", "2025-01-01T00:00:01.000Z", { output: "a".repeat(400) }),
  result("analyzer", "claude-code", "2025-01-01T00:00:02.000Z", { error: "Timed out after 180s" }),
]);

const secondRun = runOf("run-2", 2_000, [
  result("monitor", "api", "2025-01-02T00:00:01.000Z", { error: "Provider request failed with status 500: " }),
  result("analyzer", "claude-code", "2025-01-02T00:00:02.000Z", { output: "x".repeat(100) }),
]);

describe("RunStore analytics", () => {
  it("reports empty totals before any run", () => {
    expect(store.stats()).toEqual({
      totalRuns: 0,
      totalAgentsRun: 0,
      successRate: 0,
      estimatedCost: 0,
      lastRunAt: undefined,
    });
    expect(store.agentSummaries()).toEqual([]);
  });

  it("totals runs, agent results and estimated cost", () => {
    store.insert(firstRun);
    store.insert(secondRun);

    expect(store.stats()).toEqual({
      totalRuns: 2,
      totalAgentsRun: 4,
      successRate: 50,
      estimatedCost: 0.0015,
      lastRunAt: 2_000,
    });
  });

  it("summarizes each agent with its latest status", () => {
    store.insert(firstRun);
    store.insert(secondRun);

    expect(store.agentSummaries()).toEqual([
      {
        agent: "analyzer",
        totalRuns: 2,
        successes: 1,
        failures: 1,
        lastRun: "2025-01-02T00:00:02.000Z",
        lastStatus: "success",
        avgOutputLength: 50,
        estimatedCost: 0,
      },
      {
        agent: "monitor",
        totalRuns: 2,
        successes: 1,
        failures: 1,
        lastRun: "2025-01-02T00:00:01.000Z",
        lastStatus: "failed",
        avgOutputLength: 200,
        estimatedCost: 0.0015,
      },
    ]);
  });

  it("does not double count a run stored twice", () => {
    store.insert(firstRun);
    store.insert(firstRun);
    expect(store.stats().totalAgentsRun).toBe(2);
  });

  it("drops agent results with their runs", () => {
    store.insert(firstRun);
    store.insert(secondRun);

    store.deleteOlderThan(1_500);
    expect(store.stats()).toMatchObject({ totalRuns: 1, totalAgentsRun: 2, successRate: 50, estimatedCost: 0 });

    store.delete("run-2");
    expect(store.stats()).toMatchObject({ totalRuns: 0, totalAgentsRun: 0 });
  });

  it("prices with the configured rates", () => {
    const priced = new RunStore(":memory:", { rates: { charsPerToken: 1, costPerMillionOutputTokens: 1_000_000 } });
    priced.insert(firstRun);
    expect(priced.stats().estimatedCost).toBe(400);
    priced.close();
  });
});
