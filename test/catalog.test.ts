import { describe, expect, it } from "vitest";
import { isRunMode, MODE_CATALOG, tasksForMode, teamTask } from "../src/catalog.js";
import { FileConfigSchema } from "../src/schemas.js";

const defaultsFile = FileConfigSchema.parse({});

describe("tasksForMode", () => {
  it("maps each mode to its agents", () => {
    const names = (mode: string) => tasksForMode(mode, defaultsFile.agents).map((t) => t.name);
    expect(names("auto")).toEqual(["monitor", "analyzer"]);
    expect(names("research")).toEqual(["researcher", "synthesizer"]);
    expect(names("analysis")).toEqual(["data_analyst", "reporter"]);
    expect(names("monitoring")).toEqual(["health_checker", "alert_manager"]);
  });

  it("takes timeouts from the agent groups", () => {
    const tasks = tasksForMode("research", defaultsFile.agents);
    expect(tasks.map((t) => t.timeoutSeconds)).toEqual([300, 180]);
    expect(tasks[0].prompt).toBe(MODE_CATALOG.research[0].prompt);
  });

  it("falls back to auto for an unknown mode", () => {
    expect(isRunMode("constructor")).toBe(false);
    expect(tasksForMode("nightly", defaultsFile.agents).map((t) => t.name)).toEqual(["monitor", "analyzer"]);
  });

  it("carries the group's backend override and system prompt", () => {
    const file = FileConfigSchema.parse({
      agents: { reporter: { timeoutSeconds: 60, clientMode: "api", systemPrompt: "You write reports." } },
    });
    const [dataAnalyst, reporter] = tasksForMode("analysis", file.agents);
    expect(dataAnalyst.backendModeOverride).toBeUndefined();
    expect(reporter).toEqual({
      name: "reporter",
      prompt: MODE_CATALOG.analysis[1].prompt,
      timeoutSeconds: 60,
      backendModeOverride: "api",
      systemContext: "You write reports.",
    });
  });

  it("skips disabled groups", () => {
    const file = FileConfigSchema.parse({ agents: { monitor: { enabled: false, timeoutSeconds: 120 } } });
    expect(tasksForMode("monitoring", file.agents).map((t) => t.name)).toEqual(["alert_manager"]);
    expect(tasksForMode("auto", file.agents).map((t) => t.name)).toEqual(["analyzer"]);
  });

  it("returns nothing when every group is disabled", () => {
    const off = { enabled: false, timeoutSeconds: 10 };
    const file = FileConfigSchema.parse({ agents: { monitor: off, analyzer: off, researcher: off, reporter: off } });
    expect(tasksForMode("auto", file.agents)).toEqual([]);
  });
});

describe("teamTask", () => {
  it("builds one agent-teams task with the roster as context", () => {
    const task = teamTask(
      "code-review",
      {
        description: "Review a change",
        teammates: [
          { name: "security-reviewer", role: "security", timeoutSeconds: 300 },
          { name: "style-reviewer", role: "style", timeoutSeconds: 450 },
        ],
      },
      "Review the login flow",
    );

    expect(task).toEqual({
      name: "code-review",
      prompt: "Review the login flow",
      timeoutSeconds: 450,
      backendModeOverride: "agent-teams",
      systemContext:
        'Team "code-review": Review a change\nTeammates: security-reviewer (security), style-reviewer (style)',
    });
    expect(Object.isFrozen(task)).toBe(true);
  });
});
