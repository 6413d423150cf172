import type { AgentTask } from "./engine/types.js";
import type { AgentGroupConfig, FileConfig, TeamDefinition } from "./schemas.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("catalog");

export type AgentGroup = keyof FileConfig["agents"];

export type RunMode = "auto" | "research" | "analysis" | "monitoring";

type AgentDefinition = {
  name: string;
  group: AgentGroup;
  prompt: string;
};

export const DEFAULT_RUN_MODE: RunMode = "auto";

export const MODE_CATALOG: Readonly<Record<RunMode, readonly AgentDefinition[]>> = {
  auto: [
    {
      name: "monitor",
      group: "monitor",
      prompt:
        "Check system health, review logs, and identify any issues that need attention. Provide a brief status report.",
    },
    {
      name: "analyzer",
      group: "analyzer",
      prompt: "Analyze recent activity patterns and suggest optimizations or improvements for the system.",
    },
  ],
  research: [
    {
      name: "researcher",
      group: "researcher",
      prompt:
        "Research the latest developments in AI agent orchestration and multi-agent systems. Summarize key findings.",
    },
    {
      name: "synthesizer",
      group: "analyzer",
      prompt: "Based on current trends, suggest improvements to our agent orchestration framework.",
    },
  ],
  analysis: [
    {
      name: "data_analyst",
      group: "analyzer",
      prompt: "Analyze system performance metrics and identify bottlenecks or areas for improvement.",
    },
    {
      name: "reporter",
      group: "reporter",
      prompt: "Generate a comprehensive report on system status and recommendations.",
    },
  ],
  monitoring: [
    {
      name: "health_checker",
      group: "monitor",
      prompt: "Perform comprehensive health checks on all system components and services.",
    },
    {
      name: "alert_manager",
      group: "reporter",
      prompt: "Review recent alerts and events, prioritize issues, and suggest actions.",
    },
  ],
};

export function isRunMode(mode: string): mode is RunMode {
  return Object.hasOwn(MODE_CATALOG, mode);
}

function toTask(def: AgentDefinition, group: AgentGroupConfig): AgentTask {
  return Object.freeze({
    name: def.name,
    prompt: def.prompt,
    timeoutSeconds: group.timeoutSeconds,
    backendModeOverride: group.clientMode,
    systemContext: group.systemPrompt,
  });
}

/** The tasks of a run mode, with disabled groups left out. Unknown modes fall back to auto. */
export function tasksForMode(mode: string, agents: FileConfig["agents"]): AgentTask[] {
  let runMode: RunMode;
  if (isRunMode(mode)) {
    runMode = mode;
  } else {
    log.warn(`Unknown mode "${mode}", using "${DEFAULT_RUN_MODE}"`);
    runMode = DEFAULT_RUN_MODE;
  }

  const tasks: AgentTask[] = [];
  for (const def of MODE_CATALOG[runMode]) {
    const group = agents[def.group];
    if (!group.enabled) {
      log.warn(`Skipping disabled agent: ${def.name}`);
      continue;
    }
    tasks.push(toTask(def, group));
  }

  if (tasks.length === 0) {
    log.warn(`All agents disabled for mode "${runMode}"`);
  }
  return tasks;
}

/** One team session: runs on the agent-teams backend with the roster as its context. */
export function teamTask(name: string, definition: TeamDefinition, description: string): AgentTask {
  const roster = definition.teammates.map((t) => `${t.name} (${t.role})`).join(", ");
  return Object.freeze({
    name,
    prompt: description,
    timeoutSeconds: Math.max(...definition.teammates.map((t) => t.timeoutSeconds)),
    backendModeOverride: "agent-teams",
    systemContext: `Team "${name}": ${definition.description}\nTeammates: ${roster}`,
  });
}
