import { randomUUID } from "node:crypto";
import type { Dispatcher } from "./backends/types.js";
import { tasksForMode, teamTask } from "./catalog.js";
import { summarize } from "./engine/aggregate.js";
import { ExecutionEngine } from "./engine/engine.js";
import type { AgentTask, EngineCallbacks } from "./engine/types.js";
import { ConfigError } from "./errors.js";
import type { OutputWriter } from "./persistence/output-writer.js";
import type { RunStore } from "./persistence/store.js";
import type { RunRecord } from "./persistence/types.js";
import { engineConfigFrom, type Settings } from "./settings.js";
import { log } from "./utils/logger.js";

export type OrchestratorOptions = {
  settings: Settings;
  writer?: OutputWriter;
  store?: RunStore;
  /** Override the backend dispatch (for testing). */
  dispatch?: Dispatcher;
  interTaskDelayMs?: number;
};

export type BatchRunOptions = {
  /** Task set to run; defaults to the configured run mode. */
  mode?: string;
  /** Explicit tasks instead of the mode's catalog entries. */
  tasks?: readonly AgentTask[];
  parallel?: boolean;
};

export class Orchestrator {
  readonly settings: Settings;
  private engine: ExecutionEngine;
  private writer?: OutputWriter;
  private store?: RunStore;

  constructor(opts: OrchestratorOptions) {
    this.settings = opts.settings;
    this.writer = opts.writer;
    this.store = opts.store;
    this.engine = new ExecutionEngine({
      config: engineConfigFrom(opts.settings, { interTaskDelayMs: opts.interTaskDelayMs }),
      dispatch: opts.dispatch,
    });
  }

  tasksFor(mode: string): AgentTask[] {
    return tasksForMode(mode, this.settings.file.agents);
  }

  /** Run one batch, persist it, and return the record. */
  async run(opts?: BatchRunOptions, callbacks?: EngineCallbacks): Promise<RunRecord> {
    const mode = opts?.mode ?? this.settings.runMode;
    const parallel = opts?.parallel ?? this.settings.parallel;
    const tasks = opts?.tasks ?? this.tasksFor(mode);

    const startedAt = Date.now();
    log.info(`Starting run - mode: ${mode}, backend: ${this.engine.backendMode}`, {
      agents: tasks.length,
      parallel,
    });

    const results = await this.engine.run(tasks, { parallel }, callbacks);
    const record: RunRecord = {
      runId: randomUUID(),
      mode,
      backendMode: this.engine.backendMode,
      parallel,
      startedAt,
      finishedAt: Date.now(),
      results,
      summary: summarize(results),
    };

    await this.writer?.write(record);
    this.store?.insert(record);

    log.info("Run complete", { ...record.summary });
    return record;
  }

  /** Run one session of a configured team on the agent-teams backend. */
  async runTeam(name: string, description: string, callbacks?: EngineCallbacks): Promise<RunRecord> {
    const { teams } = this.settings.file;
    if (!teams.enabled) {
      throw new ConfigError("INVALID_CONFIG", "Teams are disabled; set teams.enabled in the config file");
    }
    if (!Object.hasOwn(teams.definitions, name)) {
      const known = Object.keys(teams.definitions).join(", ") || "(none)";
      throw new ConfigError("INVALID_CONFIG", `Unknown team "${name}". Available teams: ${known}`);
    }
    const task = teamTask(name, teams.definitions[name], description);
    return this.run({ mode: name, tasks: [task], parallel: false }, callbacks);
  }
}
