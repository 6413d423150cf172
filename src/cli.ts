#!/usr/bin/env node

import { Command } from "commander";
import { BACKEND_MODES } from "./backends/types.js";
import { MODE_CATALOG, isRunMode } from "./catalog.js";
import type { AgentResult, EngineCallbacks } from "./engine/types.js";
import { errorMessage } from "./errors.js";
import { Orchestrator } from "./orchestrator.js";
import { OutputWriter } from "./persistence/output-writer.js";
import { RunStore } from "./persistence/store.js";
import type { RunRecord } from "./persistence/types.js";
import { DEFAULT_CONFIG_PATH, loadSettings, type Settings } from "./settings.js";
import { setLogFormat, setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", errorMessage(reason));
});
process.on("uncaughtException", (err) => {
  console.error("Uncaught exception:", err.message);
});

type CommonOptions = {
  config: string;
  backend?: string;
  output?: string;
  store: boolean;
  db?: string;
};

type RunCommandOptions = CommonOptions & {
  mode?: string;
  parallel?: boolean;
  sequential?: boolean;
};

let debug = false;

const program = new Command();

program
  .name("agent-batch-runner")
  .description("Run batches of agent prompts against language-model backends")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  debug = actionCmd.optsWithGlobals().debug === true;
});

async function prepare(opts: CommonOptions): Promise<Settings> {
  const settings = await loadSettings({ configPath: opts.config, env: process.env });
  setLogFormat(settings.file.logging.format);
  setLogLevel(debug ? "debug" : settings.logLevel);
  return opts.backend ? { ...settings, backendMode: opts.backend } : settings;
}

function openStore(settings: Settings, opts: Pick<CommonOptions, "store" | "db">): RunStore | undefined {
  if (!opts.store) return undefined;
  return new RunStore(opts.db ?? settings.file.storage.database);
}

function writerFor(settings: Settings, opts: Pick<CommonOptions, "output">): OutputWriter {
  return new OutputWriter({
    directory: opts.output ?? settings.file.outputs.directory,
    formats: settings.file.outputs.formats,
    title: settings.file.orchestra.name,
  });
}

const progress: EngineCallbacks = {
  onTaskStart: (task, backendLabel) => console.error(`  -> ${task.name} (${backendLabel})`),
  onTaskEnd: (result) => console.error(`  ${result.status === "success" ? "+" : "x"} ${result.agentName}`),
};

function printResult(result: AgentResult): void {
  const icon = result.status === "success" ? "+" : "x";
  const body = result.status === "success" ? result.output.trim().slice(0, 200) : result.errorMessage;
  console.log(`[${icon}] ${result.agentName} (${result.backendLabel}, ${result.durationMs}ms): ${body || "(empty)"}`);
}

function printRecord(record: RunRecord): void {
  console.log("\n--- Results ---");
  for (const result of record.results) printResult(result);
  const { total, succeeded, failed } = record.summary;
  const durationMs = record.finishedAt - record.startedAt;
  console.log(`\n${succeeded}/${total} succeeded, ${failed} failed in ${durationMs}ms (${record.mode}, ${record.backendMode})`);
  if (failed > 0) process.exitCode = 1;
}

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option("-c, --config <path>", "Config file", DEFAULT_CONFIG_PATH)
    .option("-b, --backend <mode>", `Global backend mode (${BACKEND_MODES.join(", ")})`)
    .option("-o, --output <dir>", "Output directory (default: outputs.directory)")
    .option("--db <path>", "Run history database")
    .option("--no-store", "Do not record the run in the history database");
}

// --- run ---
withCommonOptions(
  program
    .command("run")
    .description("Run the agents of a mode")
    .option("-m, --mode <mode>", "Run mode (auto, research, analysis, monitoring)")
    .option("--parallel", "Run all agents concurrently")
    .option("--sequential", "Run agents one at a time"),
).action(async (opts: RunCommandOptions) => {
  let store: RunStore | undefined;
  try {
    const settings = await prepare(opts);
    store = openStore(settings, opts);
    const orch = new Orchestrator({ settings, writer: writerFor(settings, opts), store });
    const parallel = opts.parallel ? true : opts.sequential ? false : undefined;
    const record = await orch.run({ mode: opts.mode, parallel }, progress);
    printRecord(record);
  } catch (err) {
    console.error("Run failed:", errorMessage(err));
    process.exitCode = 1;
  } finally {
    store?.close();
  }
});

// --- team ---
withCommonOptions(
  program
    .command("team")
    .description("Run one session of a configured team")
    .argument("<name>", "Team name from teams.definitions")
    .argument("<task...>", "Task description"),
).action(async (name: string, task: string[], opts: CommonOptions) => {
  let store: RunStore | undefined;
  try {
    const settings = await prepare(opts);
    store = openStore(settings, opts);
    const orch = new Orchestrator({ settings, writer: writerFor(settings, opts), store });
    const record = await orch.runTeam(name, task.join(" "), progress);
    printRecord(record);
  } catch (err) {
    console.error("Team run failed:", errorMessage(err));
    process.exitCode = 1;
  } finally {
    store?.close();
  }
});

// --- modes ---
program
  .command("modes")
  .description("List run modes and their agents")
  .option("-c, --config <path>", "Config file", DEFAULT_CONFIG_PATH)
  .action(async (opts: { config: string }) => {
    try {
      const settings = await loadSettings({ configPath: opts.config, env: process.env });
      const { agents, teams } = settings.file;
      for (const [mode, defs] of Object.entries(MODE_CATALOG)) {
        const marker = mode === settings.runMode ? " (default)" : "";
        console.log(`${mode}${marker}`);
        for (const def of defs) {
          const group = agents[def.group];
          const state = group.enabled ? `${group.timeoutSeconds}s` : "disabled";
          console.log(`  ${def.name} [${def.group}] ${state}${group.clientMode ? ` via ${group.clientMode}` : ""}`);
        }
      }
      if (!isRunMode(settings.runMode)) {
        console.log(`\nConfigured mode "${settings.runMode}" is unknown; runs fall back to "auto".`);
      }
      if (teams.enabled) {
        console.log("\nteams");
        for (const [name, def] of Object.entries(teams.definitions)) {
          console.log(`  ${name}: ${def.description} (${def.teammates.map((t) => t.name).join(", ")})`);
        }
      }
    } catch (err) {
      console.error("Error:", errorMessage(err));
      process.exitCode = 1;
    }
  });

// --- history ---
program
  .command("history")
  .description("List recorded runs")
  .option("-c, --config <path>", "Config file", DEFAULT_CONFIG_PATH)
  .option("--db <path>", "Run history database")
  .option("-l, --limit <n>", "Number of runs", "20")
  .action(async (opts: { config: string; db?: string; limit: string }) => {
    let store: RunStore | undefined;
    try {
      const settings = await prepare({ ...opts, store: true });
      store = openStore(settings, { store: true, db: opts.db });
      const runs = store?.list(Number(opts.limit)) ?? [];
      if (runs.length === 0) {
        console.log("No runs recorded.");
        return;
      }
      for (const run of runs) {
        const when = new Date(run.startedAt).toISOString();
        console.log(
          `${run.runId}  ${when}  ${run.mode}/${run.backendMode}${run.parallel ? " parallel" : ""}  ` +
            `${run.summary.succeeded}/${run.summary.total} ok`,
        );
      }
    } catch (err) {
      console.error("Error:", errorMessage(err));
      process.exitCode = 1;
    } finally {
      store?.close();
    }
  });

// --- stats ---
program
  .command("stats")
  .description("Show success rates and estimated cost across recorded runs")
  .option("-c, --config <path>", "Config file", DEFAULT_CONFIG_PATH)
  .option("--db <path>", "Run history database")
  .action(async (opts: { config: string; db?: string }) => {
    let store: RunStore | undefined;
    try {
      const settings = await prepare({ ...opts, store: true });
      store = openStore(settings, { store: true, db: opts.db });
      const stats = store?.stats();
      if (!stats || stats.totalRuns === 0) {
        console.log("No runs recorded.");
        return;
      }
      const last = stats.lastRunAt !== undefined ? new Date(stats.lastRunAt).toISOString() : "never";
      console.log(`Runs: ${stats.totalRuns}  Agents run: ${stats.totalAgentsRun}  Success rate: ${stats.successRate}%`);
      console.log(`Estimated cost: $${stats.estimatedCost.toFixed(6)}  Last run: ${last}`);
      console.log("");
      for (const s of store?.agentSummaries() ?? []) {
        console.log(
          `  ${s.agent.padEnd(16)} ${s.successes}/${s.totalRuns} ok  last ${s.lastStatus} at ${s.lastRun}  ` +
            `avg ${s.avgOutputLength} chars  $${s.estimatedCost.toFixed(6)}`,
        );
      }
    } catch (err) {
      console.error("Error:", errorMessage(err));
      process.exitCode = 1;
    } finally {
      store?.close();
    }
  });

// --- prune ---
program
  .command("prune")
  .description("Delete outputs and recorded runs older than the retention window")
  .option("-c, --config <path>", "Config file", DEFAULT_CONFIG_PATH)
  .option("-o, --output <dir>", "Output directory (default: outputs.directory)")
  .option("--db <path>", "Run history database")
  .option("-d, --days <n>", "Retention in days (default: outputs.retentionDays)")
  .action(async (opts: { config: string; output?: string; db?: string; days?: string }) => {
    let store: RunStore | undefined;
    try {
      const settings = await prepare({ ...opts, store: true });
      const days = opts.days !== undefined ? Number(opts.days) : settings.file.outputs.retentionDays;
      if (!Number.isFinite(days) || days < 0) throw new Error(`Invalid retention: ${opts.days}`);

      const now = Date.now();
      const files = await writerFor(settings, opts).prune(days, now);
      store = openStore(settings, { store: true, db: opts.db });
      const runs = store?.deleteOlderThan(now - days * 24 * 60 * 60 * 1000) ?? 0;
      console.log(`Deleted ${files.length} output files and ${runs} recorded runs older than ${days} days.`);
    } catch (err) {
      console.error("Prune failed:", errorMessage(err));
      process.exitCode = 1;
    } finally {
      store?.close();
    }
  });

(async () => {
  try {
    await program.parseAsync();
  } catch (err) {
    console.error(errorMessage(err));
    process.exit(1);
  }
})().catch(() => {});
