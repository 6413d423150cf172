import { sendPrompt } from "../backends/dispatch.js";
import { parseBackendMode, resolveBackend, type ResolverContext } from "../backends/resolver.js";
import type { Backend, Dispatcher } from "../backends/types.js";
import type { EngineConfig } from "../config.js";
import { ExecutionUnitFault, errorMessage } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import { failedResult, successResult } from "./result.js";
import { invalidTimeout, isValidTimeout, withTimeout } from "./timeout.js";
import type {
  AgentResult,
  AgentTask,
  BatchOutcome,
  EngineCallbacks,
  EngineOptions,
  ExecutionStrategy,
  RunOptions,
} from "./types.js";

const log = createLogger("engine");

export function strategyOf(opts?: RunOptions): ExecutionStrategy {
  return opts?.parallel ? "concurrent" : "sequential";
}

type Unit = {
  task: AgentTask;
  backendLabel: string;
  startedAt: number;
  /** Rejects only when the unit itself crashes; backend failures resolve to a failed result. */
  result: Promise<AgentResult>;
};

export class ExecutionEngine {
  private config: EngineConfig;
  private dispatch: Dispatcher;
  private resolverContext: ResolverContext;

  constructor(opts: EngineOptions) {
    // An unknown global mode can never run anything
    parseBackendMode(opts.config.backendMode);

    this.config = opts.config;
    this.dispatch = opts.dispatch ?? sendPrompt;
    this.resolverContext = {
      credential: opts.config.credential,
      settings: opts.config.backend,
      environment: opts.config.environment,
    };
  }

  get backendMode(): string {
    return this.config.backendMode;
  }

  run(tasks: readonly AgentTask[], opts?: RunOptions, callbacks?: EngineCallbacks): Promise<BatchOutcome> {
    return strategyOf(opts) === "concurrent"
      ? this.runConcurrent(tasks, callbacks)
      : this.runSequential(tasks, callbacks);
  }

  /** One task at a time, in order, pausing between tasks. */
  async runSequential(tasks: readonly AgentTask[], callbacks?: EngineCallbacks): Promise<BatchOutcome> {
    const globalBackend = this.resolveGlobal(tasks);
    log.info(`Running ${tasks.length} agents sequentially`, { backend: this.config.backendMode });

    const results: AgentResult[] = [];
    for (let i = 0; i < tasks.length; i++) {
      const unit = this.launch(tasks[i], i, globalBackend, callbacks);
      results.push(await this.settle(unit));

      if (i < tasks.length - 1 && this.config.interTaskDelayMs > 0) {
        await new Promise((r) => setTimeout(r, this.config.interTaskDelayMs));
      }
    }
    return results;
  }

  /** Every task at once, no cap; results come back in input order. */
  async runConcurrent(tasks: readonly AgentTask[], callbacks?: EngineCallbacks): Promise<BatchOutcome> {
    const globalBackend = this.resolveGlobal(tasks);
    log.info(`Running ${tasks.length} agents concurrently`, { backend: this.config.backendMode });

    const units = tasks.map((task, i) => this.launch(task, i, globalBackend, callbacks));
    const settled = await Promise.allSettled(units.map((u) => u.result));

    return settled.map((outcome, i) =>
      outcome.status === "fulfilled" ? outcome.value : this.crashResult(units[i], outcome.reason),
    );
  }

  /** Resolve the global backend once, if any task needs it. Throws ConfigError. */
  private resolveGlobal(tasks: readonly AgentTask[]): Backend | undefined {
    if (!tasks.some((t) => t.backendModeOverride === undefined)) return undefined;
    return resolveBackend(this.config.backendMode, this.resolverContext);
  }

  private launch(
    task: AgentTask,
    index: number,
    globalBackend: Backend | undefined,
    callbacks?: EngineCallbacks,
  ): Unit {
    const startedAt = Date.now();
    const backendLabel = task.backendModeOverride ?? this.config.backendMode;

    let backend: Backend;
    try {
      if (!isValidTimeout(task.timeoutSeconds)) throw invalidTimeout(task.timeoutSeconds, task.name);
      backend = task.backendModeOverride === undefined && globalBackend
        ? globalBackend
        : resolveBackend(backendLabel, this.resolverContext);
    } catch (err) {
      log.error(`Could not prepare agent "${task.name}"`, { error: errorMessage(err) });
      const failed = failedResult(task.name, errorMessage(err), { backendLabel, startedAt });
      return {
        task,
        backendLabel,
        startedAt,
        result: new Promise((resolve) => resolve(this.report(failed, index, callbacks))),
      };
    }

    return {
      task,
      backendLabel,
      startedAt,
      result: this.execute(task, index, backend, { backendLabel, startedAt }, callbacks),
    };
  }

  private async execute(
    task: AgentTask,
    index: number,
    backend: Backend,
    timing: { backendLabel: string; startedAt: number },
    callbacks?: EngineCallbacks,
  ): Promise<AgentResult> {
    callbacks?.onTaskStart?.(task, timing.backendLabel);
    log.info(`Running agent: ${task.name}`, { backend: timing.backendLabel, timeoutSeconds: task.timeoutSeconds });

    let result: AgentResult;
    try {
      const output = await withTimeout(this.invoke(backend, task), task.timeoutSeconds);
      result = successResult(task.name, output, timing);
      log.info(`Agent ${task.name} completed`, { durationMs: result.durationMs });
    } catch (err) {
      result = failedResult(task.name, errorMessage(err), timing);
      log.error(`Agent ${task.name} failed`, { error: result.errorMessage });
    }

    return this.report(result, index, callbacks);
  }

  private async invoke(backend: Backend, task: AgentTask): Promise<string> {
    return this.dispatch(backend, task.prompt, task.systemContext);
  }

  private report(result: AgentResult, index: number, callbacks?: EngineCallbacks): AgentResult {
    callbacks?.onTaskEnd?.(result, index);
    return result;
  }

  private async settle(unit: Unit): Promise<AgentResult> {
    try {
      return await unit.result;
    } catch (err) {
      return this.crashResult(unit, err);
    }
  }

  private crashResult(unit: Unit, reason: unknown): AgentResult {
    const fault = new ExecutionUnitFault(reason);
    log.error(`Execution unit for agent "${unit.task.name}" crashed`, { error: errorMessage(reason) });
    return failedResult(unit.task.name, fault.message, unit);
  }
}
