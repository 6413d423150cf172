import type { Dispatcher } from "../backends/types.js";
import type { EngineConfig } from "../config.js";

export type AgentTask = {
  readonly name: string;
  readonly prompt: string;
  /** Wall-clock budget for the backend call. Positive integer. */
  readonly timeoutSeconds: number;
  /** Backend mode for this task only; the batch's global mode applies when absent. */
  readonly backendModeOverride?: string;
  /** Role framing, applied by the backend. */
  readonly systemContext?: string;
};

type ResultBase = {
  readonly agentName: string;
  /** Mode name actually used, override or global. */
  readonly backendLabel: string;
  readonly completedAt: string;
  readonly durationMs: number;
};

export type SuccessResult = ResultBase & {
  readonly status: "success";
  readonly output: string;
};

export type FailedResult = ResultBase & {
  readonly status: "failed";
  readonly errorMessage: string;
};

export type AgentResult = SuccessResult | FailedResult;

export type ResultStatus = AgentResult["status"];

/** Results in input task order. */
export type BatchOutcome = readonly AgentResult[];

export type ExecutionStrategy = "sequential" | "concurrent";

export type EngineCallbacks = {
  onTaskStart?: (task: AgentTask, backendLabel: string) => void;
  onTaskEnd?: (result: AgentResult, index: number) => void;
};

export type EngineOptions = {
  config: EngineConfig;
  /** Replaces the backend dispatch (for testing). */
  dispatch?: Dispatcher;
};

export type RunOptions = {
  parallel?: boolean;
};
