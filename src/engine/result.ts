import type { AgentResult, FailedResult, SuccessResult } from "./types.js";

type Timing = { backendLabel: string; startedAt: number };

export function successResult(agentName: string, output: string, timing: Timing): SuccessResult {
  const result: SuccessResult = {
    agentName,
    status: "success",
    output,
    backendLabel: timing.backendLabel,
    completedAt: new Date().toISOString(),
    durationMs: Date.now() - timing.startedAt,
  };
  return Object.freeze(result);
}

export function failedResult(agentName: string, errorMessage: string, timing: Timing): FailedResult {
  const result: FailedResult = {
    agentName,
    status: "failed",
    errorMessage,
    backendLabel: timing.backendLabel,
    completedAt: new Date().toISOString(),
    durationMs: Date.now() - timing.startedAt,
  };
  return Object.freeze(result);
}

export function isSuccess(result: AgentResult): result is SuccessResult {
  return result.status === "success";
}
