import type { AgentResult } from "../engine/types.js";

export type CostRates = {
  charsPerToken: number;
  /** USD per million output tokens. */
  costPerMillionOutputTokens: number;
};

export const DEFAULT_COST_RATES: CostRates = {
  charsPerToken: 4,
  costPerMillionOutputTokens: 15,
};

/** Backends that run the local CLI and bill nothing per call. */
const LOCAL_BACKENDS: ReadonlySet<string> = new Set(["claude-code", "agent-teams"]);

/**
 * Rough USD cost of one result, from its output length. Only the response is visible,
 * so every character is priced as output.
 */
export function estimateCost(result: AgentResult, rates: CostRates = DEFAULT_COST_RATES): number {
  if (result.status !== "success" || result.output.length === 0) return 0;
  if (LOCAL_BACKENDS.has(result.backendLabel)) return 0;

  const tokens = result.output.length / rates.charsPerToken;
  return roundTo((tokens / 1_000_000) * rates.costPerMillionOutputTokens, 6);
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
