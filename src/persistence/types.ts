import type { OutcomeSummary } from "../engine/aggregate.js";
import type { BatchOutcome, ResultStatus } from "../engine/types.js";

/** One finished run, as handed to the writers. */
export type RunRecord = {
  runId: string;
  /** Task set that ran (auto, research, team name, ...). */
  mode: string;
  /** Global backend mode. */
  backendMode: string;
  parallel: boolean;
  startedAt: number;
  finishedAt: number;
  results: BatchOutcome;
  summary: OutcomeSummary;
};

/** Totals across every recorded run. */
export type StoreStats = {
  totalRuns: number;
  totalAgentsRun: number;
  /** Percent of agent results that succeeded, one decimal. */
  successRate: number;
  /** Estimated USD, six decimals. */
  estimatedCost: number;
  lastRunAt?: number;
};

export type AgentSummary = {
  agent: string;
  totalRuns: number;
  successes: number;
  failures: number;
  /** `completedAt` of the agent's latest result. */
  lastRun: string;
  lastStatus: ResultStatus;
  /** Mean output length in characters; failed results count as empty. */
  avgOutputLength: number;
  estimatedCost: number;
};
