import type { BatchOutcome } from "./types.js";

export type OutcomeSummary = {
  total: number;
  succeeded: number;
  failed: number;
};

export function summarize(outcome: BatchOutcome): OutcomeSummary {
  let succeeded = 0;
  let failed = 0;
  for (const result of outcome) {
    if (result.status === "success") succeeded++;
    else failed++;
  }
  return { total: outcome.length, succeeded, failed };
}
