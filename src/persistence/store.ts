import Database from "better-sqlite3";
import { join } from "node:path";
import { homedir } from "node:os";
import { mkdirSync } from "node:fs";
import { summarize } from "../engine/aggregate.js";
import { ResultStatusSchema, StoredResultsSchema } from "../schemas.js";
import { estimateCost, roundTo, type CostRates } from "./cost.js";
import type { AgentSummary, RunRecord, StoreStats } from "./types.js";

const DEFAULT_DB_DIR = join(homedir(), ".agent-batch-runner");
const DEFAULT_DB_PATH = join(DEFAULT_DB_DIR, "runs.db");

export class RunStore {
  private db: Database.Database;
  private rates?: CostRates;

  constructor(dbPath?: string, opts?: { rates?: CostRates }) {
    const path = dbPath ?? DEFAULT_DB_PATH;
    if (!dbPath) {
      mkdirSync(DEFAULT_DB_DIR, { recursive: true });
    }
    this.rates = opts?.rates;
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id       TEXT PRIMARY KEY,
        mode         TEXT NOT NULL,
        backend_mode TEXT NOT NULL,
        parallel     INTEGER NOT NULL DEFAULT 0,
        results      TEXT NOT NULL DEFAULT '[]',
        succeeded    INTEGER NOT NULL DEFAULT 0,
        failed       INTEGER NOT NULL DEFAULT 0,
        started_at   INTEGER NOT NULL,
        finished_at  INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC);

      CREATE TABLE IF NOT EXISTS agent_results (
        run_id         TEXT NOT NULL,
        position       INTEGER NOT NULL,
        agent          TEXT NOT NULL,
        status         TEXT NOT NULL,
        backend        TEXT NOT NULL,
        output_length  INTEGER NOT NULL DEFAULT 0,
        estimated_cost REAL NOT NULL DEFAULT 0,
        completed_at   TEXT NOT NULL,
        PRIMARY KEY (run_id, position)
      );
      CREATE INDEX IF NOT EXISTS idx_agent_results_agent ON agent_results(agent, completed_at DESC);
    `);
  }

  insert(run: RunRecord): void {
    const insertRun = this.db.prepare(`
      INSERT OR REPLACE INTO runs (run_id, mode, backend_mode, parallel, results, succeeded, failed, started_at, finished_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const clearResults = this.db.prepare("DELETE FROM agent_results WHERE run_id = ?");
    const insertResult = this.db.prepare(`
      INSERT INTO agent_results (run_id, position, agent, status, backend, output_length, estimated_cost, completed_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.db.transaction(() => {
      insertRun.run(
        run.runId,
        run.mode,
        run.backendMode,
        run.parallel ? 1 : 0,
        JSON.stringify(run.results),
        run.summary.succeeded,
        run.summary.failed,
        run.startedAt,
        run.finishedAt,
      );
      clearResults.run(run.runId);
      run.results.forEach((result, position) => {
        insertResult.run(
          run.runId,
          position,
          result.agentName,
          result.status,
          result.backendLabel,
          result.status === "success" ? result.output.length : 0,
          estimateCost(result, this.rates),
          result.completedAt,
        );
      });
    })();
  }

  get(runId: string): RunRecord | undefined {
    const row = this.db.prepare("SELECT * FROM runs WHERE run_id = ?").get(runId) as RunRow | undefined;
    return row ? rowToRecord(row) : undefined;
  }

  /** Most recent runs first. */
  list(limit = 50): RunRecord[] {
    const rows = this.db.prepare("SELECT * FROM runs ORDER BY started_at DESC LIMIT ?").all(limit) as RunRow[];
    return rows.map(rowToRecord);
  }

  /** Delete a specific run by ID. Returns true if deleted. */
  delete(runId: string): boolean {
    return this.db.transaction(() => {
      this.db.prepare("DELETE FROM agent_results WHERE run_id = ?").run(runId);
      return this.db.prepare("DELETE FROM runs WHERE run_id = ?").run(runId).changes > 0;
    })();
  }

  /** Delete runs started before a given timestamp. Returns the count deleted. */
  deleteOlderThan(timestamp: number): number {
    return this.db.transaction(() => {
      this.db
        .prepare("DELETE FROM agent_results WHERE run_id IN (SELECT run_id FROM runs WHERE started_at < ?)")
        .run(timestamp);
      return this.db.prepare("DELETE FROM runs WHERE started_at < ?").run(timestamp).changes;
    })();
  }

  stats(): StoreStats {
    const runs = this.db
      .prepare("SELECT COUNT(*) AS total_runs, MAX(started_at) AS last_run FROM runs")
      .get() as { total_runs: number; last_run: number | null };
    const agents = this.db
      .prepare(`
        SELECT COUNT(*) AS total,
               COALESCE(SUM(CASE WHEN status = 'success' THEN 1 ELSE 0 END), 0) AS successes,
               COALESCE(SUM(estimated_cost), 0) AS cost
        FROM agent_results
      `)
      .get() as { total: number; successes: number; cost: number };

    return {
      totalRuns: runs.total_runs,
      totalAgentsRun: agents.total,
      successRate: agents.total > 0 ? roundTo((agents.successes / agents.total) * 100, 1) : 0,
      estimatedCost: roundTo(agents.cost, 6),
      lastRunAt: runs.last_run ?? undefined,
    };
  }

  /** One line per agent name, alphabetical. */
  agentSummaries(): AgentSummary[] {
    const rows = this.db
      .prepare(`
        SELECT agent,
               COUNT(*) AS total_runs,
               SUM(CASE WHEN status = 'success' THEN 1 ELSE 0 END) AS successes,
               SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) AS failures,
               MAX(completed_at) AS last_run,
               AVG(output_length) AS avg_output_length,
               SUM(estimated_cost) AS cost
        FROM agent_results
        GROUP BY agent
        ORDER BY agent
      `)
      .all() as AgentSummaryRow[];
    const lastStatus = this.db.prepare(
      "SELECT status FROM agent_results WHERE agent = ? ORDER BY completed_at DESC, rowid DESC LIMIT 1",
    );

    return rows.map((row) => {
      const last = lastStatus.get(row.agent) as { status: string };
      return {
        agent: row.agent,
        totalRuns: row.total_runs,
        successes: row.successes,
        failures: row.failures,
        lastRun: row.last_run,
        lastStatus: ResultStatusSchema.parse(last.status),
        avgOutputLength: Math.round(row.avg_output_length),
        estimatedCost: roundTo(row.cost, 6),
      };
    });
  }

  close(): void {
    this.db.close();
  }
}

type RunRow = {
  run_id: string;
  mode: string;
  backend_mode: string;
  parallel: number;
  results: string;
  succeeded: number;
  failed: number;
  started_at: number;
  finished_at: number;
};

type AgentSummaryRow = {
  agent: string;
  total_runs: number;
  successes: number;
  failures: number;
  last_run: string;
  avg_output_length: number;
  cost: number;
};

function rowToRecord(row: RunRow): RunRecord {
  const results = StoredResultsSchema.parse(JSON.parse(row.results));
  return {
    runId: row.run_id,
    mode: row.mode,
    backendMode: row.backend_mode,
    parallel: row.parallel === 1,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    results,
    summary: summarize(results),
  };
}
