import { mkdir, readdir, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { strategyOf } from "../engine/engine.js";
import type { OutputFormat } from "../schemas.js";
import { log } from "../utils/logger.js";
import type { RunRecord } from "./types.js";

const RULE = "=".repeat(50);
const SEPARATOR = "─".repeat(50);
const DAY_MS = 24 * 60 * 60 * 1000;
const OUTPUT_FILE = /^(results|summary)-(\d{4})(\d{2})(\d{2})-(\d{2})(\d{2})(\d{2})\.(json|txt)$/;

export type OutputWriterOptions = {
  directory: string;
  formats: readonly OutputFormat[];
  /** Heading of the summary file. */
  title?: string;
};

/** UTC `YYYYMMDD-HHMMSS`, used in output file names. */
export function formatStamp(ms: number): string {
  const d = new Date(ms);
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}` +
    `-${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`
  );
}

/** Inverse of formatStamp for an output file name; undefined for any other file. */
export function stampOf(fileName: string): number | undefined {
  const m = OUTPUT_FILE.exec(fileName);
  if (!m) return undefined;
  const [, , y, mo, d, h, mi, s] = m;
  return Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s));
}

export function renderSummary(record: RunRecord, title = "Agent Orchestra"): string {
  const lines = [
    `${title} Run Summary`,
    RULE,
    "",
    `Timestamp: ${formatStamp(record.startedAt)}`,
    `Mode: ${record.mode}`,
    `Backend: ${record.backendMode}`,
    `Execution: ${strategyOf({ parallel: record.parallel })}`,
    `Total Agents: ${record.summary.total}`,
    `Successful: ${record.summary.succeeded}`,
    `Failed: ${record.summary.failed}`,
    "",
  ];

  for (const result of record.results) {
    lines.push("", SEPARATOR, `Agent: ${result.agentName}`, `Status: ${result.status}`);
    if (result.status === "success") {
      lines.push(`Output:\n${result.output}`);
    } else {
      lines.push(`Error: ${result.errorMessage}`);
    }
  }

  return `${lines.join("\n")}\n`;
}

export function resultsDocument(record: RunRecord): string {
  return JSON.stringify(
    {
      runId: record.runId,
      timestamp: new Date(record.startedAt).toISOString(),
      mode: record.mode,
      backendMode: record.backendMode,
      parallel: record.parallel,
      summary: record.summary,
      results: record.results,
    },
    null,
    2,
  );
}

export class OutputWriter {
  private directory: string;
  private formats: readonly OutputFormat[];
  private title?: string;

  constructor(opts: OutputWriterOptions) {
    this.directory = opts.directory;
    this.formats = opts.formats;
    this.title = opts.title;
  }

  /** Write the configured formats for one run. Returns the written paths. */
  async write(record: RunRecord): Promise<string[]> {
    await mkdir(this.directory, { recursive: true });
    const stamp = formatStamp(record.startedAt);
    const written: string[] = [];

    if (this.formats.includes("json")) {
      const path = join(this.directory, `results-${stamp}.json`);
      await writeFile(path, resultsDocument(record), "utf-8");
      log.info(`Results saved to ${path}`);
      written.push(path);
    }

    if (this.formats.includes("txt")) {
      const path = join(this.directory, `summary-${stamp}.txt`);
      await writeFile(path, renderSummary(record, this.title), "utf-8");
      log.info(`Summary saved to ${path}`);
      written.push(path);
    }

    return written;
  }

  /** Delete result and summary files stamped before the retention window. */
  async prune(retentionDays: number, now = Date.now()): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw err;
    }

    const cutoff = now - retentionDays * DAY_MS;
    const deleted: string[] = [];
    for (const name of names.sort()) {
      const stamp = stampOf(name);
      if (stamp === undefined || stamp >= cutoff) continue;
      const path = join(this.directory, name);
      await unlink(path);
      deleted.push(path);
    }

    if (deleted.length > 0) log.info(`Pruned ${deleted.length} output files older than ${retentionDays} days`);
    return deleted;
  }
}
