import { readFile } from "node:fs/promises";
import type { Environment } from "./backends/types.js";
import { buildEngineConfig, type DeepPartial, type EngineConfig } from "./config.js";
import { ConfigError, errorMessage } from "./errors.js";
import { FileConfigSchema, parseOrThrow, type FileConfig } from "./schemas.js";
import { log, parseLogLevel, type LogLevel } from "./utils/logger.js";

export const DEFAULT_CONFIG_PATH = "config/orchestra.json";

/** Everything a run needs from the config file and the environment, resolved once. */
export type Settings = {
  file: FileConfig;
  /** Which task set to run: auto, research, analysis, monitoring. */
  runMode: string;
  /** Global backend mode. */
  backendMode: string;
  credential?: string;
  parallel: boolean;
  teamExecutableOverride?: string;
  logLevel: LogLevel;
  environment: Environment;
};

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Read and validate the JSON config file; a missing file yields the built-in defaults. */
export async function loadFileConfig(path: string = DEFAULT_CONFIG_PATH): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      log.warn(`Config file ${path} not found, using defaults`);
      return parseOrThrow(FileConfigSchema, {}, "config");
    }
    throw new ConfigError("INVALID_CONFIG", `Could not read ${path}: ${errorMessage(err)}`, { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError("INVALID_CONFIG", `${path} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }
  return parseOrThrow(FileConfigSchema, data, path);
}

export function parseFlag(value: string | undefined): boolean | undefined {
  switch (value?.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
    case "on":
      return true;
    case "0":
    case "false":
    case "no":
    case "off":
      return false;
    default:
      return undefined;
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value : undefined;
}

/**
 * Combine the file config with environment variables:
 * CLIENT_MODE, ANTHROPIC_API_KEY, ORCHESTRATOR_MODE, CLAUDE_CLI_PATH, PARALLEL_EXECUTION, LOG_LEVEL.
 */
export function resolveSettings(file: FileConfig, env: Environment): Settings {
  return {
    file,
    runMode: nonEmpty(env.ORCHESTRATOR_MODE) ?? file.orchestra.defaultMode,
    backendMode: nonEmpty(env.CLIENT_MODE) ?? file.client.defaultMode,
    credential: nonEmpty(env.ANTHROPIC_API_KEY),
    parallel: parseFlag(env.PARALLEL_EXECUTION) ?? file.features.parallelExecution,
    teamExecutableOverride: nonEmpty(env.CLAUDE_CLI_PATH),
    logLevel: parseLogLevel(env.LOG_LEVEL) ?? parseLogLevel(file.logging.level) ?? "info",
    environment: env,
  };
}

export async function loadSettings(opts: { configPath?: string; env: Environment }): Promise<Settings> {
  const file = await loadFileConfig(opts.configPath);
  return resolveSettings(file, opts.env);
}

export function engineConfigFrom(
  settings: Settings,
  extra: Pick<DeepPartial<EngineConfig>, "interTaskDelayMs"> = {},
): EngineConfig {
  const { backend } = settings.file;
  return buildEngineConfig({
    backendMode: settings.backendMode,
    credential: settings.credential,
    environment: settings.environment,
    backend: {
      apiUrl: backend.apiUrl,
      model: backend.model,
      maxTokens: backend.maxTokens,
      subprocessPath: backend.subprocessPath,
      teamExecutableOverride: settings.teamExecutableOverride,
    },
    ...extra,
  });
}
