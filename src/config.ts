import type { BackendSettings, Environment } from "./backends/types.js";

export type EngineConfig = {
  /** Global backend mode; tasks without an override run on it. */
  backendMode: string;
  credential?: string;
  backend: BackendSettings;
  /** Base environment for child processes. */
  environment: Environment;
  /** Pause between tasks in sequential runs. */
  interTaskDelayMs: number;
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: EngineConfig = {
  backendMode: "claude-code",
  backend: {
    apiUrl: "https://api.anthropic.com/v1/messages",
    apiVersion: "2023-06-01",
    model: "claude-sonnet-4-20250514",
    maxTokens: 4096,
    subprocessPath: "/home/claude/.local/bin/claude",
    teamKnownPath: "/usr/local/bin/claude",
    teamCommand: "claude",
    credentialEnvVar: "ANTHROPIC_API_KEY",
    teamFlagEnvVar: "CLAUDE_CODE_EXPERIMENTAL_AGENT_TEAMS",
  },
  environment: {},
  interTaskDelayMs: 2_000,
};

function deepMerge<T extends Record<string, unknown>>(base: T, overrides: DeepPartial<T>): T {
  const result = structuredClone(base);
  for (const key of Object.keys(overrides) as (keyof T)[]) {
    const val = overrides[key];
    if (val !== undefined && typeof val === "object" && !Array.isArray(val) && val !== null) {
      (result as Record<string, unknown>)[key as string] = deepMerge(
        (result[key] ?? {}) as Record<string, unknown>,
        val as DeepPartial<Record<string, unknown>>,
      );
    } else if (val !== undefined) {
      (result as Record<string, unknown>)[key as string] = val;
    }
  }
  return result;
}

/** Build an engine config from the defaults plus overrides. Each call returns a fresh value. */
export function buildEngineConfig(overrides: DeepPartial<EngineConfig> = {}): EngineConfig {
  return deepMerge(DEFAULTS, overrides);
}

/** The default config values (frozen). */
export const defaults: Readonly<EngineConfig> = Object.freeze(structuredClone(DEFAULTS));
