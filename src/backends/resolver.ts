import { ConfigError } from "../errors.js";
import { resolveTeamExecutable } from "./subprocess.js";
import {
  BACKEND_MODES,
  type Backend,
  type BackendMode,
  type BackendSettings,
  type DirectBackend,
  type Environment,
  type SubprocessBackend,
} from "./types.js";

export type ResolverContext = {
  credential?: string;
  settings: BackendSettings;
  /** Base environment for child processes. */
  environment: Environment;
  /** Existence check for the team executable's known install path. */
  exists?: (path: string) => boolean;
};

export function isBackendMode(name: string): name is BackendMode {
  return BACKEND_MODES.some((mode) => mode === name);
}

export function parseBackendMode(name: string): BackendMode {
  if (!isBackendMode(name)) throw ConfigError.unknownMode(name);
  return name;
}

function requireCredential(mode: BackendMode, credential: string | undefined): string {
  if (!credential) throw ConfigError.missingCredential(mode);
  return credential;
}

function directBackend(apiKey: string, settings: BackendSettings): DirectBackend {
  return {
    kind: "direct",
    apiKey,
    apiUrl: settings.apiUrl,
    apiVersion: settings.apiVersion,
    model: settings.model,
    maxTokens: settings.maxTokens,
  };
}

function subprocessBackend(ctx: ResolverContext): SubprocessBackend {
  return {
    kind: "subprocess",
    executable: ctx.settings.subprocessPath,
    environment: ctx.environment,
    credentialEnvVar: ctx.settings.credentialEnvVar,
  };
}

/** Build the backend for a mode name, or fail if its preconditions are unmet. */
export function resolveBackend(modeName: string, ctx: ResolverContext): Backend {
  const mode = parseBackendMode(modeName);
  switch (mode) {
    case "api":
      return directBackend(requireCredential(mode, ctx.credential), ctx.settings);
    case "claude-code":
      return subprocessBackend(ctx);
    case "hybrid":
      return {
        kind: "hybrid",
        direct: directBackend(requireCredential(mode, ctx.credential), ctx.settings),
        subprocess: subprocessBackend(ctx),
      };
    case "agent-teams":
      return {
        kind: "team-subprocess",
        executable: resolveTeamExecutable(ctx.settings, ctx.exists),
        environment: ctx.environment,
        credentialEnvVar: ctx.settings.credentialEnvVar,
        teamFlagEnvVar: ctx.settings.teamFlagEnvVar,
      };
  }
}

/** A task's own mode wins; the global mode applies only when the task has none. */
export function resolveBackendForTask(
  taskOverride: string | undefined,
  globalMode: string,
  ctx: ResolverContext,
): { backend: Backend; label: string } {
  const label = taskOverride ?? globalMode;
  return { backend: resolveBackend(label, ctx), label };
}
