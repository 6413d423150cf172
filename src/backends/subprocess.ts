import { spawn } from "node:child_process";
import { existsSync } from "node:fs";
import { BackendError, errorMessage } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import type { BackendSettings, Environment, SubprocessBackend, TeamSubprocessBackend } from "./types.js";

const log = createLogger("subprocess");

export type ProcessOutput = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
};

/** `[CONTEXT: ...]` for plain subprocess calls, `[TEAM CONTEXT: ...]` for team sessions. */
export function framePrompt(label: "CONTEXT" | "TEAM CONTEXT", prompt: string, systemContext?: string): string {
  return systemContext !== undefined ? `[${label}: ${systemContext}]\n\n${prompt}` : prompt;
}

/** Copy of `base` without the credential variable, plus `extra`. */
export function childEnvironment(
  base: Environment,
  credentialEnvVar: string,
  extra: Record<string, string> = {},
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined && key !== credentialEnvVar) env[key] = value;
  }
  return { ...env, ...extra };
}

/**
 * Override, else the known install path if it exists, else the bare command for PATH lookup.
 * Evaluated once, when the team backend is built.
 */
export function resolveTeamExecutable(
  settings: Pick<BackendSettings, "teamExecutableOverride" | "teamKnownPath" | "teamCommand">,
  exists: (path: string) => boolean = existsSync,
): string {
  if (settings.teamExecutableOverride) return settings.teamExecutableOverride;
  if (exists(settings.teamKnownPath)) return settings.teamKnownPath;
  return settings.teamCommand;
}

export function runProcess(
  executable: string,
  args: string[],
  env: Record<string, string>,
): Promise<ProcessOutput> {
  return new Promise((resolve, reject) => {
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    const child = spawn(executable, args, { env, stdio: ["ignore", "pipe", "pipe"] });

    child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.once("error", (err) => {
      reject(
        new BackendError("SPAWN_FAILED", `Failed to execute ${executable}: ${errorMessage(err)}`, {
          cause: err,
        }),
      );
    });

    child.once("close", (exitCode, signal) => {
      resolve({
        exitCode,
        signal,
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8"),
      });
    });
  });
}

function failureFrom(label: string, output: ProcessOutput): BackendError {
  const exitStatus = output.exitCode ?? output.signal ?? "unknown";
  const detail = (output.stderr.length > 0 ? output.stderr : output.stdout).trim();
  return new BackendError("PROCESS_FAILED", `${label} exited with ${exitStatus}: ${detail}`, {
    exitStatus,
    detail,
  });
}

export async function sendSubprocess(
  backend: SubprocessBackend,
  prompt: string,
  systemContext?: string,
): Promise<string> {
  const fullPrompt = framePrompt("CONTEXT", prompt, systemContext);
  const env = childEnvironment(backend.environment, backend.credentialEnvVar);

  log.debug(`Running ${backend.executable} -p`, { promptLength: fullPrompt.length });
  const output = await runProcess(backend.executable, ["-p", fullPrompt], env);

  if (output.exitCode !== 0) {
    throw failureFrom(backend.executable, output);
  }
  return output.stdout;
}

export async function sendTeamSubprocess(
  backend: TeamSubprocessBackend,
  prompt: string,
  systemContext?: string,
): Promise<string> {
  const fullPrompt = framePrompt("TEAM CONTEXT", prompt, systemContext);
  const env = childEnvironment(backend.environment, backend.credentialEnvVar, {
    [backend.teamFlagEnvVar]: "1",
  });

  log.info(`Launching ${backend.executable} with team mode enabled`);
  const output = await runProcess(backend.executable, ["-p", fullPrompt], env);

  if (output.exitCode !== 0) {
    log.error(`${backend.executable} exited with ${output.exitCode ?? output.signal}`);
    throw failureFrom(`${backend.executable} (agent-teams)`, output);
  }

  log.info(`Team session completed (${output.stdout.length} bytes output)`);
  return output.stdout;
}
