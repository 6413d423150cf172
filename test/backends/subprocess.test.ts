import { EventEmitter } from "node:events";
import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  childEnvironment,
  framePrompt,
  resolveTeamExecutable,
  sendSubprocess,
  sendTeamSubprocess,
} from "../../src/backends/subprocess.js";
import type { SubprocessBackend, TeamSubprocessBackend } from "../../src/backends/types.js";
import { BackendError } from "../../src/errors.js";

const { spawnMock } = vi.hoisted(() => ({ spawnMock: vi.fn() }));

vi.mock("node:child_process", () => ({ spawn: spawnMock }));

type Exit = {
  stdout?: string;
  stderr?: string;
  code?: number | null;
  signal?: string | null;
  error?: Error;
};

/** A child process stand-in that exits on the next turn of the event loop. */
function fakeChild(exit: Exit) {
  const child = Object.assign(new EventEmitter(), {
    stdout: new EventEmitter(),
    stderr: new EventEmitter(),
  });
  setImmediate(() => {
    if (exit.error) {
      child.emit("error", exit.error);
      return;
    }
    if (exit.stdout) child.stdout.emit("data", Buffer.from(exit.stdout));
    if (exit.stderr) child.stderr.emit("data", Buffer.from(exit.stderr));
    child.emit("close", exit.code === undefined ? 0 : exit.code, exit.signal ?? null);
  });
  return child;
}

function exitWith(exit: Exit): void {
  spawnMock.mockImplementation(() => fakeChild(exit));
}

const environment = { PATH: "/usr/bin", HOME: "/home/test", ANTHROPIC_API_KEY: "test-secret", UNSET: undefined };

const subprocess: SubprocessBackend = {
  kind: "subprocess",
  executable: "/opt/agent/bin/claude",
  environment,
  credentialEnvVar: "ANTHROPIC_API_KEY",
};

const team: TeamSubprocessBackend = {
  kind: "team-subprocess",
  executable: "claude",
  environment,
  credentialEnvVar: "ANTHROPIC_API_KEY",
  teamFlagEnvVar: "CLAUDE_CODE_EXPERIMENTAL_AGENT_TEAMS",
};

beforeEach(() => {
  spawnMock.mockReset();
});

describe("framePrompt", () => {
  it("prefixes the context block", () => {
    expect(framePrompt("CONTEXT", "do it", "you are terse")).toBe("[CONTEXT: you are terse]\n\ndo it");
    expect(framePrompt("TEAM CONTEXT", "do it", "crew")).toBe("[TEAM CONTEXT: crew]\n\ndo it");
  });

  it("leaves the prompt alone without context", () => {
    expect(framePrompt("CONTEXT", "do it")).toBe("do it");
  });
});

describe("childEnvironment", () => {
  it("drops the credential and unset variables", () => {
    expect(childEnvironment(environment, "ANTHROPIC_API_KEY")).toEqual({ PATH: "/usr/bin", HOME: "/home/test" });
  });

  it("adds extra variables", () => {
    expect(childEnvironment({ PATH: "/bin" }, "ANTHROPIC_API_KEY", { FLAG: "1" })).toEqual({ PATH: "/bin", FLAG: "1" });
  });
});

describe("resolveTeamExecutable", () => {
  const settings = { teamKnownPath: "/usr/local/bin/claude", teamCommand: "claude" };

  it("prefers the explicit override", () => {
    const exists = vi.fn(() => true);
    expect(resolveTeamExecutable({ ...settings, teamExecutableOverride: "/custom/claude" }, exists)).toBe(
      "/custom/claude",
    );
    expect(exists).not.toHaveBeenCalled();
  });

  it("uses the known path when it exists", () => {
    expect(resolveTeamExecutable(settings, () => true)).toBe("/usr/local/bin/claude");
  });

  it("falls back to the bare command", () => {
    expect(resolveTeamExecutable(settings, () => false)).toBe("claude");
  });
});

describe("sendSubprocess", () => {
  it("runs the executable with the framed prompt and returns stdout", async () => {
    exitWith({ stdout: "all good\n" });

    await expect(sendSubprocess(subprocess, "check health", "be brief")).resolves.toBe("all good\n");

    expect(spawnMock).toHaveBeenCalledTimes(1);
    const [exe, args, options] = spawnMock.mock.calls[0];
    expect(exe).toBe("/opt/agent/bin/claude");
    expect(args).toEqual(["-p", "[CONTEXT: be brief]\n\ncheck health"]);
    expect(options.env).toEqual({ PATH: "/usr/bin", HOME: "/home/test" });
  });

  it("passes the prompt unchanged without context", async () => {
    exitWith({ stdout: "ok" });
    await sendSubprocess(subprocess, "check health");
    expect(spawnMock.mock.calls[0][1]).toEqual(["-p", "check health"]);
  });

  it("fails with stderr on a non-zero exit", async () => {
    exitWith({ code: 2, stdout: "partial", stderr: "  boom\n" });

    const err = await sendSubprocess(subprocess, "x").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BackendError);
    if (!(err instanceof BackendError)) return;
    expect(err.code).toBe("PROCESS_FAILED");
    expect(err.exitStatus).toBe(2);
    expect(err.message).toBe("/opt/agent/bin/claude exited with 2: boom");
  });

  it("falls back to stdout when stderr is empty", async () => {
    exitWith({ code: 1, stdout: "usage: claude -p <prompt>\n" });
    await expect(sendSubprocess(subprocess, "x")).rejects.toThrow(
      "/opt/agent/bin/claude exited with 1: usage: claude -p <prompt>",
    );
  });

  it("reports the signal when the process is killed", async () => {
    exitWith({ code: null, signal: "SIGTERM", stderr: "terminated" });
    await expect(sendSubprocess(subprocess, "x")).rejects.toThrow("/opt/agent/bin/claude exited with SIGTERM: terminated");
  });

  it("reports a process that cannot be started", async () => {
    exitWith({ error: new Error("spawn /opt/agent/bin/claude ENOENT") });

    const err = await sendSubprocess(subprocess, "x").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BackendError);
    if (!(err instanceof BackendError)) return;
    expect(err.code).toBe("SPAWN_FAILED");
    expect(err.message).toBe("Failed to execute /opt/agent/bin/claude: spawn /opt/agent/bin/claude ENOENT");
  });
});

describe("sendTeamSubprocess", () => {
  it("sets the team flag and frames the team context", async () => {
    exitWith({ stdout: "team done" });

    await expect(sendTeamSubprocess(team, "ship it", "roster")).resolves.toBe("team done");

    const [exe, args, options] = spawnMock.mock.calls[0];
    expect(exe).toBe("claude");
    expect(args).toEqual(["-p", "[TEAM CONTEXT: roster]\n\nship it"]);
    expect(options.env).toEqual({
      PATH: "/usr/bin",
      HOME: "/home/test",
      CLAUDE_CODE_EXPERIMENTAL_AGENT_TEAMS: "1",
    });
  });

  it("labels failures with the team mode", async () => {
    exitWith({ code: 3, stderr: "no teams" });
    await expect(sendTeamSubprocess(team, "x")).rejects.toThrow("claude (agent-teams) exited with 3: no teams");
  });
});
