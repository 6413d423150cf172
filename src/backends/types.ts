export const BACKEND_MODES = ["api", "claude-code", "hybrid", "agent-teams"] as const;

/** Mode names accepted by the resolver, as written in config and on the CLI. */
export type BackendMode = (typeof BACKEND_MODES)[number];

/** Environment handed to child processes; never read from the ambient process here. */
export type Environment = Readonly<Record<string, string | undefined>>;

export type BackendSettings = {
  apiUrl: string;
  apiVersion: string;
  model: string;
  maxTokens: number;
  /** Executable used by the Subprocess backend and Hybrid's fallback leg. */
  subprocessPath: string;
  /** Explicit executable for the TeamSubprocess backend; wins over everything else. */
  teamExecutableOverride?: string;
  /** Installation path tried by the TeamSubprocess backend when there is no override. */
  teamKnownPath: string;
  /** Bare command name looked up through PATH as a last resort. */
  teamCommand: string;
  /** Credential variable stripped from every child environment. */
  credentialEnvVar: string;
  teamFlagEnvVar: string;
};

export type DirectBackend = {
  kind: "direct";
  apiKey: string;
  apiUrl: string;
  apiVersion: string;
  model: string;
  maxTokens: number;
};

export type SubprocessBackend = {
  kind: "subprocess";
  executable: string;
  environment: Environment;
  credentialEnvVar: string;
};

export type HybridBackend = {
  kind: "hybrid";
  direct: DirectBackend;
  subprocess: SubprocessBackend;
};

export type TeamSubprocessBackend = {
  kind: "team-subprocess";
  executable: string;
  environment: Environment;
  credentialEnvVar: string;
  teamFlagEnvVar: string;
};

export type Backend = DirectBackend | SubprocessBackend | HybridBackend | TeamSubprocessBackend;

export type BackendKind = Backend["kind"];

/** Turns a prompt and optional system context into response text. */
export type Dispatcher = (backend: Backend, prompt: string, systemContext?: string) => Promise<string>;
