// Config
export { buildEngineConfig, defaults } from "./config.js";
export type { EngineConfig, DeepPartial } from "./config.js";
export {
  DEFAULT_CONFIG_PATH,
  loadFileConfig,
  loadSettings,
  resolveSettings,
  engineConfigFrom,
  parseFlag,
} from "./settings.js";
export type { Settings } from "./settings.js";

// Errors
export {
  OrchestratorError,
  ConfigError,
  BackendError,
  TimeoutError,
  ExecutionUnitFault,
  errorMessage,
} from "./errors.js";
export type { ErrorCode, ConfigErrorCode, BackendErrorCode, BackendErrorDetails } from "./errors.js";

// Schemas
export { parseOrThrow, FileConfigSchema, MessageResponseSchema } from "./schemas.js";
export type { FileConfig, AgentGroupConfig, TeamDefinition, OutputFormat } from "./schemas.js";

// Backends
export { BACKEND_MODES } from "./backends/types.js";
export type {
  Backend,
  BackendKind,
  BackendMode,
  BackendSettings,
  DirectBackend,
  SubprocessBackend,
  HybridBackend,
  TeamSubprocessBackend,
  Dispatcher,
  Environment,
} from "./backends/types.js";
export { resolveBackend, resolveBackendForTask, parseBackendMode, isBackendMode } from "./backends/resolver.js";
export type { ResolverContext } from "./backends/resolver.js";
export { sendPrompt } from "./backends/dispatch.js";
export { sendDirect, buildMessageRequest } from "./backends/direct.js";
export { sendSubprocess, sendTeamSubprocess, resolveTeamExecutable } from "./backends/subprocess.js";
export { sendHybrid } from "./backends/hybrid.js";

// Engine
export { ExecutionEngine, strategyOf } from "./engine/engine.js";
export { withTimeout, isValidTimeout, MAX_TIMEOUT_SECONDS } from "./engine/timeout.js";
export { summarize } from "./engine/aggregate.js";
export type { OutcomeSummary } from "./engine/aggregate.js";
export { successResult, failedResult, isSuccess } from "./engine/result.js";
export type {
  AgentTask,
  AgentResult,
  SuccessResult,
  FailedResult,
  ResultStatus,
  BatchOutcome,
  ExecutionStrategy,
  EngineCallbacks,
  EngineOptions,
  RunOptions,
} from "./engine/types.js";

// Catalog
export { MODE_CATALOG, DEFAULT_RUN_MODE, isRunMode, tasksForMode, teamTask } from "./catalog.js";
export type { RunMode, AgentGroup } from "./catalog.js";

// Persistence
export { RunStore } from "./persistence/store.js";
export { OutputWriter, renderSummary, resultsDocument, formatStamp } from "./persistence/output-writer.js";
export type { OutputWriterOptions } from "./persistence/output-writer.js";
export type { RunRecord, StoreStats, AgentSummary } from "./persistence/types.js";
export { estimateCost, DEFAULT_COST_RATES } from "./persistence/cost.js";
export type { CostRates } from "./persistence/cost.js";

// Core
export { Orchestrator } from "./orchestrator.js";
export type { OrchestratorOptions, BatchRunOptions } from "./orchestrator.js";

// Utils
export { log, createLogger, setLogLevel, setLogFormat, parseLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel, LogFormat } from "./utils/logger.js";
