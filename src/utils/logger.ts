export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = "text" | "json";

type LogData = Record<string, unknown>;

export type Logger = {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "info";
let currentFormat: LogFormat = "text";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function setLogFormat(format: LogFormat): void {
  currentFormat = format;
}

/** Accepts config and env spellings such as "INFO" or "warning". */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.trim().toLowerCase()) {
    case "debug":
    case "trace":
      return "debug";
    case "info":
      return "info";
    case "warn":
    case "warning":
      return "warn";
    case "error":
      return "error";
    default:
      return undefined;
  }
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function formatMsg(level: LogLevel, msg: string, data?: LogData, scope?: string): string {
  const ts = new Date().toISOString();
  if (currentFormat === "json") {
    return JSON.stringify({ ts, level, ...(scope ? { scope } : {}), msg, ...data });
  }
  const prefix = scope ? `[${scope}] ` : "";
  const base = `${ts} [${level.toUpperCase()}] ${prefix}${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

export function createLogger(scope?: string): Logger {
  return {
    debug(msg, data) {
      if (shouldLog("debug")) console.debug(formatMsg("debug", msg, data, scope));
    },
    info(msg, data) {
      if (shouldLog("info")) console.info(formatMsg("info", msg, data, scope));
    },
    warn(msg, data) {
      if (shouldLog("warn")) console.warn(formatMsg("warn", msg, data, scope));
    },
    error(msg, data) {
      if (shouldLog("error")) console.error(formatMsg("error", msg, data, scope));
    },
  };
}

export const log: Logger = createLogger();
