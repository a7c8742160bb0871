export type LogLevel = "debug" | "info" | "warn" | "error";

/** `stderr` sends every level to stderr, leaving stdout to command output */
export type LogOutput = "console" | "stderr";

let currentLevel: LogLevel = "info";
let currentOutput: LogOutput = "console";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m", // gray
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
};

const RESET = "\x1b[0m";

/**
 * Logging sink threaded through the backup and report code.
 * `child` prefixes every message with a scope such as a repository name.
 */
export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  child(scope: string): Logger;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function setLogOutput(output: LogOutput): void {
  currentOutput = output;
}

export function getLogOutput(): LogOutput {
  return currentOutput;
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

function formatData(data: unknown): string {
  if (data instanceof Error) {
    return data.message;
  }
  if (typeof data === "object" && data !== null) {
    return JSON.stringify(data, null, 2);
  }
  return String(data);
}

export function formatMessage(
  level: LogLevel,
  message: string,
  data?: unknown,
  scopes: readonly string[] = [],
): string {
  const timestamp = formatTimestamp();
  const color = LEVEL_COLORS[level];
  const levelStr = level.toUpperCase().padEnd(5);
  const scopeStr = scopes.map((s) => `[${s}] `).join("");

  let formatted = `${color}[${timestamp}] ${levelStr}${RESET} ${scopeStr}${message}`;

  if (data !== undefined) {
    formatted += ` ${formatData(data)}`;
  }

  return formatted;
}

function write(level: LogLevel, scopes: readonly string[], message: string, data?: unknown): void {
  if (!shouldLog(level)) return;
  const line = formatMessage(level, message, data, scopes);
  if (level === "error" || currentOutput === "stderr") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function createLogger(scopes: readonly string[] = []): Logger {
  return {
    debug: (message, data) => write("debug", scopes, message, data),
    info: (message, data) => write("info", scopes, message, data),
    warn: (message, data) => write("warn", scopes, message, data),
    error: (message, data) => write("error", scopes, message, data),
    child: (scope) => createLogger([...scopes, scope]),
  };
}

export const logger: Logger = createLogger();

export const debug = logger.debug;
export const info = logger.info;
export const warn = logger.warn;
export const error = logger.error;
