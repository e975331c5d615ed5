export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "warn";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function formatMsg(level: LogLevel, msg: string, data?: Record<string, unknown>, scope?: string): string {
  const ts = new Date().toISOString();
  const tag = scope ? ` [${scope}]` : "";
  const base = `${ts} [${level.toUpperCase()}]${tag} ${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

export type Logger = {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  /** Logger whose messages carry `[scope]` after the level tag. */
  child(scope: string): Logger;
};

// Everything goes to stderr: stdout belongs to the tasks being run.
function createLogger(scope?: string): Logger {
  const write = (level: LogLevel, msg: string, data?: Record<string, unknown>): void => {
    if (shouldLog(level)) process.stderr.write(`${formatMsg(level, msg, data, scope)}\n`);
  };
  return {
    debug: (msg, data) => write("debug", msg, data),
    info: (msg, data) => write("info", msg, data),
    warn: (msg, data) => write("warn", msg, data),
    error: (msg, data) => write("error", msg, data),
    child: (child) => createLogger(scope ? `${scope}:${child}` : child),
  };
}

export const log: Logger = createLogger();
