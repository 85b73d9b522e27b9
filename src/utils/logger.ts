export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

let processLevel: LogLevel = resolveEnvLevel(process.env["LOG_LEVEL"]);

function resolveEnvLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  return value && isLogLevel(value) ? value : "info";
}

/** Sets the minimum level for every logger created without its own `minLevel`. */
export function setLogLevel(level: LogLevel): void {
  processLevel = level;
}

export function getLogLevel(): LogLevel {
  return processLevel;
}

export function createLogger(module: string, minLevel?: LogLevel) {
  function log(level: LogLevel, message: string, data?: Record<string, unknown>) {
    const threshold = minLevel ?? processLevel;
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

    const entry = {
      timestamp: new Date().toISOString(),
      level,
      module,
      message,
      ...data,
    };

    switch (level) {
      case "error":
        console.error(JSON.stringify(entry));
        break;
      case "warn":
        console.warn(JSON.stringify(entry));
        break;
      default:
        console.log(JSON.stringify(entry));
    }
  }

  return {
    debug: (msg: string, data?: Record<string, unknown>) => log("debug", msg, data),
    info: (msg: string, data?: Record<string, unknown>) => log("info", msg, data),
    warn: (msg: string, data?: Record<string, unknown>) => log("warn", msg, data),
    error: (msg: string, data?: Record<string, unknown>) => log("error", msg, data),
  };
}

export type Logger = ReturnType<typeof createLogger>;
