export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function describeError(error: unknown): unknown {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return error;
}

function emit(level: LogLevel, message: string, meta?: LogMeta): void {
  const payload = JSON.stringify({
    level,
    message,
    ts: new Date().toISOString(),
    ...meta,
    ...(meta && "error" in meta ? { error: describeError(meta.error) } : {}),
  });
  if (level === "error") {
    console.error(payload);
  } else if (level === "warn") {
    console.warn(payload);
  } else {
    console.log(payload);
  }
}

export function createLogger(level: LogLevel): Logger {
  const threshold = levelWeights[level];
  const shouldLog = (candidate: LogLevel) => levelWeights[candidate] >= threshold;
  return {
    debug: (message, meta) => {
      if (shouldLog("debug")) emit("debug", message, meta);
    },
    info: (message, meta) => {
      if (shouldLog("info")) emit("info", message, meta);
    },
    warn: (message, meta) => {
      if (shouldLog("warn")) emit("warn", message, meta);
    },
    error: (message, meta) => emit("error", message, meta),
  };
}
