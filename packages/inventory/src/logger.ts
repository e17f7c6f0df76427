import type { LogLevel } from "./types";

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

export interface LoggerOptions {
  level: LogLevel;
  write?: (message: string) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

// stdout carries command output, so diagnostics go to stderr.
export function createLogger(options: LoggerOptions): Logger {
  const write = options.write ?? console.error;
  const threshold = LEVEL_RANK[options.level];

  const emit = (level: LogLevel, message: string): void => {
    if (LEVEL_RANK[level] < threshold) {
      return;
    }

    write(level === "info" ? message : `${level}: ${message}`);
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message)
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
