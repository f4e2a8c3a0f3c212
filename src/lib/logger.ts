export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function createLogger(level: LogLevel = "info"): Logger {
  const enabled = (target: LogLevel) =>
    LEVEL_ORDER[target] >= LEVEL_ORDER[level];
  return {
    debug: (message, ...details) => {
      if (enabled("debug")) console.debug(message, ...details);
    },
    info: (message, ...details) => {
      if (enabled("info")) console.log(message, ...details);
    },
    warn: (message, ...details) => {
      if (enabled("warn")) console.warn(message, ...details);
    },
    error: (message, ...details) => {
      if (enabled("error")) console.error(message, ...details);
    },
  };
}

export const silentLogger: Logger = createLogger("silent");
