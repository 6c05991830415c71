export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export function createLogger(level: LogLevel = "info", scope = "halo"): Logger {
  const enabled = (wanted: LogLevel) => LEVEL_ORDER[wanted] >= LEVEL_ORDER[level];
  const prefix = `[${scope}]`;
  return {
    level,
    debug: (message) => {
      if (enabled("debug")) console.debug(`${prefix} ${message}`);
    },
    info: (message) => {
      if (enabled("info")) console.log(`${prefix} ${message}`);
    },
    warn: (message) => {
      if (enabled("warn")) console.warn(`${prefix} ${message}`);
    },
    error: (message) => {
      if (enabled("error")) console.error(`${prefix} ${message}`);
    },
    child: (name) => createLogger(level, `${scope}:${name}`)
  };
}

export const silentLogger: Logger = createLogger("silent");

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
