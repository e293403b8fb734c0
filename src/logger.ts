// Console-backed logging shared by every component.
// Components take an optional Logger so tests can pass silent vi.fn() loggers.

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minimumLevel: LogLevel = "info";

/** Set the process-wide minimum level for console loggers. */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];
}

/**
 * Creates a logger that prints `[LEVEL] [component] message`.
 * warn and error go to stderr.
 */
export function createLogger(component: string): Logger {
  const prefix = (level: string) => `[${level}] [${component}]`;
  return {
    debug: (msg, ...args) => {
      if (enabled("debug")) console.log(`${prefix("DEBUG")} ${msg}`, ...args);
    },
    info: (msg, ...args) => {
      if (enabled("info")) console.log(`${prefix("INFO")} ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled("warn")) console.warn(`${prefix("WARN")} ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled("error")) console.error(`${prefix("ERROR")} ${msg}`, ...args);
    },
  };
}

/** Extracts a printable message from anything thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
