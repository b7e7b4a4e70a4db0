/**
 * Scoped console logger.
 *
 * Every line is prefixed with `[typolens:<scope>]`. The threshold comes from
 * TYPOLENS_LOG_LEVEL (debug | info | warn | error | silent) and defaults to
 * "warn" so library callers only hear about dropped patterns and failed loads.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  readonly scope: string;
  debug(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
}

let overrideLevel: LogLevel | null = null;

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "warn"): LogLevel {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

export function currentLogLevel(): LogLevel {
  return overrideLevel ?? parseLogLevel(process.env.TYPOLENS_LOG_LEVEL);
}

/** Force a level for the whole process (the CLI's --verbose, tests). Pass null to go back to the env. */
export function setLogLevel(level: LogLevel | null): void {
  overrideLevel = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[currentLogLevel()];
}

function emit(level: Exclude<LogLevel, "silent">, scope: string, message: string, details?: Record<string, unknown>) {
  if (!enabled(level)) return;
  const prefix = `[typolens:${scope}]`;
  const args: unknown[] = details && Object.keys(details).length > 0 ? [prefix, message, details] : [prefix, message];
  switch (level) {
    case "debug":
      console.debug(...args);
      break;
    case "info":
      console.info(...args);
      break;
    case "warn":
      console.warn(...args);
      break;
    case "error":
      console.error(...args);
      break;
  }
}

export function createLogger(scope: string): Logger {
  return {
    scope,
    debug: (message, details) => emit("debug", scope, message, details),
    info: (message, details) => emit("info", scope, message, details),
    warn: (message, details) => emit("warn", scope, message, details),
    error: (message, details) => emit("error", scope, message, details),
  };
}
