/**
 * Party Registry -- Structured Logging
 *
 * JSON lines on the console, one object per entry, so output can be fed
 * to any log aggregator unchanged.  `LOG_LEVEL=silent` mutes everything
 * (the test suite sets it).
 *
 * @module utils/logger
 * @license AGPL-3.0-or-later
 */

export type LogLevel = "INFO" | "WARN" | "ERROR";

const SEVERITY: Record<LogLevel, number> = { INFO: 0, WARN: 1, ERROR: 2 };

function threshold(): number {
  const configured = (process.env.LOG_LEVEL ?? "info").toUpperCase();
  if (configured === "SILENT") return Number.POSITIVE_INFINITY;
  if (configured === "WARN" || configured === "ERROR") return SEVERITY[configured];
  return SEVERITY.INFO;
}

export function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
  if (SEVERITY[level] < threshold()) return;

  const entry = {
    level,
    message,
    ts: Date.now(),
    ...meta,
  };

  const line = JSON.stringify(entry);
  if (level === "ERROR") {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Returns a logger that stamps every entry with a component name.
 */
export function createLogger(component: string) {
  return {
    info: (message: string, meta?: Record<string, unknown>) =>
      log("INFO", message, { component, ...meta }),
    warn: (message: string, meta?: Record<string, unknown>) =>
      log("WARN", message, { component, ...meta }),
    error: (message: string, meta?: Record<string, unknown>) =>
      log("ERROR", message, { component, ...meta }),
  };
}

export type Logger = ReturnType<typeof createLogger>;
