export type LogLevel = "info" | "warn" | "error";

export type LogFields = {
  event: string;
  week_id?: string;
  role?: string;
  day?: string;
  employee_id?: string;
  [key: string]: unknown;
};

/**
 * Structured logger used by the orchestrator and role schedulers.
 *
 * Each call emits one event; implementations decide where it goes.
 */
export interface Logger {
  info(fields: LogFields): void;
  warn(fields: LogFields): void;
  error(fields: LogFields): void;
}

function compactFields(fields: LogFields): Record<string, unknown> {
  return Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined));
}

export function formatLogLine(level: LogLevel, fields: LogFields, now: Date = new Date()): string {
  return JSON.stringify({
    ts: now.toISOString(),
    level,
    ...compactFields(fields),
  });
}

/**
 * Writes one JSON line per event to the console.
 */
export function createConsoleLogger(options: { minLevel?: LogLevel } = {}): Logger {
  const order: Record<LogLevel, number> = { info: 0, warn: 1, error: 2 };
  const min = order[options.minLevel ?? "info"];

  const emit = (level: LogLevel, fields: LogFields) => {
    if (order[level] < min) return;
    const line = formatLogLine(level, fields);
    if (level === "error") {
      console.error(line);
      return;
    }
    if (level === "warn") {
      console.warn(line);
      return;
    }
    console.info(line);
  };

  return {
    info: (fields) => emit("info", fields),
    warn: (fields) => emit("warn", fields),
    error: (fields) => emit("error", fields),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
