/* eslint-disable no-console */

export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function threshold(): number {
  const raw = String(process.env.LOG_LEVEL ?? "info").trim().toLowerCase();
  return raw === "debug" || raw === "info" || raw === "warn" || raw === "error" ? ORDER[raw] : ORDER.info;
}

export type Logger = {
  debug(event: string, details?: Record<string, unknown>): void;
  info(event: string, details?: Record<string, unknown>): void;
  warn(event: string, details?: Record<string, unknown>): void;
  error(event: string, details?: Record<string, unknown>): void;
};

/**
 * One line per event: `[tag] event {"json":"details"}`.
 */
export function createLogger(tag: string): Logger {
  const emit = (level: LogLevel, event: string, details?: Record<string, unknown>) => {
    if (ORDER[level] < threshold()) return;
    const payload = details ? ` ${JSON.stringify(details)}` : "";
    const line = `[${tag}] ${event}${payload}`;
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
  };
  return {
    debug: (event, details) => emit("debug", event, details),
    info: (event, details) => emit("info", event, details),
    warn: (event, details) => emit("warn", event, details),
    error: (event, details) => emit("error", event, details),
  };
}

export function errorDetails(e: unknown): Record<string, unknown> {
  if (e instanceof Error) return { name: e.name, message: e.message };
  return { message: String(e) };
}
