// Shared logger: leveled console output, one line per entry

import { getConsoleLevel, shouldLogToConsole } from "./config.js";
import type { LogCategory, LogEntry, LogLevel, LogPayloadConvention } from "./types.js";

export type { LogCategory, LogEntry, LogLevel } from "./types.js";

/** `[category] message {payload}`; the payload is left off when empty */
export function formatConsole(entry: LogEntry): string {
  const head = `[${entry.category}] ${entry.message}`;
  return entry.payload ? `${head} ${JSON.stringify(entry.payload)}` : head;
}

const sinks: Record<LogLevel, (line: string) => void> = {
  error: (line) => console.error(line),
  warn: (line) => console.warn(line),
  info: (line) => console.log(line),
  debug: (line) => console.log(line),
};

function emit(level: LogLevel, category: LogCategory, message: string, meta?: LogPayloadConvention): void {
  if (!shouldLogToConsole(getConsoleLevel(), level)) return;
  const payload = meta && Object.keys(meta).length > 0 ? { ...meta } : undefined;
  sinks[level](formatConsole({ level, category, message, payload, created_at: new Date().toISOString() }));
}

/** Turn anything caught into a loggable message */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Shared logger; console output filtered by LOG_LEVEL */
export const logger = {
  error(category: LogCategory, message: string, meta?: LogPayloadConvention) {
    emit("error", category, message, meta);
  },
  warn(category: LogCategory, message: string, meta?: LogPayloadConvention) {
    emit("warn", category, message, meta);
  },
  info(category: LogCategory, message: string, meta?: LogPayloadConvention) {
    emit("info", category, message, meta);
  },
  debug(category: LogCategory, message: string, meta?: LogPayloadConvention) {
    emit("debug", category, message, meta);
  },
};
