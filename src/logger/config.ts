// Logger settings read straight from the environment so logging works before config is loaded

import type { LogLevel } from "./types.js";

const LEVEL_ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(s: string): s is LogLevel {
  return (LEVEL_ORDER as string[]).includes(s);
}

export function parseLevel(s: string | undefined, fallback: LogLevel): LogLevel {
  if (!s) return fallback;
  const v = s.toLowerCase();
  return isLogLevel(v) ? v : fallback;
}

/** Lowest level printed to the console (default info) */
export function getConsoleLevel(): LogLevel {
  return parseLevel(process.env.LOG_LEVEL, "info");
}

export function levelOrder(l: LogLevel): number {
  return LEVEL_ORDER.indexOf(l);
}

/** Whether an entry at entryLevel should be printed */
export function shouldLogToConsole(consoleLevel: LogLevel, entryLevel: LogLevel): boolean {
  return levelOrder(entryLevel) >= levelOrder(consoleLevel);
}
