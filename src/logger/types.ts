// Log levels and structured entries
// Console output is filtered by LOG_LEVEL (default info) so scheduled runs stay quiet.

/** Log level, ordered debug < info < warn < error */
export type LogLevel = "error" | "warn" | "info" | "debug";

/** Log category: which module emitted the entry */
export type LogCategory =
  | "fetcher"   // paginated story API
  | "sanitizer" // HTML cleaning and text extraction
  | "feed"      // feed assembly and serialization
  | "writer"    // output file
  | "feeder"    // one generation run
  | "scheduler" // periodic regeneration
  | "app"       // HTTP server and CLI
  | "config";   // environment configuration

/** Conventional payload fields (not enforced) */
export interface LogPayloadConvention {
  /** Error message, never the whole Error object */
  err?: string;
  /** Page number of the story API */
  page?: number;
  /** Story id the entry is about */
  story_id?: string;
  [k: string]: unknown;
}

/** One structured log line */
export interface LogEntry {
  level: LogLevel;
  category: LogCategory;
  message: string;
  payload?: Record<string, unknown>;
  created_at: string;
}
