// Log types and structured entries
// Console output is filtered by LOG_LEVEL (default info); warn/error can also go to a JSON-lines file.

/** debug < info < warn < error */
export type LogLevel = "error" | "warn" | "info" | "debug";

/** Log category, one per pipeline module */
export type LogCategory =
  | "config"    // configuration loading and validation
  | "browser"   // Chrome launch, page setup, navigation
  | "collector" // tag listing scroll loop
  | "extractor" // per-article metadata extraction
  | "storage"   // checkpoint and export files
  | "filter"    // year / tag filtering
  | "pipeline"; // stage sequencing and run summary

export interface LogEntry {
  level: LogLevel;
  category: LogCategory;
  message: string;
  payload?: Record<string, unknown>;
  /** Listing page the entry belongs to, when there is one */
  source_url?: string;
  created_at: string;
}

export interface LogConfig {
  consoleLevel: LogLevel;
  /** JSON-lines file for warn/error; undefined disables the sink */
  logFile?: string;
  fileLevel: LogLevel;
}
