// Category logger: console filtered by level, warn/error optionally appended to a JSON-lines file

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { readLogConfig, shouldLogToConsole, shouldLogToFile } from "./config.js";
import type { LogCategory, LogEntry, LogLevel } from "./types.js";

export type { LogCategory, LogEntry, LogLevel, LogConfig } from "./types.js";
export { levelOrder, readLogConfig } from "./config.js";

type LogMeta = { source_url?: string; [k: string]: unknown };

function now(): string {
  return new Date().toISOString();
}

export function formatConsole(entry: LogEntry): string {
  const tag = `[${entry.category}]`;
  const payloadStr =
    entry.payload != null && Object.keys(entry.payload).length > 0
      ? " " + JSON.stringify(entry.payload)
      : "";
  return `${tag} ${entry.message}${payloadStr}`;
}

function writeConsole(entry: LogEntry): void {
  const line = formatConsole(entry);
  if (entry.level === "error") {
    console.error(line);
  } else if (entry.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function writeFile(path: string, entry: LogEntry): void {
  try {
    mkdirSync(dirname(path), { recursive: true });
    appendFileSync(path, JSON.stringify(entry) + "\n", "utf-8");
  } catch (err) {
    // stderr only, logging here would recurse
    process.stderr.write(`[logger] failed to append to ${path}: ${err instanceof Error ? err.message : String(err)}\n`);
  }
}

function emit(level: LogLevel, category: LogCategory, message: string, meta?: LogMeta): void {
  const source_url = meta?.source_url;
  const payload = meta && Object.keys(meta).length > 0 ? { ...meta } : undefined;
  if (payload?.source_url !== undefined) delete payload.source_url;
  const entry: LogEntry = {
    level,
    category,
    message,
    payload: payload && Object.keys(payload).length > 0 ? payload : undefined,
    source_url,
    created_at: now(),
  };

  const config = readLogConfig();
  if (shouldLogToConsole(config.consoleLevel, level)) {
    writeConsole(entry);
  }
  if (config.logFile != null && shouldLogToFile(config.logFile, config.fileLevel, level)) {
    writeFile(config.logFile, entry);
  }
}

/** Turn an unknown thrown value into the `err` payload string */
export function errMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export const logger = {
  error(category: LogCategory, message: string, meta?: LogMeta) {
    emit("error", category, message, meta);
  },
  warn(category: LogCategory, message: string, meta?: LogMeta) {
    emit("warn", category, message, meta);
  },
  info(category: LogCategory, message: string, meta?: LogMeta) {
    emit("info", category, message, meta);
  },
  debug(category: LogCategory, message: string, meta?: LogMeta) {
    emit("debug", category, message, meta);
  },
};
