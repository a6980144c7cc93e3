// Logger settings come from env only, so logging works before config.json is loaded

import type { LogConfig, LogLevel } from "./types.js";

const LEVEL_ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(s: string): s is LogLevel {
  return LEVEL_ORDER.some((l) => l === s);
}

function parseLevel(s: string | undefined, fallback: LogLevel): LogLevel {
  if (!s) return fallback;
  const v = s.toLowerCase();
  return isLogLevel(v) ? v : fallback;
}

/** Console threshold (default info) */
export function getConsoleLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  return parseLevel(env.LOG_LEVEL, "info");
}

/** JSON-lines sink path; unset or empty disables it */
export function getLogFile(env: NodeJS.ProcessEnv = process.env): string | undefined {
  const v = env.LOG_FILE?.trim();
  return v ? v : undefined;
}

/** File sink threshold (default warn) */
export function getFileLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  return parseLevel(env.LOG_FILE_LEVEL, "warn");
}

export function readLogConfig(env: NodeJS.ProcessEnv = process.env): LogConfig {
  return {
    consoleLevel: getConsoleLevel(env),
    logFile: getLogFile(env),
    fileLevel: getFileLevel(env),
  };
}

export function levelOrder(l: LogLevel): number {
  return LEVEL_ORDER.indexOf(l);
}

export function shouldLogToConsole(consoleLevel: LogLevel, entryLevel: LogLevel): boolean {
  return levelOrder(entryLevel) >= levelOrder(consoleLevel);
}

export function shouldLogToFile(logFile: string | undefined, fileLevel: LogLevel, entryLevel: LogLevel): boolean {
  return logFile != null && levelOrder(entryLevel) >= levelOrder(fileLevel);
}
