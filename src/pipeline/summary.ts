// End-of-run summary, so dropped records are visible rather than silently lost

import { logger } from "../logger/index.js";
import type { RunSummary } from "./types.js";


const LABELS: [keyof RunSummary, string][] = [
  ["collected", "links collected"],
  ["uniqueLinks", "unique links"],
  ["extracted", "articles extracted"],
  ["structured", "  via structured data"],
  ["fallback", "  via page fallback"],
  ["unusable", "dropped (unusable)"],
  ["filteredOut", "filtered out"],
  ["exported", "exported"],
];


export function formatSummary(summary: RunSummary): string[] {
  const lines = [`stage: ${summary.stage}`];
  for (const [key, label] of LABELS) {
    const value = summary[key];
    if (typeof value === "number") lines.push(`${label}: ${value}`);
  }
  for (const out of summary.outputs ?? []) lines.push(`output: ${out}`);
  lines.push(`duration: ${(summary.durationMs / 1000).toFixed(1)}s`);
  return lines;
}


export function logSummary(summary: RunSummary): void {
  for (const line of formatSummary(summary)) {
    logger.info("pipeline", line);
  }
}
