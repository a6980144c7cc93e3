// Storage adapter: per-tag link checkpoints, raw article checkpoint, extraction report, final JSON + CSV

import type { DataPaths } from "../config/index.js";
import type { ExtractionBatch } from "../extractor/index.js";
import { logger } from "../logger/index.js";
import type { ArticleRecord } from "../types/article.js";
import { toCsv } from "./csv.js";
import { readJson, toJsonText, writeJson, writeText } from "./json.js";
import { ArticleListSchema, RawLinksFileSchema, describeIssues } from "./schema.js";
import type { ExtractionReport, RawLinksFile } from "./schema.js";

export { toCsv, toCsvRow, TAG_SEPARATOR } from "./csv.js";
export { toJsonText, readJson, writeJson } from "./json.js";
export type { ExtractionReport, RawLinksFile } from "./schema.js";


/** Checkpoint of one tag's collected links */
export async function saveRawLinks(paths: DataPaths, tag: string, year: number, links: readonly string[]): Promise<string> {
  const path = paths.rawLinks(tag);
  const file: RawLinksFile = { tag, year, total_links: links.length, links: [...links] };
  await writeJson(path, file);
  logger.info("storage", "links saved", { tag, links: links.length, path });
  return path;
}


/** Links of one tag, or null when the tag was never collected */
export async function loadRawLinks(paths: DataPaths, tag: string): Promise<string[] | null> {
  const path = paths.rawLinks(tag);
  const data = await readJson(path);
  if (data === null) return null;
  const result = RawLinksFileSchema.safeParse(data);
  if (!result.success) throw new Error(`invalid link checkpoint ${path}: ${describeIssues(result.error)}`);
  return result.data.links;
}


export async function saveArticles(path: string, records: readonly ArticleRecord[]): Promise<string> {
  await writeJson(path, records);
  logger.info("storage", "articles saved", { records: records.length, path });
  return path;
}


/** Records of a JSON article file, or null when it does not exist */
export async function loadArticles(path: string): Promise<ArticleRecord[] | null> {
  const data = await readJson(path);
  if (data === null) return null;
  const result = ArticleListSchema.safeParse(data);
  if (!result.success) throw new Error(`invalid article file ${path}: ${describeIssues(result.error)}`);
  return result.data;
}


export function toExtractionReport(year: number, batch: ExtractionBatch): ExtractionReport {
  return {
    year,
    total: batch.outcomes.length,
    counts: { ...batch.counts },
    outcomes: batch.outcomes.map((o) => (o.reason ? { url: o.url, kind: o.kind, reason: o.reason } : { url: o.url, kind: o.kind })),
  };
}


export async function saveExtractionReport(path: string, report: ExtractionReport): Promise<string> {
  await writeJson(path, report);
  return path;
}


export interface ExportPaths {
  jsonPath: string;
  csvPath: string;
}


/** Write the same records to both formats; callers fix the order beforehand */
export async function exportArticles(paths: ExportPaths, records: readonly ArticleRecord[]): Promise<ExportPaths> {
  await writeText(paths.jsonPath, toJsonText(records));
  await writeText(paths.csvPath, toCsv(records));
  logger.info("storage", "export written", { records: records.length, json: paths.jsonPath, csv: paths.csvPath });
  return paths;
}
