// Filter & export: year equality plus the full required tag set, stable order, two formats

import { yearOf } from "../extractor/index.js";
import { logger } from "../logger/index.js";
import { exportArticles } from "../storage/index.js";
import type { ExportPaths } from "../storage/index.js";
import type { ArticleRecord } from "../types/article.js";
import { uniqueTagSlugs } from "../types/tags.js";


export interface FilterCriteria {
  year: number;
  /** Every one of these must be present (compared as slugs) */
  requiredTags: readonly string[];
}


/** year(publication_date) == year AND requiredTags ⊆ tags */
export function matchesCriteria(record: ArticleRecord, criteria: FilterCriteria): boolean {
  if (yearOf(record.publication_date) !== criteria.year) return false;
  const tags = new Set(uniqueTagSlugs(record.tags));
  return uniqueTagSlugs(criteria.requiredTags).every((t) => tags.has(t));
}


function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}


/** publication_date ascending, then url; code-unit comparison so the order does not depend on locale */
export function compareArticles(a: ArticleRecord, b: ArticleRecord): number {
  return compareStrings(a.publication_date, b.publication_date) || compareStrings(a.url, b.url);
}


/** New array, inputs untouched */
export function sortArticles(records: readonly ArticleRecord[]): ArticleRecord[] {
  return [...records].sort(compareArticles);
}


/** Matching records in export order; the same URL is kept once */
export function filterArticles(records: readonly ArticleRecord[], criteria: FilterCriteria): ArticleRecord[] {
  const byUrl = new Map<string, ArticleRecord>();
  for (const record of records) {
    if (!matchesCriteria(record, criteria)) continue;
    if (!byUrl.has(record.url)) byUrl.set(record.url, record);
  }
  return sortArticles([...byUrl.values()]);
}


export interface FilterExportResult extends ExportPaths {
  records: ArticleRecord[];
  /** Input records that did not pass */
  dropped: number;
}


export async function filterAndExport(
  records: readonly ArticleRecord[],
  criteria: FilterCriteria,
  paths: ExportPaths
): Promise<FilterExportResult> {
  const kept = filterArticles(records, criteria);
  logger.info("filter", "records filtered", {
    input: records.length,
    kept: kept.length,
    year: criteria.year,
    requiredTags: criteria.requiredTags,
  });
  await exportArticles(paths, kept);
  return { ...paths, records: kept, dropped: records.length - kept.length };
}
