// Tabular export: same columns as the JSON objects, tags flattened into one cell

import { stringify } from "csv-stringify/sync";
import { ARTICLE_FIELDS } from "../types/article.js";
import type { ArticleRecord } from "../types/article.js";


export const TAG_SEPARATOR = ", ";


export function toCsvRow(record: ArticleRecord): string[] {
  return ARTICLE_FIELDS.map((field) => (field === "tags" ? record.tags.join(TAG_SEPARATOR) : record[field]));
}


/** Header row is always written, also for an empty result */
export function toCsv(records: readonly ArticleRecord[]): string {
  const header: string[] = [...ARTICLE_FIELDS];
  return stringify([header, ...records.map(toCsvRow)], { record_delimiter: "unix" });
}
