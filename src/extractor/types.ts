// Extraction results: provenance is part of the type so callers can tell structured data from scraped fallbacks

import type { ArticleFields, ArticleRecord } from "../types/article.js";


/** Outcome of reading the schema.org JSON-LD blocks of a page */
export type StructuredOutcome =
  /** An article node with both title and date */
  | { status: "complete"; fields: ArticleFields }
  /** An article node missing title or date; what it had still fills fallback gaps */
  | { status: "incomplete"; fields: ArticleFields; reason: string }
  /** No block, no article node, or nothing parseable */
  | { status: "absent"; reason: string };


export type ExtractionResult =
  | { kind: "structured"; record: ArticleRecord }
  | { kind: "fallback"; record: ArticleRecord; reason: string }
  | { kind: "unusable"; url: string; reason: string };

export type ExtractionKind = ExtractionResult["kind"];


/** One line of the extraction report */
export interface ExtractionOutcome {
  url: string;
  kind: ExtractionKind;
  reason?: string;
}


export interface ExtractionCounts {
  structured: number;
  fallback: number;
  unusable: number;
}


export interface ExtractionBatch {
  /** Usable records in input order */
  records: ArticleRecord[];
  outcomes: ExtractionOutcome[];
  counts: ExtractionCounts;
}


export interface ExtractBatchOptions {
  /** Pause between two page loads */
  delayBetweenMs?: number;
  /** Injected for tests; defaults to setTimeout */
  sleep?: (ms: number) => Promise<void>;
  /** Called after each URL with (current, total) */
  onProgress?: (current: number, total: number, result: ExtractionResult) => void;
}
