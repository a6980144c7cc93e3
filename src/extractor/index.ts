// Metadata extractor: JSON-LD primary path with an HTML-structure fallback

export { extractArticle, extractArticles, extractFromHtml } from "./extractor.js";
export { extractStructured, findArticleNode, keywordsToTags, readingTimeFrom } from "./structured.js";
export { extractFallback, tagFromHref } from "./fallback.js";
export { normalizeDate, yearOf, monthNumber } from "./date.js";
export type {
  ExtractBatchOptions,
  ExtractionBatch,
  ExtractionCounts,
  ExtractionKind,
  ExtractionOutcome,
  ExtractionResult,
  StructuredOutcome,
} from "./types.js";
