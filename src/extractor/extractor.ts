// Metadata extractor: article URL → ExtractionResult, JSON-LD first, page structure as fallback

import { parse } from "node-html-parser";
import { fetchHtml } from "../fetcher/index.js";
import type { BrowserSession } from "../fetcher/index.js";
import { errMessage, logger } from "../logger/index.js";
import { toArticleRecord } from "../types/article.js";
import type { ArticleFields } from "../types/article.js";
import { extractFallback } from "./fallback.js";
import { extractStructured } from "./structured.js";
import type { ExtractBatchOptions, ExtractionBatch, ExtractionOutcome, ExtractionResult } from "./types.js";


/** Structured values win, fallback fills what they left empty */
function fillGaps(primary: ArticleFields, secondary: ArticleFields): ArticleFields {
  return {
    title: primary.title || secondary.title || "",
    author: primary.author || secondary.author || "",
    publication_date: primary.publication_date || secondary.publication_date || "",
    tags: primary.tags && primary.tags.length > 0 ? primary.tags : secondary.tags ?? [],
    reading_time: primary.reading_time || secondary.reading_time || "",
    summary: primary.summary || secondary.summary || "",
  };
}


/** Pure part of extraction, usable on saved HTML */
export function extractFromHtml(html: string, url: string): ExtractionResult {
  const root = parse(html);
  const structured = extractStructured(root);
  const fromPage = extractFallback(root);
  if (structured.status === "complete") {
    // title and date came from the block; the page may still supply reading time, tags and the rest
    return { kind: "structured", record: toArticleRecord(url, fillGaps(structured.fields, fromPage)) };
  }
  const partial = structured.status === "incomplete" ? structured.fields : {};
  const fields = fillGaps(partial, fromPage);
  if (!fields.title && !fields.publication_date) {
    return { kind: "unusable", url, reason: `${structured.reason}; fallback found no title or date` };
  }
  return { kind: "fallback", record: toArticleRecord(url, fields), reason: structured.reason };
}


/** One attempt per URL; load failures become unusable results instead of exceptions */
export async function extractArticle(session: BrowserSession, url: string): Promise<ExtractionResult> {
  let html: string;
  try {
    const res = await fetchHtml(session, url);
    html = res.body;
  } catch (err) {
    return { kind: "unusable", url, reason: `load failed: ${errMessage(err)}` };
  }
  return extractFromHtml(html, url);
}


function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}


function toOutcome(result: ExtractionResult): ExtractionOutcome {
  switch (result.kind) {
    case "structured":
      return { url: result.record.url, kind: result.kind };
    case "fallback":
      return { url: result.record.url, kind: result.kind, reason: result.reason };
    case "unusable":
      return { url: result.url, kind: result.kind, reason: result.reason };
  }
}


/** Sequential batch with a polite pause between page loads; one bad URL never stops the rest */
export async function extractArticles(
  session: BrowserSession,
  urls: readonly string[],
  options: ExtractBatchOptions = {}
): Promise<ExtractionBatch> {
  const { delayBetweenMs = 0, sleep = defaultSleep, onProgress } = options;
  const batch: ExtractionBatch = { records: [], outcomes: [], counts: { structured: 0, fallback: 0, unusable: 0 } };
  for (let i = 0; i < urls.length; i++) {
    const url = urls[i];
    const result = await extractArticle(session, url);
    batch.counts[result.kind]++;
    batch.outcomes.push(toOutcome(result));
    if (result.kind === "unusable") {
      logger.warn("extractor", "article unusable", { item_url: url, reason: result.reason });
    } else {
      batch.records.push(result.record);
      logger.info("extractor", `[${i + 1}/${urls.length}] ${result.kind}`, { item_url: url, title: result.record.title.slice(0, 60) });
    }
    onProgress?.(i + 1, urls.length, result);
    if (i < urls.length - 1 && delayBetweenMs > 0) await sleep(delayBetweenMs);
  }
  return batch;
}
