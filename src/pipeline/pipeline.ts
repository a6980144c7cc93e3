// Orchestrator: collect → extract → filter/export; each stage reads the previous stage's checkpoint file

import { collectLinks } from "../collector/index.js";
import { dataPaths } from "../config/index.js";
import type { PipelineConfig, Stage } from "../config/index.js";
import { MissingCheckpointError, StageFatalError } from "../errors/index.js";
import type { StageName } from "../errors/index.js";
import { extractArticles } from "../extractor/index.js";
import type { ExtractionBatch } from "../extractor/index.js";
import type { BrowserOptions, BrowserSession } from "../fetcher/index.js";
import { filterAndExport } from "../filter/index.js";
import { errMessage, logger } from "../logger/index.js";
import {
  loadArticles,
  loadRawLinks,
  saveArticles,
  saveExtractionReport,
  saveRawLinks,
  toExtractionReport,
} from "../storage/index.js";
import { mergeLinks } from "./merge.js";
import { logSummary } from "./summary.js";
import type { PipelineDeps, RunSummary } from "./types.js";


export function browserOptions(config: PipelineConfig): BrowserOptions {
  return {
    headless: config.headless,
    chromePath: config.chromePath,
    proxy: config.proxy,
    navigationTimeoutMs: config.navigationTimeoutMs,
    settleMs: config.settleMs,
  };
}


/** Anything that escapes a stage becomes a StageFatalError for that stage */
async function asStage<T>(stage: StageName, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof StageFatalError) throw err;
    throw new StageFatalError(stage, `${stage} stage failed: ${errMessage(err)}`, { cause: err });
  }
}


function withSession<T>(config: PipelineConfig, deps: PipelineDeps, fn: (session: BrowserSession) => Promise<T>): Promise<T> {
  return deps.runSession(browserOptions(config), fn);
}


export interface CollectStageResult {
  perTag: Record<string, string[]>;
  collected: number;
}


/** Stage 1: one browser for all tags, one checkpoint file per tag */
export function runCollectStage(config: PipelineConfig, deps: PipelineDeps): Promise<CollectStageResult> {
  const paths = dataPaths(config.dataDir);
  return asStage("collect", () =>
    withSession(config, deps, async (session) => {
      const perTag: Record<string, string[]> = {};
      let collected = 0;
      for (const tag of config.tags) {
        const result = await collectLinks(session, tag, config.year, config.scroll);
        if (result.links.length === 0) {
          logger.warn("pipeline", "no links collected for tag", { tag });
        }
        await saveRawLinks(paths, tag, config.year, result.links);
        perTag[tag] = result.links;
        collected += result.links.length;
      }
      return { perTag, collected };
    })
  );
}


export interface ExtractStageResult {
  uniqueLinks: number;
  extracted: number;
  structured: number;
  fallback: number;
  unusable: number;
}


/** Stage 2: merge the per-tag checkpoints, extract every URL once, write the raw checkpoint and report */
export function runExtractStage(config: PipelineConfig, deps: PipelineDeps): Promise<ExtractStageResult> {
  const paths = dataPaths(config.dataDir);
  return asStage("extract", async () => {
    const perTag: string[][] = [];
    for (const tag of config.tags) {
      const links = await loadRawLinks(paths, tag);
      if (links === null) throw new MissingCheckpointError("extract", paths.rawLinks(tag));
      logger.info("pipeline", "links loaded", { tag, links: links.length });
      perTag.push(links);
    }
    const urls = mergeLinks(perTag);
    logger.info("pipeline", "links merged", { unique: urls.length });

    let batch: ExtractionBatch = { records: [], outcomes: [], counts: { structured: 0, fallback: 0, unusable: 0 } };
    if (urls.length === 0) {
      logger.warn("pipeline", "nothing to extract");
    } else {
      batch = await withSession(config, deps, (session) =>
        extractArticles(session, urls, { delayBetweenMs: config.delayBetweenMs, sleep: deps.sleep })
      );
    }

    await saveArticles(paths.rawArticles(config.year), batch.records);
    await saveExtractionReport(paths.extractionReport(config.year), toExtractionReport(config.year, batch));
    return {
      uniqueLinks: urls.length,
      extracted: batch.records.length,
      ...batch.counts,
    };
  });
}


export interface FilterStageResult {
  input: number;
  exported: number;
  filteredOut: number;
  jsonPath: string;
  csvPath: string;
}


/** Stage 3: raw checkpoint → year + tag filter → sorted JSON and CSV */
export function runFilterStage(config: PipelineConfig): Promise<FilterStageResult> {
  const paths = dataPaths(config.dataDir);
  return asStage("filter", async () => {
    const rawPath = paths.rawArticles(config.year);
    const records = await loadArticles(rawPath);
    if (records === null) throw new MissingCheckpointError("filter", rawPath);
    const result = await filterAndExport(
      records,
      { year: config.year, requiredTags: config.tags },
      { jsonPath: paths.filteredJson(config.year), csvPath: paths.filteredCsv(config.year) }
    );
    if (result.records.length === 0) {
      logger.warn("pipeline", "no article passed the filter", { year: config.year, requiredTags: config.tags });
    }
    for (const [i, record] of result.records.entries()) {
      logger.info("pipeline", `[${i + 1}/${result.records.length}] ${record.title}`, {
        author: record.author,
        date: record.publication_date,
        tags: record.tags,
        item_url: record.url,
      });
    }
    return {
      input: records.length,
      exported: result.records.length,
      filteredOut: result.dropped,
      jsonPath: result.jsonPath,
      csvPath: result.csvPath,
    };
  });
}


/** Run one stage or all three; throws StageFatalError, always logs the summary of what ran */
export async function runPipeline(config: PipelineConfig, stage: Stage, deps: PipelineDeps): Promise<RunSummary> {
  const now = deps.now ?? Date.now;
  const started = now();
  const summary: RunSummary = { stage, durationMs: 0 };
  logger.info("pipeline", "run started", { stage, tags: config.tags, year: config.year, headless: config.headless });
  try {
    if (stage === "all" || stage === "collect") {
      const collected = await runCollectStage(config, deps);
      summary.collected = collected.collected;
    }
    if (stage === "all" || stage === "extract") {
      const extracted = await runExtractStage(config, deps);
      Object.assign(summary, extracted);
    }
    if (stage === "all" || stage === "filter") {
      const filtered = await runFilterStage(config);
      summary.filteredOut = filtered.filteredOut;
      summary.exported = filtered.exported;
      summary.outputs = [filtered.jsonPath, filtered.csvPath];
    }
  } finally {
    summary.durationMs = now() - started;
    logSummary(summary);
  }
  return summary;
}
