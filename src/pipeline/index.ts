// Pipeline orchestrator: stage sequencing, single-stage runs from checkpoints, run summary

export {
  browserOptions,
  runCollectStage,
  runExtractStage,
  runFilterStage,
  runPipeline,
} from "./pipeline.js";
export type { CollectStageResult, ExtractStageResult, FilterStageResult } from "./pipeline.js";
export { mergeLinks } from "./merge.js";
export { formatSummary, logSummary } from "./summary.js";
export type { PipelineDeps, RunSummary } from "./types.js";
