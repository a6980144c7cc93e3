import type { Stage } from "../config/index.js";
import type { SessionRunner } from "../fetcher/index.js";


export interface PipelineDeps {
  /** Scoped browser acquisition; tests pass a runner that yields a fake session */
  runSession: SessionRunner;
  /** Pause between article loads; defaults to setTimeout */
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}


/** Counts reported at the end of a run; a stage that did not run leaves its fields unset */
export interface RunSummary {
  stage: Stage;
  /** Links collected per tag, summed */
  collected?: number;
  /** Links left after merging tags */
  uniqueLinks?: number;
  /** Usable records after extraction */
  extracted?: number;
  structured?: number;
  fallback?: number;
  /** Dropped: load failure or no title and no date */
  unusable?: number;
  /** Records that failed the year / tag filter */
  filteredOut?: number;
  exported?: number;
  outputs?: string[];
  durationMs: number;
}
