import type { ScrollConfig } from "../config/index.js";


export interface CollectOptions extends ScrollConfig {
  /** Fraction of the viewport per scroll step (default 0.8) */
  scrollFraction?: number;
  /** Extra wait when the listing shows a bot challenge (default 15s) */
  challengeWaitMs?: number;
}


/**
 * Why the scroll loop ended:
 * - max-scrolls: the scroll cap was reached
 * - idle: maxIdleScrolls consecutive scrolls showed no new article link
 * - older-content: chronological feed, and maxIdleScrolls scrolls in a row brought only cards older than the target year
 */
export type StopReason = "max-scrolls" | "idle" | "older-content";


export interface CollectResult {
  tag: string;
  /** Deduplicated, first-seen order */
  links: string[];
  scrolls: number;
  stopReason: StopReason;
  /** Listing URL after redirects */
  finalUrl: string;
  /** Links dropped because the card showed another year */
  skippedOtherYear: number;
  /** Scroll steps that failed and were skipped */
  failedScrolls: number;
}
