// Link collector: tag listing page → scroll until the feed stops growing → article URLs for the target year

import { withPage } from "../fetcher/index.js";
import type { AnchorSnapshot, BrowserSession } from "../fetcher/index.js";
import { errMessage, logger } from "../logger/index.js";
import { isArticleUrl, listingYear, normalizeUrl } from "./links.js";
import type { CollectOptions, CollectResult, StopReason } from "./types.js";


const TAG_LISTING_ORIGIN = "https://medium.com";
const CHALLENGE_TITLES = ["Just a moment", "Cloudflare"];
const DEFAULT_SCROLL_FRACTION = 0.8;
const DEFAULT_CHALLENGE_WAIT_MS = 15_000;


/** Chronological ("latest") listing of a tag */
export function tagListingUrl(tag: string): string {
  return `${TAG_LISTING_ORIGIN}/tag/${encodeURIComponent(tag)}/latest`;
}


export interface HarvestStep {
  /** Article URLs not seen before, accepted or skipped */
  newlySeen: number;
  /** New URLs kept for extraction */
  added: number;
  /** New URLs whose card shows a year before the target */
  older: number;
}


/**
 * Accumulates article links across scroll steps.
 * A URL is judged once, on first sight; later duplicates are ignored.
 */
export class LinkHarvest {
  private readonly seen = new Set<string>();
  private readonly kept: string[] = [];
  private skipped = 0;

  constructor(private readonly year: number) {}

  add(anchors: readonly AnchorSnapshot[]): HarvestStep {
    const step: HarvestStep = { newlySeen: 0, added: 0, older: 0 };
    for (const { href, context } of anchors) {
      if (!isArticleUrl(href)) continue;
      const url = normalizeUrl(href);
      if (this.seen.has(url)) continue;
      this.seen.add(url);
      step.newlySeen++;
      const cardYear = listingYear(context);
      if (cardYear !== null && cardYear !== this.year) {
        this.skipped++;
        if (cardYear < this.year) step.older++;
        continue;
      }
      this.kept.push(url);
      step.added++;
    }
    return step;
  }

  get links(): string[] {
    return [...this.kept];
  }

  get skippedOtherYear(): number {
    return this.skipped;
  }
}


/**
 * Open the tag listing, scroll until one of the stop rules fires, return the harvested links.
 * A failed scroll step is logged and counted as idle; a listing page that never loads throws PageLoadError.
 * On a chronological feed, maxIdleScrolls scrolls of only-older cards (scrolls with nothing new in between
 * do not break the run) also end the loop.
 */
export async function collectLinks(
  session: BrowserSession,
  tag: string,
  year: number,
  options: CollectOptions
): Promise<CollectResult> {
  const {
    maxScrolls,
    maxIdleScrolls,
    pauseMs,
    scrollFraction = DEFAULT_SCROLL_FRACTION,
    challengeWaitMs = DEFAULT_CHALLENGE_WAIT_MS,
  } = options;
  const listingUrl = tagListingUrl(tag);
  logger.info("collector", "collecting tag", { tag, source_url: listingUrl });

  return withPage(session, async (page) => {
    const nav = await page.goto(listingUrl);
    if (nav.finalUrl !== listingUrl) {
      logger.info("collector", "listing redirected", { tag, finalUrl: nav.finalUrl, source_url: listingUrl });
    }
    const title = await page.title();
    if (CHALLENGE_TITLES.some((t) => title.includes(t))) {
      logger.warn("collector", "bot challenge detected, waiting", { tag, waitMs: challengeWaitMs, source_url: listingUrl });
      await page.wait(challengeWaitMs);
    }
    const chronological = nav.finalUrl.includes("/latest");

    const harvest = new LinkHarvest(year);
    let failedScrolls = 0;
    try {
      harvest.add(await page.anchors());
    } catch (err) {
      logger.warn("collector", "reading initial links failed", { tag, err: errMessage(err) });
    }

    let scrolls = 0;
    let idle = 0;
    // scrolls whose new cards were all older; one stray block of old posts is not enough to stop
    let olderStreak = 0;
    let stopReason: StopReason = "max-scrolls";
    while (scrolls < maxScrolls) {
      scrolls++;
      let step: HarvestStep = { newlySeen: 0, added: 0, older: 0 };
      try {
        await page.scrollBy(scrollFraction);
        await page.wait(pauseMs);
        step = harvest.add(await page.anchors());
      } catch (err) {
        failedScrolls++;
        logger.warn("collector", "scroll step failed", { tag, scroll: scrolls, err: errMessage(err) });
      }
      idle = step.newlySeen > 0 ? 0 : idle + 1;
      logger.debug("collector", "scroll", { tag, scroll: scrolls, links: harvest.links.length, ...step });
      if (step.newlySeen > 0) {
        olderStreak = step.older === step.newlySeen ? olderStreak + 1 : 0;
      }
      if (chronological && olderStreak >= maxIdleScrolls) {
        stopReason = "older-content";
        break;
      }
      if (idle >= maxIdleScrolls) {
        stopReason = "idle";
        break;
      }
    }

    const links = harvest.links;
    logger.info("collector", "tag collected", {
      tag,
      links: links.length,
      scrolls,
      stopReason,
      skippedOtherYear: harvest.skippedOtherYear,
      source_url: listingUrl,
    });
    return {
      tag,
      links,
      scrolls,
      stopReason,
      finalUrl: nav.finalUrl,
      skippedOtherYear: harvest.skippedOtherYear,
      failedScrolls,
    };
  });
}
