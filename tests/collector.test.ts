import { describe, it, expect } from "vitest";
import {
  LinkHarvest,
  collectLinks,
  isArticleUrl,
  listingYear,
  normalizeUrl,
  tagListingUrl,
} from "../src/collector/index.js";
import { PageLoadError } from "../src/errors/index.js";
import type { AnchorSnapshot } from "../src/fetcher/index.js";
import { FakeSession, anchor } from "./helpers/fakeBrowser.js";
import type { PageScript } from "./helpers/fakeBrowser.js";


const P1 = "https://medium.com/@ana/designing-with-models-1a2b3c4d5e6f";
const P2 = "https://medium.com/@bruno/prototyping-voice-interfaces-0f9e8d7c6b5a";
const P3 = "https://uxdesign.cc/why-forms-fail-9b8c7d6e5f4a";
const P4 = "https://medium.com/@dana/old-grid-systems-4d5e6f7a8b9c";
const P5 = "https://medium.com/@dana/old-color-tokens-5e6f7a8b9c0d";
const SCROLL = { maxScrolls: 10, maxIdleScrolls: 2, pauseMs: 100 };


function listing(script: PageScript): FakeSession {
  return new FakeSession(() => script);
}


/** Feed that reveals one more card per scroll */
function growingFeed(cards: AnchorSnapshot[]): (scrolls: number) => AnchorSnapshot[] {
  return (scrolls) => cards.slice(0, scrolls + 1);
}


describe("link heuristics", () => {
  it("accepts post URLs", () => {
    expect(isArticleUrl(P1)).toBe(true);
    expect(isArticleUrl(`${P3}?source=topic_page`)).toBe(true);
    expect(isArticleUrl("https://medium.com/about-design-systems-1a2b3c4d")).toBe(true);
    expect(isArticleUrl("https://medium.com/@ana/a-longer-post-title-without-id")).toBe(true);
  });

  it("rejects navigation, profile and non-web links", () => {
    expect(isArticleUrl("https://medium.com/tag/ux-design")).toBe(false);
    expect(isArticleUrl("https://medium.com/m/signin?redirect=x")).toBe(false);
    expect(isArticleUrl("https://medium.com/@ana/about")).toBe(false);
    expect(isArticleUrl("https://medium.com/@ana")).toBe(false);
    expect(isArticleUrl("javascript:void(0)")).toBe(false);
    expect(isArticleUrl("not a url")).toBe(false);
    expect(isArticleUrl("")).toBe(false);
  });

  it("normalises query, fragment and trailing slash away", () => {
    expect(normalizeUrl(`${P1}/?source=tag_recent#responses`)).toBe(P1);
    expect(normalizeUrl(P1)).toBe(P1);
  });

  it("reads the year printed on a card", () => {
    expect(listingYear("Ana Lima · 6 min read · Mar 1, 2025")).toBe(2025);
    expect(listingYear("Chapter 3, 2020 edition · Jan 5, 2024")).toBe(2024);
    expect(listingYear("published 2024-12-30")).toBe(2024);
    expect(listingYear("Looking back at 2023-06-01 · Feb 2, 2025")).toBe(2025);
    expect(listingYear("2d ago")).toBeNull();
    expect(listingYear("Mar 1")).toBeNull();
  });

  it("builds the chronological listing URL", () => {
    expect(tagListingUrl("ux-design")).toBe("https://medium.com/tag/ux-design/latest");
  });
});


describe("LinkHarvest", () => {
  it("judges each URL once and keeps first-seen order", () => {
    const harvest = new LinkHarvest(2025);
    const first = harvest.add([
      anchor(P1, "Mar 1, 2025"),
      anchor("https://medium.com/tag/ux-design"),
      anchor(`${P1}?source=tag_recent`, "Mar 1, 2025"),
      anchor(P2, "Dec 30, 2024"),
      anchor(P3, "3d ago"),
    ]);
    expect(first).toEqual({ newlySeen: 3, added: 2, older: 1 });

    const second = harvest.add([anchor(P2, "Mar 3, 2025"), anchor(P1)]);
    expect(second).toEqual({ newlySeen: 0, added: 0, older: 0 });
    expect(harvest.links).toEqual([P1, P3]);
    expect(harvest.skippedOtherYear).toBe(1);
  });

  it("takes the byline date over a date in the title", () => {
    const harvest = new LinkHarvest(2025);
    harvest.add([anchor(P1, "What we learned since Dec 31, 2024 · Ana Lima · 5 min read · Mar 1, 2025")]);
    expect(harvest.links).toEqual([P1]);
    expect(harvest.skippedOtherYear).toBe(0);
  });

  it("skips newer years without counting them as older", () => {
    const harvest = new LinkHarvest(2024);
    expect(harvest.add([anchor(P1, "Jan 2, 2025")])).toEqual({ newlySeen: 1, added: 0, older: 0 });
  });
});


describe("collectLinks", () => {
  it("stops after the configured number of idle scrolls", async () => {
    const session = listing({
      anchorsAt: (s): AnchorSnapshot[] => (s === 0 ? [anchor(P1)] : [anchor(P1), anchor(P2)]),
    });
    const result = await collectLinks(session, "ux-design", 2025, SCROLL);
    expect(result).toEqual({
      tag: "ux-design",
      links: [P1, P2],
      scrolls: 3,
      stopReason: "idle",
      finalUrl: "https://medium.com/tag/ux-design/latest",
      skippedOtherYear: 0,
      failedScrolls: 0,
    });
    const page = session.pages[0];
    expect(page.waits).toEqual([100, 100, 100]);
    expect(page.closed).toBe(true);
  });

  it("stops a chronological feed after consecutive scrolls of only older cards", async () => {
    const session = listing({
      anchorsAt: growingFeed([anchor(P1, "Jan 3, 2025"), anchor(P2, "Dec 30, 2024"), anchor(P4, "Nov 2, 2024")]),
    });
    const result = await collectLinks(session, "ux-design", 2025, SCROLL);
    expect(result.stopReason).toBe("older-content");
    expect(result.scrolls).toBe(2);
    expect(result.links).toEqual([P1]);
    expect(result.skippedOtherYear).toBe(2);
  });

  it("does not stop on a single block of older cards between current ones", async () => {
    const session = listing({
      anchorsAt: growingFeed([
        anchor(P1, "Jan 3, 2025"),
        anchor(P2, "Dec 30, 2024"),
        anchor(P3, "3d ago"),
        anchor(P4, "Nov 2, 2024"),
        anchor(P5, "Oct 9, 2024"),
      ]),
    });
    const result = await collectLinks(session, "ux-design", 2025, SCROLL);
    expect(result.stopReason).toBe("older-content");
    expect(result.scrolls).toBe(4);
    expect(result.links).toEqual([P1, P3]);
  });

  it("keeps scrolling a redirected, non-chronological feed past older cards", async () => {
    const session = listing({
      finalUrl: "https://medium.com/tag/ux-design",
      anchorsAt: growingFeed([anchor(P1, "Jan 3, 2025"), anchor(P2, "Dec 30, 2024"), anchor(P4, "Nov 2, 2024")]),
    });
    const result = await collectLinks(session, "ux-design", 2025, SCROLL);
    expect(result.stopReason).toBe("idle");
    expect(result.scrolls).toBe(4);
    expect(result.finalUrl).toBe("https://medium.com/tag/ux-design");
  });

  it("counts a failed scroll as idle and carries on", async () => {
    const session = listing({
      failScrollAt: [1],
      anchorsAt: (s) => (s < 2 ? [anchor(P1)] : [anchor(P1), anchor(P2)]),
    });
    const result = await collectLinks(session, "ux-design", 2025, SCROLL);
    expect(result.failedScrolls).toBe(1);
    expect(result.links).toEqual([P1, P2]);
    expect(result.scrolls).toBe(4);
    expect(result.stopReason).toBe("idle");
  });

  it("stops at the scroll cap while the feed keeps growing", async () => {
    const session = listing({
      anchorsAt: (s) => [anchor(`https://medium.com/@ana/post-number-${s}-00000000a${s}`)],
    });
    const result = await collectLinks(session, "ux-design", 2025, { ...SCROLL, maxScrolls: 3 });
    expect(result.stopReason).toBe("max-scrolls");
    expect(result.scrolls).toBe(3);
    expect(result.links).toHaveLength(4);
  });

  it("waits out a bot challenge before reading the feed", async () => {
    const session = listing({ title: "Just a moment...", anchorsAt: () => [anchor(P1)] });
    const result = await collectLinks(session, "ux-design", 2025, { ...SCROLL, maxIdleScrolls: 1, challengeWaitMs: 500 });
    expect(session.pages[0].waits).toEqual([500, 100]);
    expect(result.links).toEqual([P1]);
  });

  it("propagates a listing that never loads and still closes the page", async () => {
    const session = listing({ failLoad: "HTTP 503" });
    await expect(collectLinks(session, "ux-design", 2025, SCROLL)).rejects.toBeInstanceOf(PageLoadError);
    expect(session.pages[0].closed).toBe(true);
  });
});
