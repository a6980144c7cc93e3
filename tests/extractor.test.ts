import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { describe, it, expect } from "vitest";
import {
  extractArticles,
  extractFromHtml,
  findArticleNode,
  keywordsToTags,
  readingTimeFrom,
} from "../src/extractor/index.js";
import { FakeSession } from "./helpers/fakeBrowser.js";
import { jsonLdPage } from "./helpers/pages.js";


const FIXTURES = fileURLToPath(new URL("./fixtures/", import.meta.url));
const URL_A = "https://medium.com/@ana/designing-with-models-1a2b3c4d5e6f";
const URL_B = "https://medium.com/@bruno/prototyping-voice-interfaces-0f9e8d7c6b5a";

function fixture(name: string): Promise<string> {
  return readFile(FIXTURES + name, "utf-8");
}


describe("extractFromHtml", () => {
  it("fills every field from a well-formed structured-data block", async () => {
    const result = extractFromHtml(await fixture("article-structured.html"), URL_A);
    expect(result).toEqual({
      kind: "structured",
      record: {
        title: "Designing with Models",
        author: "Ana Lima",
        publication_date: "2025-03-01",
        tags: ["ux-design", "artificial-intelligence", "product-design"],
        reading_time: "6 min read",
        summary: "How model output changes interface design.",
        source: "medium",
        url: URL_A,
      },
    });
  });

  it("falls back to headings, bylines and meta tags when there is no block", async () => {
    const result = extractFromHtml(await fixture("article-fallback.html"), URL_B);
    expect(result).toEqual({
      kind: "fallback",
      reason: "no structured-data block",
      record: {
        title: "Prototyping Voice Interfaces",
        author: "Bruno Costa",
        publication_date: "2025-05-20",
        tags: ["ux-design", "artificial-intelligence"],
        reading_time: "4 min read",
        summary: "Notes from three voice prototypes.",
        source: "medium",
        url: URL_B,
      },
    });
  });

  it("completes a structured record with reading time and summary from the page", () => {
    const html = jsonLdPage(
      { headline: "Block Title", author: { name: "Ana Lima" }, datePublished: "2025-04-01T10:00:00Z", keywords: ["Tag:UX Design"] },
      '<meta property="og:description" content="From the page."><a rel="author" href="/@other">Other Name</a>' +
        '<span data-testid="storyReadTime">5 min read</span>'
    );
    expect(extractFromHtml(html, URL_A)).toEqual({
      kind: "structured",
      record: {
        title: "Block Title",
        author: "Ana Lima",
        publication_date: "2025-04-01",
        tags: ["ux-design"],
        reading_time: "5 min read",
        summary: "From the page.",
        source: "medium",
        url: URL_A,
      },
    });
  });

  it("uses the fallback when the block is malformed", () => {
    const html =
      '<html><head><script type="application/ld+json">{not json</script></head>' +
      '<body><h1>Title Only</h1><time datetime="2024-11-02">Nov 2</time></body></html>';
    const result = extractFromHtml(html, URL_A);
    expect(result.kind).toBe("fallback");
    if (result.kind !== "fallback") return;
    expect(result.reason).toBe("structured-data block malformed");
    expect(result.record.title).toBe("Title Only");
    expect(result.record.publication_date).toBe("2024-11-02");
  });

  it("keeps what an incomplete block has and takes the rest from the page", () => {
    const html = jsonLdPage(
      { headline: "From Structured Data", keywords: "ux design, research" },
      '<h1>From The Heading</h1><meta property="article:published_time" content="2025-01-15T10:00:00Z">'
    );
    const result = extractFromHtml(html, URL_A);
    expect(result.kind).toBe("fallback");
    if (result.kind !== "fallback") return;
    expect(result.reason).toBe("structured data missing date");
    expect(result.record.title).toBe("From Structured Data");
    expect(result.record.publication_date).toBe("2025-01-15");
    expect(result.record.tags).toEqual(["ux-design", "research"]);
  });

  it("reports a page with neither title nor date as unusable", () => {
    const result = extractFromHtml("<html><body><p>nothing here</p></body></html>", URL_A);
    expect(result).toEqual({
      kind: "unusable",
      url: URL_A,
      reason: "no structured-data block; fallback found no title or date",
    });
  });

  it("keeps a partial record that has a date but no title", () => {
    const result = extractFromHtml('<html><body><time datetime="2025-06-01T00:00:00Z">Jun 1</time></body></html>', URL_A);
    expect(result.kind).toBe("fallback");
    if (result.kind !== "fallback") return;
    expect(result.record.title).toBe("");
    expect(result.record.publication_date).toBe("2025-06-01");
  });
});


describe("structured-data helpers", () => {
  it("finds article nodes inside arrays and @graph containers", () => {
    const graph = { "@graph": [{ "@type": "WebSite", name: "x" }, { "@type": ["CreativeWork", "BlogPosting"], headline: "h" }] };
    expect(findArticleNode(graph)).toEqual({ "@type": ["CreativeWork", "BlogPosting"], headline: "h" });
    expect(findArticleNode([{ "@type": "Person" }, { "@type": "Article", headline: "a" }])).toEqual({ "@type": "Article", headline: "a" });
    expect(findArticleNode({ "@type": "Person" })).toBeNull();
  });

  it("keeps only Tag: keywords when the prefix is used", () => {
    expect(keywordsToTags(["Lite:true", "Tag:UX Design", "tag:ux_design", "Topic:Design"])).toEqual(["ux-design"]);
    expect(keywordsToTags("Design Systems, Accessibility ,")).toEqual(["design-systems", "accessibility"]);
    expect(keywordsToTags(42)).toEqual([]);
  });

  it("renders ISO durations as minutes", () => {
    expect(readingTimeFrom("PT5M")).toBe("5 min read");
    expect(readingTimeFrom("PT1H30M")).toBe("90 min read");
    expect(readingTimeFrom("PT20S")).toBe("1 min read");
    expect(readingTimeFrom("7 min read")).toBe("7 min read");
    expect(readingTimeFrom(undefined)).toBe("");
  });
});


describe("extractArticles", () => {
  it("isolates failures, pauses between pages and counts provenance", async () => {
    const structured = await fixture("article-structured.html");
    const fallback = await fixture("article-fallback.html");
    const broken = "https://medium.com/@carla/offline-post-aaaaaaaa11";
    const session = new FakeSession((url) => {
      if (url === URL_A) return { html: structured };
      if (url === URL_B) return { html: fallback };
      return { failLoad: "navigation failed: net::ERR_NAME_NOT_RESOLVED" };
    });
    const pauses: number[] = [];
    const progress: number[] = [];

    const batch = await extractArticles(session, [URL_A, broken, URL_B], {
      delayBetweenMs: 2500,
      sleep: async (ms) => {
        pauses.push(ms);
      },
      onProgress: (current) => progress.push(current),
    });

    expect(batch.records.map((r) => r.url)).toEqual([URL_A, URL_B]);
    expect(batch.counts).toEqual({ structured: 1, fallback: 1, unusable: 1 });
    expect(batch.outcomes).toEqual([
      { url: URL_A, kind: "structured" },
      { url: broken, kind: "unusable", reason: "load failed: navigation failed: net::ERR_NAME_NOT_RESOLVED" },
      { url: URL_B, kind: "fallback", reason: "no structured-data block" },
    ]);
    expect(pauses).toEqual([2500, 2500]);
    expect(progress).toEqual([1, 2, 3]);
    expect(session.pages).toHaveLength(3);
    expect(session.pages.every((p) => p.closed)).toBe(true);
  });
});
