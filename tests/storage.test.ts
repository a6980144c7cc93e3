import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { dataPaths } from "../src/config/index.js";
import {
  loadArticles,
  loadRawLinks,
  saveArticles,
  saveRawLinks,
  toCsv,
  toExtractionReport,
} from "../src/storage/index.js";
import { article } from "./helpers/records.js";


const HEADER = "title,author,publication_date,tags,reading_time,summary,source,url";


describe("toCsv", () => {
  it("flattens tags into one quoted cell and escapes quotes and newlines", () => {
    const quoted = article("quoted-aaaaaaaa", {
      title: 'Say "hello" to agents',
      author: "Ana Lima",
      publication_date: "2025-03-01",
      tags: ["ux-design", "artificial-intelligence"],
      reading_time: "6 min read",
      summary: "line one\nline two",
    });
    const bare = article("bare-bbbbbbbb", { title: "Bare", publication_date: "2025-03-02" });
    expect(toCsv([quoted, bare])).toBe(
      `${HEADER}\n` +
        '"Say ""hello"" to agents",Ana Lima,2025-03-01,"ux-design, artificial-intelligence",6 min read,"line one\nline two",medium,https://medium.com/@writer/quoted-aaaaaaaa\n' +
        "Bare,,2025-03-02,,,,medium,https://medium.com/@writer/bare-bbbbbbbb\n"
    );
  });

  it("keeps the header for an empty export", () => {
    expect(toCsv([])).toBe(`${HEADER}\n`);
  });
});


describe("checkpoints", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tagharvest-storage-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads back the links it saved", async () => {
    const paths = dataPaths(dir);
    const links = ["https://medium.com/@ana/one-1a2b3c4d", "https://medium.com/@ana/two-5e6f7a8b"];
    const path = await saveRawLinks(paths, "ux-design", 2025, links);
    expect(path).toBe(paths.rawLinks("ux-design"));
    expect(JSON.parse(await readFile(path, "utf-8"))).toEqual({ tag: "ux-design", year: 2025, total_links: 2, links });
    expect(await loadRawLinks(paths, "ux-design")).toEqual(links);
  });

  it("returns null for a tag that was never collected", async () => {
    expect(await loadRawLinks(dataPaths(dir), "ux-design")).toBeNull();
    expect(await loadArticles(join(dir, "missing.json"))).toBeNull();
  });

  it("rejects checkpoints of the wrong shape", async () => {
    const paths = dataPaths(dir);
    await writeFile(paths.rawLinks("ux-design"), JSON.stringify({ tag: "ux-design", links: "nope" }));
    await expect(loadRawLinks(paths, "ux-design")).rejects.toThrow(/invalid link checkpoint/);

    const broken = join(dir, "broken.json");
    await writeFile(broken, "{");
    await expect(loadArticles(broken)).rejects.toThrow(`${broken} is not valid JSON`);
  });

  it("round-trips article files", async () => {
    const records = [article("one-1a2b3c4d", { title: "One", publication_date: "2025-01-01", tags: ["ux-design"] })];
    const path = join(dir, "nested", "articles.json");
    await saveArticles(path, records);
    expect(await loadArticles(path)).toEqual(records);
  });
});


describe("toExtractionReport", () => {
  it("keeps reasons only where there is one", () => {
    const report = toExtractionReport(2025, {
      records: [],
      counts: { structured: 1, fallback: 0, unusable: 1 },
      outcomes: [
        { url: "https://medium.com/@ana/one-1a2b3c4d", kind: "structured" },
        { url: "https://medium.com/@ana/two-5e6f7a8b", kind: "unusable", reason: "load failed: HTTP 404" },
      ],
    });
    expect(report).toEqual({
      year: 2025,
      total: 2,
      counts: { structured: 1, fallback: 0, unusable: 1 },
      outcomes: [
        { url: "https://medium.com/@ana/one-1a2b3c4d", kind: "structured" },
        { url: "https://medium.com/@ana/two-5e6f7a8b", kind: "unusable", reason: "load failed: HTTP 404" },
      ],
    });
  });
});
