// Primary path: schema.org JSON-LD blocks embedded in the article page

import type { HTMLElement } from "node-html-parser";
import type { ArticleFields } from "../types/article.js";
import { uniqueTagSlugs } from "../types/tags.js";
import { normalizeDate } from "./date.js";
import type { StructuredOutcome } from "./types.js";


const ARTICLE_TYPES = new Set(["Article", "NewsArticle", "BlogPosting", "SocialMediaPosting"]);


function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}


function str(v: unknown): string {
  return typeof v === "string" ? v.trim() : "";
}


function isArticleNode(node: Record<string, unknown>): boolean {
  const type = node["@type"];
  if (typeof type === "string") return ARTICLE_TYPES.has(type);
  if (Array.isArray(type)) return type.some((t) => typeof t === "string" && ARTICLE_TYPES.has(t));
  return false;
}


/** Depth-first search through arrays and @graph containers for the first article node */
export function findArticleNode(data: unknown): Record<string, unknown> | null {
  if (Array.isArray(data)) {
    for (const item of data) {
      const found = findArticleNode(item);
      if (found) return found;
    }
    return null;
  }
  if (!isRecord(data)) return null;
  if (isArticleNode(data)) return data;
  if ("@graph" in data) return findArticleNode(data["@graph"]);
  return null;
}


function authorName(author: unknown): string {
  if (typeof author === "string") return author.trim();
  if (Array.isArray(author)) return author.length > 0 ? authorName(author[0]) : "";
  if (isRecord(author)) return str(author.name);
  return "";
}


/** Keywords to tag slugs; when some keywords use the "Tag:" prefix only those count */
export function keywordsToTags(keywords: unknown): string[] {
  let list: string[] = [];
  if (Array.isArray(keywords)) {
    list = keywords.filter((k): k is string => typeof k === "string");
  } else if (typeof keywords === "string") {
    list = keywords.split(",");
  }
  list = list.map((k) => k.trim()).filter(Boolean);
  const prefixed = list.filter((k) => /^tag:/i.test(k));
  if (prefixed.length > 0) list = prefixed.map((k) => k.replace(/^tag:/i, ""));
  return uniqueTagSlugs(list);
}


/** "PT5M" → "5 min read"; other strings pass through */
export function readingTimeFrom(timeRequired: unknown): string {
  const s = str(timeRequired);
  const m = s.match(/^PT(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?$/i);
  if (!m || (m[1] == null && m[2] == null && m[3] == null)) return s;
  const seconds = Number(m[1] ?? 0) * 3600 + Number(m[2] ?? 0) * 60 + Number(m[3] ?? 0);
  return `${Math.max(1, Math.round(seconds / 60))} min read`;
}


export function fieldsFromArticleNode(node: Record<string, unknown>): ArticleFields {
  return {
    title: str(node.headline) || str(node.name),
    author: authorName(node.author),
    publication_date: normalizeDate(str(node.datePublished)),
    tags: keywordsToTags(node.keywords),
    reading_time: readingTimeFrom(node.timeRequired),
    summary: str(node.description),
  };
}


/** Read every ld+json block; malformed blocks are skipped, the first article node wins */
export function extractStructured(root: HTMLElement): StructuredOutcome {
  const scripts = root.querySelectorAll('script[type="application/ld+json"]');
  if (scripts.length === 0) return { status: "absent", reason: "no structured-data block" };
  let malformed = 0;
  for (const script of scripts) {
    let data: unknown;
    try {
      data = JSON.parse(script.rawText);
    } catch {
      malformed++;
      continue;
    }
    const node = findArticleNode(data);
    if (!node) continue;
    const fields = fieldsFromArticleNode(node);
    if (fields.title && fields.publication_date) return { status: "complete", fields };
    const missing = [fields.title ? null : "title", fields.publication_date ? null : "date"].filter(Boolean).join(" and ");
    return { status: "incomplete", fields, reason: `structured data missing ${missing}` };
  }
  if (malformed === scripts.length) return { status: "absent", reason: "structured-data block malformed" };
  return { status: "absent", reason: "no article in structured data" };
}
