// Fallback path: rebuild the same fields from headings, bylines and meta tags

import type { HTMLElement } from "node-html-parser";
import type { ArticleFields } from "../types/article.js";
import { uniqueTagSlugs } from "../types/tags.js";
import { normalizeDate } from "./date.js";


/** Selector and where its value lives; the first non-empty hit wins */
interface Probe {
  selector: string;
  /** Attribute to read; element text when absent */
  attr?: string;
}

const TITLE_PROBES: Probe[] = [
  { selector: "h1" },
  { selector: 'meta[property="og:title"]', attr: "content" },
  { selector: 'meta[name="twitter:title"]', attr: "content" },
  { selector: "title" },
];

const AUTHOR_PROBES: Probe[] = [
  { selector: '[data-testid="authorName"]' },
  { selector: 'a[rel="author"]' },
  { selector: 'meta[name="author"]', attr: "content" },
  { selector: 'meta[property="article:author"]', attr: "content" },
];

const DATE_PROBES: Probe[] = [
  { selector: 'meta[property="article:published_time"]', attr: "content" },
  { selector: "time[datetime]", attr: "datetime" },
  { selector: 'meta[name="date"]', attr: "content" },
];

const SUMMARY_PROBES: Probe[] = [
  { selector: 'meta[property="og:description"]', attr: "content" },
  { selector: 'meta[name="description"]', attr: "content" },
];

const READING_TIME_PATTERN = /^\d+\s*min read$/i;


function collapse(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}


function probe(root: HTMLElement, probes: Probe[]): string {
  for (const { selector, attr } of probes) {
    const el = root.querySelector(selector);
    if (!el) continue;
    const value = collapse(attr ? el.getAttribute(attr) ?? "" : el.text);
    if (value) return value;
  }
  return "";
}


/** Tag slug from a /tag/<slug> href, absolute or relative */
export function tagFromHref(href: string): string | null {
  const m = href.match(/\/tag\/([^/?#]+)/);
  if (!m) return null;
  try {
    return decodeURIComponent(m[1]);
  } catch {
    return m[1];
  }
}


function tagsFromLinks(root: HTMLElement): string[] {
  const labels: string[] = [];
  for (const a of root.querySelectorAll('a[href*="/tag/"]')) {
    const fromHref = tagFromHref(a.getAttribute("href") ?? "");
    const label = fromHref ?? collapse(a.text);
    if (label) labels.push(label);
  }
  return uniqueTagSlugs(labels);
}


function readingTime(root: HTMLElement): string {
  const marked = root.querySelector('[data-testid="storyReadTime"]');
  if (marked && collapse(marked.text)) return collapse(marked.text);
  for (const el of root.querySelectorAll("span, div, p")) {
    const text = collapse(el.text);
    if (READING_TIME_PATTERN.test(text)) return text;
  }
  return "";
}


/** Best effort: any field may come back empty */
export function extractFallback(root: HTMLElement): ArticleFields {
  return {
    title: probe(root, TITLE_PROBES),
    author: probe(root, AUTHOR_PROBES),
    publication_date: normalizeDate(probe(root, DATE_PROBES)),
    tags: tagsFromLinks(root),
    reading_time: readingTime(root),
    summary: probe(root, SUMMARY_PROBES),
  };
}
