// Article link heuristics for tag listing pages

import { monthNumber } from "../extractor/date.js";


/** Path segments that mark navigation, profile or listing pages rather than posts */
const EXCLUDED_SEGMENTS = new Set([
  "tag",
  "search",
  "me",
  "about",
  "followers",
  "following",
  "lists",
  "topics",
  "archive",
  "membership",
]);

const AUTH_SEGMENT = /^sign-?(in|up)$/;

/** Posts end in a slug plus an 8-12 char hex id: /some-title-3f2a9c1d0b7e */
const POST_ID_SUFFIX = /-[a-f0-9]{8,12}$/;

/** /@author/slug */
const AUTHOR_POST_PATH = /^\/@[^/]+\/[^/]+/;


/** Drop query and fragment; trailing slash removed so the same post compares equal */
export function normalizeUrl(href: string): string {
  const base = href.split("#")[0].split("?")[0];
  return base.length > 1 && base.endsWith("/") ? base.replace(/\/+$/, "") : base;
}


export function isArticleUrl(href: string): boolean {
  if (!href) return false;
  let url: URL;
  try {
    url = new URL(normalizeUrl(href));
  } catch {
    return false;
  }
  if (url.protocol !== "https:" && url.protocol !== "http:") return false;
  const segments = url.pathname.toLowerCase().split("/").filter(Boolean);
  if (segments.some((seg) => EXCLUDED_SEGMENTS.has(seg))) return false;
  if (segments.some((seg) => AUTH_SEGMENT.test(seg))) return false;
  if (POST_ID_SUFFIX.test(url.pathname)) return true;
  return AUTHOR_POST_PATH.test(url.pathname) && url.href.length > 40;
}


/**
 * Year printed on a listing card ("Mar 1, 2025", "2025-03-01").
 * The byline follows the title, so the last date in the card text wins.
 * null when the card shows no explicit year ("2d ago", "Mar 1"): the link is then kept.
 */
export function listingYear(context: string): number | null {
  let last: { index: number; year: number } | null = null;
  for (const m of context.matchAll(/\b([A-Z][a-z]{2,8}\.?)\s+(\d{1,2}),\s+((?:19|20)\d{2})\b/g)) {
    if (monthNumber(m[1]) === undefined) continue;
    const index = m.index ?? 0;
    if (!last || index > last.index) last = { index, year: Number(m[3]) };
  }
  for (const m of context.matchAll(/\b((?:19|20)\d{2})-\d{2}-\d{2}\b/g)) {
    const index = m.index ?? 0;
    if (!last || index > last.index) last = { index, year: Number(m[1]) };
  }
  return last ? last.year : null;
}
