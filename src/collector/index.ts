// Link collector: scrolls a tag listing and harvests article URLs for the target year

export { collectLinks, tagListingUrl, LinkHarvest } from "./collector.js";
export type { HarvestStep } from "./collector.js";
export { isArticleUrl, listingYear, normalizeUrl } from "./links.js";
export type { CollectOptions, CollectResult, StopReason } from "./types.js";
