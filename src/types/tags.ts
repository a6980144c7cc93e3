// Canonical tag slugs: "UX Design", "ux_design" and "ux-design" all compare as "ux-design"

export function toTagSlug(label: string): string {
  return label
    .trim()
    .toLowerCase()
    .replace(/[\s_-]+/g, "-")
    .replace(/^-+|-+$/g, "");
}


/** Slugify, drop empties, keep first occurrence */
export function uniqueTagSlugs(labels: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const label of labels) {
    const slug = toTagSlug(label);
    if (!slug || seen.has(slug)) continue;
    seen.add(slug);
    out.push(slug);
  }
  return out;
}
