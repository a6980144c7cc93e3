/** Union of per-tag link lists in first-seen order; a URL shared by several tags appears once */
export function mergeLinks(perTag: Iterable<readonly string[]>): string[] {
  const seen = new Set<string>();
  const merged: string[] = [];
  for (const links of perTag) {
    for (const url of links) {
      if (seen.has(url)) continue;
      seen.add(url);
      merged.push(url);
    }
  }
  return merged;
}
