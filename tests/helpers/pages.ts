// HTML builders for article pages

export interface JsonLdFields {
  headline?: string;
  author?: unknown;
  datePublished?: string;
  description?: string;
  keywords?: unknown;
  timeRequired?: string;
  type?: string | string[];
}


export function jsonLdPage(fields: JsonLdFields, body = ""): string {
  const { type = "NewsArticle", ...rest } = fields;
  const data = { "@context": "http://schema.org", "@type": type, ...rest };
  return `<!doctype html><html><head><script type="application/ld+json">${JSON.stringify(data)}</script></head><body>${body}</body></html>`;
}
