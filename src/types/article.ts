/**
 * One collected article.
 * Created as a bare URL by the collector, enriched by the extractor,
 * then kept or dropped by the filter. Never mutated in place.
 */
export interface ArticleRecord {
  readonly title: string;
  /** "" when unknown */
  readonly author: string;
  /** YYYY-MM-DD when parseable, the raw string otherwise, "" when absent */
  readonly publication_date: string;
  /** Canonical tag slugs, unique, first-seen order */
  readonly tags: readonly string[];
  /** Free text such as "5 min read" */
  readonly reading_time: string;
  readonly summary: string;
  readonly source: typeof ARTICLE_SOURCE;
  /** Query and fragment stripped; primary key */
  readonly url: string;
}

export const ARTICLE_SOURCE = "medium";

/** Field order of the exported JSON objects and CSV columns */
export const ARTICLE_FIELDS = [
  "title",
  "author",
  "publication_date",
  "tags",
  "reading_time",
  "summary",
  "source",
  "url",
] as const satisfies readonly (keyof ArticleRecord)[];

/** Partial fields coming out of one extraction path */
export type ArticleFields = Partial<Omit<ArticleRecord, "source" | "url">>;

/** Build a record with every field present, in export order */
export function toArticleRecord(url: string, fields: ArticleFields): ArticleRecord {
  return {
    title: fields.title ?? "",
    author: fields.author ?? "",
    publication_date: fields.publication_date ?? "",
    tags: [...(fields.tags ?? [])],
    reading_time: fields.reading_time ?? "",
    summary: fields.summary ?? "",
    source: ARTICLE_SOURCE,
    url,
  };
}
