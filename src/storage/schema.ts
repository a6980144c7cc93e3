// File schemas: checkpoints are validated when a later stage reads them back

import { z } from "zod";
import { ARTICLE_SOURCE } from "../types/article.js";


export const RawLinksFileSchema = z.object({
  tag: z.string(),
  year: z.number().int().optional(),
  total_links: z.number().int().min(0),
  links: z.array(z.string()),
});

export type RawLinksFile = z.infer<typeof RawLinksFileSchema>;


const ArticleRecordSchema = z.object({
  title: z.string(),
  author: z.string(),
  publication_date: z.string(),
  tags: z.array(z.string()),
  reading_time: z.string(),
  summary: z.string(),
  source: z.literal(ARTICLE_SOURCE),
  url: z.string().min(1),
});

export const ArticleListSchema = z.array(ArticleRecordSchema);


export const ExtractionReportSchema = z.object({
  year: z.number().int(),
  total: z.number().int().min(0),
  counts: z.object({
    structured: z.number().int().min(0),
    fallback: z.number().int().min(0),
    unusable: z.number().int().min(0),
  }),
  outcomes: z.array(
    z.object({
      url: z.string(),
      kind: z.enum(["structured", "fallback", "unusable"]),
      reason: z.string().optional(),
    })
  ),
});

export type ExtractionReport = z.infer<typeof ExtractionReportSchema>;


export function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
}
