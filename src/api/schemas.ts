/**
 * Response shapes of the BookStack REST API, validated with zod.
 * Only the fields the sync reads are declared; the rest are stripped.
 */

import { z } from 'zod';

const id = z.number().int();

export const BookSchema = z.object({
  id,
  name: z.string(),
});

export const ChapterSchema = z.object({
  id,
  book_id: id,
  name: z.string(),
  priority: z.number().int(),
});

export const PageSummarySchema = z.object({
  id,
  book_id: id,
  // BookStack reports 0 for pages that are not in a chapter
  chapter_id: id.nullable().optional(),
  name: z.string(),
  priority: z.number().int(),
  draft: z.boolean().optional(),
});

export const PageDetailSchema = PageSummarySchema.extend({
  html: z.string().nullable().optional(),
  markdown: z.string().nullable().optional(),
});

export const BookListSchema = z.object({ data: z.array(BookSchema), total: z.number().int() });
export const ChapterListSchema = z.object({ data: z.array(ChapterSchema), total: z.number().int() });
export const PageListSchema = z.object({ data: z.array(PageSummarySchema), total: z.number().int() });

/** Any JSON body; used where the response is not read. */
export const IgnoredBodySchema = z.unknown();

export type BookJSON = z.infer<typeof BookSchema>;
export type ChapterJSON = z.infer<typeof ChapterSchema>;
export type PageSummaryJSON = z.infer<typeof PageSummarySchema>;
export type PageDetailJSON = z.infer<typeof PageDetailSchema>;
