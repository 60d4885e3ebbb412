import { z } from 'zod';
import { EntryKindSchema } from '../models/chart';
import type { ChartKind } from '../models/chart';

/**
 * One unvalidated chart row as scraped. Plain data only: these records cross
 * the worker process boundary.
 */
export const RawEntryRecordSchema = z.object({
  rank: z.number().int(),
  title: z.string(),
  artist: z.string(),
  artists: z.array(z.string()),
  image: z.string(),
  weeks_on_chart: z.number().int(),
  last_week: z.number().int(),
  peak_position: z.number().int(),
  // true when no peak marker was found and the current rank stands in
  peak_inferred: z.boolean(),
  entry_kind: EntryKindSchema,
});

export const PageMetadataSchema = z.object({
  published_date: z.string(),
  description: z.string(),
  url: z.string(),
});

export const ChartPageExtractionSchema = z.object({
  page: PageMetadataSchema,
  entries: z.array(RawEntryRecordSchema),
});

export type RawEntryRecord = z.infer<typeof RawEntryRecordSchema>;
export type PageMetadata = z.infer<typeof PageMetadataSchema>;
export type ChartPageExtraction = z.infer<typeof ChartPageExtractionSchema>;

export interface ExtractionOptions {
  kind: ChartKind;
  includeImages: boolean;
  /** Stop after this many accepted rows; unset or null means all. */
  maxEntries?: number | null;
  correlationId?: string;
}

export interface PageExtractionOptions extends ExtractionOptions {
  url: string;
  fallbackDescription: string;
  now?: Date;
}
