import { z } from 'zod';
import { ChartKindSchema } from '../models/chart';
import { ChartPageExtractionSchema } from '../extraction/types';
import type { ChartPageExtraction } from '../extraction/types';

export const HttpPolicySchema = z.object({
  maxRetries: z.number().int().min(0),
  backoffBaseMs: z.number().int().min(0),
  backoffMaxMs: z.number().int().min(0),
  timeoutMs: z.number().int().positive(),
  userAgent: z.string().min(1),
});

/** Everything a worker needs to crawl one chart page. Plain data only. */
export const CrawlRequestSchema = z.object({
  chartId: z.string().min(1),
  url: z.string().url(),
  kind: ChartKindSchema,
  fallbackDescription: z.string(),
  includeImages: z.boolean(),
  maxEntries: z.number().int().positive().nullable(),
  http: HttpPolicySchema,
  correlationId: z.string().optional(),
});

export type HttpPolicy = z.infer<typeof HttpPolicySchema>;
export type CrawlRequest = z.infer<typeof CrawlRequestSchema>;
export type CrawlResult = ChartPageExtraction;

export const CrawlCommandSchema = z.object({
  type: z.literal('crawl'),
  request: CrawlRequestSchema,
});

export const SerializedErrorSchema = z.object({
  name: z.string(),
  message: z.string(),
  statusCode: z.number().int().optional(),
});

export const WorkerReplySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('result'), result: ChartPageExtractionSchema }),
  z.object({ type: z.literal('error'), error: SerializedErrorSchema }),
]);

export type CrawlCommand = z.infer<typeof CrawlCommandSchema>;
export type SerializedError = z.infer<typeof SerializedErrorSchema>;
export type WorkerReply = z.infer<typeof WorkerReplySchema>;

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    const statusCode =
      'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : undefined;
    return { name: error.name, message: error.message, ...(statusCode ? { statusCode } : {}) };
  }
  return { name: 'Error', message: String(error) };
}
