import { z } from 'zod';
import { isIsoDate } from '../utils/dates';

const provider = z
  .string()
  .min(1)
  .default('billboard')
  .describe('Chart provider to query (default: "billboard")');

// charts.getLatest tool schemas
export const GetLatestChartInput = z.object({
  provider,
  chart: z
    .string()
    .min(1)
    .default('hot-100')
    .describe(
      'Chart name or alias, e.g. "hot-100", "billboard 200", "global". Case, spaces and underscores are ignored.'
    ),
  includeImages: z
    .boolean()
    .optional()
    .describe('Include cover image URLs in entries (default: true)'),
  maxEntries: z
    .number()
    .int()
    .min(1)
    .max(500)
    .optional()
    .describe('Return at most this many entries, taken from the top of the chart'),
  fallbackToDefault: z
    .boolean()
    .optional()
    .describe(
      'Fall back to the Hot 100 when the chart name is not recognised (default: true). When false, unknown names are rejected.'
    ),
});

// charts.getByDate tool schemas
export const GetChartByDateInput = GetLatestChartInput.extend({
  date: z
    .string()
    .refine(isIsoDate, 'date must be a valid YYYY-MM-DD calendar date')
    .describe('Publication date of the chart (YYYY-MM-DD)'),
});

// charts.list tool schemas
export const ListChartsInput = z.object({
  provider: z
    .string()
    .min(1)
    .optional()
    .describe('Provider whose charts to list; omit to list every registered provider'),
});

export type GetLatestChartInputType = z.infer<typeof GetLatestChartInput>;
export type GetChartByDateInputType = z.infer<typeof GetChartByDateInput>;
export type ListChartsInputType = z.infer<typeof ListChartsInput>;
