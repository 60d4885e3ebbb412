import { PACKAGE_VERSION } from '../utils/version';

export const APP_NAME = 'chart-crawler';
export const APP_VERSION = PACKAGE_VERSION;

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const BILLBOARD_BASE_URL = 'https://www.billboard.com';

// 429 plus the 5xx family worth another attempt
export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export const MAX_REDIRECTIONS = 3;

export const MCP_TOOL_DESCRIPTIONS = {
  GET_LATEST_CHART:
    'Fetch the latest edition of a music chart (e.g. "hot-100", "billboard-200") and return it as a structured document: chart descriptor, publication date and ranked entries with title, artists, cover image, weeks on chart, last week rank and peak position. Unknown chart names fall back to the Hot 100 unless fallbackToDefault is false. Use maxEntries to limit the result to the top N entries.',
  GET_CHART_BY_DATE:
    'Fetch a chart as published on a given date (YYYY-MM-DD). Only available for providers that support historical charts; others report that the capability is not supported.',
  LIST_CHARTS:
    'List the charts a provider can fetch, with their title, description, canonical URL and kind ("single" for track charts, "collection" for album charts). Omit provider to list every registered provider.',
} as const;
