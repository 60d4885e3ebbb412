import type { ChartKind } from '../core/models/chart';

export interface ChartTableRow {
  path: string;
  title: string;
  kind: ChartKind;
  /** Short blurb used when listing charts. */
  summary: string;
  /** Used when the page carries no meta description. */
  fallbackDescription: string;
}

export const DEFAULT_CHART_ID = 'hot-100';

export const BILLBOARD_CHARTS = {
  'hot-100': {
    path: '/charts/hot-100',
    title: 'Billboard Hot 100',
    kind: 'single',
    summary: "The week's most popular songs across all genres",
    fallbackDescription:
      "The week's most popular songs across all genres, ranked by radio airplay, sales data, and streaming activity.",
  },
  'billboard-200': {
    path: '/charts/billboard-200',
    title: 'Billboard 200',
    kind: 'collection',
    summary: "The week's most popular albums across all genres",
    fallbackDescription:
      "The week's most popular albums across all genres, ranked by album sales and audio streaming.",
  },
  'global-200': {
    path: '/charts/global-200',
    title: 'Global 200',
    kind: 'single',
    summary: "The week's most popular songs globally",
    fallbackDescription:
      "The week's most popular songs globally, ranked by streaming and sales activity.",
  },
  'artist-100': {
    path: '/charts/artist-100',
    title: 'Artist 100',
    kind: 'single',
    summary: "The week's most popular artists",
    fallbackDescription: 'The artist-100 chart on Billboard',
  },
  'streaming-songs': {
    path: '/charts/streaming-songs',
    title: 'Streaming Songs',
    kind: 'single',
    summary: 'The most-streamed songs of the week',
    fallbackDescription: 'The streaming-songs chart on Billboard',
  },
  'radio-songs': {
    path: '/charts/radio-songs',
    title: 'Radio Songs',
    kind: 'single',
    summary: 'The most-played songs on radio',
    fallbackDescription: 'The radio-songs chart on Billboard',
  },
  'digital-song-sales': {
    path: '/charts/digital-song-sales',
    title: 'Digital Song Sales',
    kind: 'single',
    summary: 'The best-selling digital songs',
    fallbackDescription: 'The digital-song-sales chart on Billboard',
  },
} as const satisfies Record<string, ChartTableRow>;

export type BillboardChartId = keyof typeof BILLBOARD_CHARTS;

// Colloquial names, matched after lowercasing and trimming
export const CHART_ALIASES: Readonly<Record<string, BillboardChartId>> = {
  'hot 100': 'hot-100',
  'billboard hot 100': 'hot-100',
  '200': 'billboard-200',
  'billboard 200': 'billboard-200',
  global: 'global-200',
  artist: 'artist-100',
};

export function isBillboardChartId(value: string): value is BillboardChartId {
  return Object.prototype.hasOwnProperty.call(BILLBOARD_CHARTS, value);
}

export function chartIds(): BillboardChartId[] {
  return Object.keys(BILLBOARD_CHARTS).filter(isBillboardChartId);
}
