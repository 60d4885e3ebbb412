import type pino from 'pino';
import {
  BILLBOARD_CHARTS,
  CHART_ALIASES,
  DEFAULT_CHART_ID,
  chartIds,
  isBillboardChartId,
} from '../../config/charts';
import type { BillboardChartId } from '../../config/charts';
import { BILLBOARD_BASE_URL } from '../../config/constants';
import { InvalidChartError } from '../../mcp/errors';
import { logger as rootLogger } from '../../utils/logger';
import type { ChartDescriptor, ChartKind } from '../models/chart';

export interface ResolvedChart {
  id: BillboardChartId;
  /** The identifier exactly as the caller supplied it. */
  requested: string;
  usedFallback: boolean;
  path: string;
  url: string;
  title: string;
  kind: ChartKind;
  summary: string;
  fallbackDescription: string;
}

export interface ResolveOptions {
  fallbackToDefault?: boolean;
  logger?: pino.Logger;
}

type Lookup = (normalized: string) => BillboardChartId | null;

// Tried in order; the first hit wins
const LOOKUPS: ReadonlyArray<{ name: string; lookup: Lookup }> = [
  { name: 'exact', lookup: key => (isBillboardChartId(key) ? key : null) },
  {
    name: 'hyphenated',
    lookup: key => {
      const hyphenated = key.replace(/[\s_]/g, '-');
      return isBillboardChartId(hyphenated) ? hyphenated : null;
    },
  },
  {
    name: 'alias',
    lookup: key =>
      Object.prototype.hasOwnProperty.call(CHART_ALIASES, key) ? CHART_ALIASES[key] : null,
  },
];

function toResolved(id: BillboardChartId, requested: string, usedFallback: boolean): ResolvedChart {
  const row = BILLBOARD_CHARTS[id];
  return {
    id,
    requested,
    usedFallback,
    path: row.path,
    url: `${BILLBOARD_BASE_URL}${row.path}`,
    title: row.title,
    kind: row.kind,
    summary: row.summary,
    fallbackDescription: row.fallbackDescription,
  };
}

/**
 * Maps a free-form chart name to its canonical table row. Unknown names
 * resolve to the Hot 100 with a warning, or throw InvalidChartError when
 * fallback is disabled.
 */
export function resolveChart(input: string, options: ResolveOptions = {}): ResolvedChart {
  const { fallbackToDefault = true } = options;
  const log = options.logger ?? rootLogger;
  const normalized = input.trim().toLowerCase();

  for (const { name, lookup } of LOOKUPS) {
    const id = lookup(normalized);
    if (id) {
      log.debug({ input, chartId: id, matchedBy: name }, 'Chart resolved');
      return toResolved(id, input, false);
    }
  }

  if (!fallbackToDefault) {
    throw new InvalidChartError(input, chartIds());
  }

  log.warn(
    { input, fallback: DEFAULT_CHART_ID },
    `Chart '${input}' not found, falling back to ${DEFAULT_CHART_ID}`
  );
  return toResolved(DEFAULT_CHART_ID, input, true);
}

export function listCanonicalCharts(source = 'billboard'): ChartDescriptor[] {
  return chartIds().map(id => {
    const row = BILLBOARD_CHARTS[id];
    return {
      source,
      title: row.title,
      description: row.summary,
      url: `${BILLBOARD_BASE_URL}${row.path}`,
      kind: row.kind,
    };
  });
}
