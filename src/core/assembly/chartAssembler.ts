import { ValidationFailureError } from '../../mcp/errors';
import {
  createChartDocument,
  createEntry,
  entryKindFor,
} from '../models/chart';
import type { ChartDocument, ChartKind, Entry } from '../models/chart';
import type { ChartPageExtraction, RawEntryRecord } from '../extraction/types';

export interface AssemblyTarget {
  title: string;
  kind: ChartKind;
}

export interface AssemblyOptions {
  source: string;
  maxEntries?: number | null;
}

function toEntry(record: RawEntryRecord, kind: ChartKind): Entry {
  const expected = entryKindFor(kind);
  if (record.entry_kind !== expected) {
    throw new ValidationFailureError(
      `record at rank ${record.rank} is a ${record.entry_kind} on a ${kind} chart`
    );
  }

  const positions = {
    rank: record.rank,
    weeks_on_chart: record.weeks_on_chart,
    last_week: record.last_week,
    peak_position: record.peak_position,
    peak_inferred: record.peak_inferred,
  };
  const item = {
    title: record.title,
    artist: record.artist,
    artists: record.artists,
    image: record.image,
  };

  return record.entry_kind === 'track'
    ? createEntry({ track: { ...item, album: '' }, ...positions })
    : createEntry({ collection: item, ...positions });
}

/**
 * Turns raw records into a validated, frozen chart document: entries sorted by
 * rank (ties keep page order, duplicates are kept), then trimmed.
 */
export function assembleChart(
  extraction: ChartPageExtraction,
  target: AssemblyTarget,
  options: AssemblyOptions
): ChartDocument {
  const entries = extraction.entries
    .map(record => toEntry(record, target.kind))
    .sort((a, b) => a.rank - b.rank);

  const limit = options.maxEntries ?? null;
  const trimmed = limit !== null ? entries.slice(0, limit) : entries;

  return createChartDocument({
    descriptor: {
      source: options.source,
      title: target.title,
      description: extraction.page.description,
      url: extraction.page.url,
      kind: target.kind,
    },
    published_date: extraction.page.published_date,
    kind: target.kind,
    entries: trimmed,
  });
}
