import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { createChildLogger } from '../../utils/logger';
import { entryKindFor } from '../models/chart';
import { CHART_ROW_SELECTOR } from './selectors';
import {
  ARTIST_STRATEGIES,
  IMAGE_STRATEGIES,
  LAST_WEEK_STRATEGIES,
  PEAK_STRATEGIES,
  RANK_STRATEGIES,
  TITLE_STRATEGIES,
  WEEKS_STRATEGIES,
  collectTextFragments,
  runStrategies,
  splitArtists,
} from './strategies';
import type { FieldStrategy, RowContext } from './strategies';
import { parseDescription, parsePublishedDate } from './pageMetadata';
import type {
  ChartPageExtraction,
  ExtractionOptions,
  PageExtractionOptions,
  RawEntryRecord,
} from './types';

export type RowRejection = 'rank' | 'title' | 'artist';

type StrategyField =
  | 'rank'
  | 'title'
  | 'artist'
  | 'image'
  | 'weeks_on_chart'
  | 'last_week'
  | 'peak_position';

/** Name of the strategy that supplied each field; absent fields fell back to their default. */
export type MatchedStrategies = Partial<Record<StrategyField, string>>;

export type RowOutcome =
  | { record: RawEntryRecord; matchedBy: MatchedStrategies }
  | { rejected: RowRejection };

/** Applies every field strategy list to one row. */
export function extractRow(
  $: CheerioAPI,
  row: Cheerio<Element>,
  options: ExtractionOptions
): RowOutcome {
  const fragments = collectTextFragments(row.toArray());
  const ctx: RowContext = { $, row, fragments, text: fragments.join(' '), kind: options.kind };
  const matchedBy: MatchedStrategies = {};

  function field<T, C>(
    name: StrategyField,
    strategies: ReadonlyArray<FieldStrategy<T, C>>,
    context: C
  ): T | null {
    const match = runStrategies(strategies, context);
    if (!match) return null;
    matchedBy[name] = match.strategy;
    return match.value;
  }

  const rank = field('rank', RANK_STRATEGIES, ctx) ?? 0;
  if (rank <= 0) return { rejected: 'rank' };

  const title = field('title', TITLE_STRATEGIES, ctx) ?? '';
  if (!title) return { rejected: 'title' };

  const artist = field('artist', ARTIST_STRATEGIES, { ...ctx, title }) ?? '';
  if (!artist) return { rejected: 'artist' };

  const artists = splitArtists(artist);
  const image = options.includeImages ? (field('image', IMAGE_STRATEGIES, ctx) ?? '') : '';
  const peak = field('peak_position', PEAK_STRATEGIES, ctx);

  return {
    record: {
      rank,
      title,
      artist: artists[0] ?? artist,
      artists,
      image,
      weeks_on_chart: field('weeks_on_chart', WEEKS_STRATEGIES, ctx) ?? 0,
      last_week: field('last_week', LAST_WEEK_STRATEGIES, ctx) ?? 0,
      peak_position: peak ?? rank,
      peak_inferred: peak === null,
      entry_kind: entryKindFor(options.kind),
    },
    matchedBy,
  };
}

/**
 * Lazily yields one raw record per usable chart row, in page order. A row that
 * lacks a rank, title or artist, or that throws while being read, is skipped
 * without affecting the rest of the page.
 */
export function* extractRawEntries(
  source: string | CheerioAPI,
  options: ExtractionOptions
): Generator<RawEntryRecord, void, undefined> {
  const $ = typeof source === 'string' ? cheerio.load(source) : source;
  const log = createChildLogger(options.correlationId ?? 'unknown');
  const limit = options.maxEntries ?? null;
  let emitted = 0;

  for (const [index, element] of $(CHART_ROW_SELECTOR).toArray().entries()) {
    if (limit !== null && emitted >= limit) return;

    let outcome: RowOutcome;
    try {
      outcome = extractRow($, $(element), options);
    } catch (error) {
      log.debug({ event: 'row_skipped', rowIndex: index, error }, 'Chart row could not be read');
      continue;
    }

    if ('rejected' in outcome) {
      log.debug(
        { event: 'row_rejected', rowIndex: index, missing: outcome.rejected },
        'Chart row rejected'
      );
      continue;
    }

    log.debug(
      {
        event: 'row_extracted',
        rowIndex: index,
        rank: outcome.record.rank,
        matchedBy: outcome.matchedBy,
      },
      'Chart row extracted'
    );
    emitted += 1;
    yield outcome.record;
  }
}

/** Reads page metadata and every usable row of one chart page. */
export function extractChartPage(html: string, options: PageExtractionOptions): ChartPageExtraction {
  const log = createChildLogger(options.correlationId ?? 'unknown');
  const $ = cheerio.load(html);

  const entries = Array.from(extractRawEntries($, options));
  const page = {
    published_date: parsePublishedDate(html, options.now),
    description: parseDescription($, options.fallbackDescription),
    url: options.url,
  };

  log.debug(
    {
      event: 'chart_page_extracted',
      url: options.url,
      rowCount: $(CHART_ROW_SELECTOR).length,
      entryCount: entries.length,
      publishedDate: page.published_date,
    },
    'Chart page extracted'
  );

  return { page, entries };
}
