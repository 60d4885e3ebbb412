import type { Cheerio, CheerioAPI } from 'cheerio';
import { hasChildren, isText } from 'domhandler';
import type { AnyNode, Element } from 'domhandler';
import type { ChartKind } from '../models/chart';
import {
  ARTIST_HREF_MARKER,
  IMAGE_ATTRIBUTES,
  IMAGE_PLACEHOLDER_MARKER,
  IMAGE_SELECTOR,
  LABEL_SELECTOR,
  LINK_SELECTOR,
  SPAN_SELECTOR,
  STATUS_MARKERS,
  TITLE_SELECTOR,
} from './selectors';

export type StrategyOutcome<T> = { found: true; value: T } | { found: false };

export interface FieldStrategy<T, C = RowContext> {
  name: string;
  extract: (ctx: C) => StrategyOutcome<T>;
}

export interface RowContext {
  $: CheerioAPI;
  row: Cheerio<Element>;
  /** Trimmed, non-empty text nodes of the row in document order. */
  fragments: string[];
  /** Fragments joined with single spaces. */
  text: string;
  kind: ChartKind;
}

export interface TitledRowContext extends RowContext {
  title: string;
}

export interface StrategyMatch<T> {
  value: T;
  strategy: string;
}

const found = <T>(value: T): StrategyOutcome<T> => ({ found: true, value });
const notFound = <T>(): StrategyOutcome<T> => ({ found: false });

const PURE_DIGITS = /^\d+$/;
const UPPERCASE_START = /^\p{Lu}/u;

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function firstInteger(pattern: RegExp, text: string): StrategyOutcome<number> {
  const match = pattern.exec(text);
  return match ? found(parseInt(match[1], 10)) : notFound();
}

/** Runs strategies in priority order and returns the first hit. */
export function runStrategies<T, C>(
  strategies: ReadonlyArray<FieldStrategy<T, C>>,
  ctx: C
): StrategyMatch<T> | null {
  for (const strategy of strategies) {
    const outcome = strategy.extract(ctx);
    if (outcome.found) {
      return { value: outcome.value, strategy: strategy.name };
    }
  }
  return null;
}

export const RANK_STRATEGIES: ReadonlyArray<FieldStrategy<number>> = [
  {
    name: 'labelDigit',
    extract: ({ $, row }) => {
      for (const label of row.find(LABEL_SELECTOR).toArray()) {
        const text = $(label).text().trim();
        if (PURE_DIGITS.test(text)) {
          return found(parseInt(text, 10));
        }
      }
      return notFound();
    },
  },
];

export const TITLE_STRATEGIES: ReadonlyArray<FieldStrategy<string>> = [
  {
    name: 'titleHeading',
    extract: ({ row }) => {
      const title = normalizeWhitespace(row.find(TITLE_SELECTOR).first().text());
      return title ? found(title) : notFound();
    },
  },
];

export const ARTIST_STRATEGIES: ReadonlyArray<FieldStrategy<string, TitledRowContext>> = [
  {
    // Tier 1: every artist-page link, joined in document order
    name: 'artistLinks',
    extract: ({ $, row, title, kind }) => {
      const names: string[] = [];
      for (const link of row.find(LINK_SELECTOR).toArray()) {
        const href = $(link).attr('href') ?? '';
        const text = normalizeWhitespace($(link).text());
        if (!href.includes(ARTIST_HREF_MARKER) || !text) continue;
        // Collection titles often repeat the artist name, so only singles exclude them
        if (kind === 'single' && text === title) continue;
        names.push(text);
      }
      return names.length > 0 ? found(names.join(' & ')) : notFound();
    },
  },
  {
    // Tier 2: label spans that look like a name rather than a rank or badge
    name: 'labelSpans',
    extract: ({ $, row, title }) => {
      let candidate: string | null = null;
      for (const label of row.find(LABEL_SELECTOR).toArray()) {
        const span = $(label);
        const text = normalizeWhitespace(span.text());
        if (!text || PURE_DIGITS.test(text) || text === title) continue;
        if (text.length <= 2 || text.length >= 150) continue;
        if (STATUS_MARKERS.has(text.toUpperCase())) continue;

        if (span.parentsUntil(row, LINK_SELECTOR).length > 0) {
          return found(text);
        }
        const looksLikeName =
          text.includes('&') || text.includes(',') || text.length > 8 || UPPERCASE_START.test(text);
        if (candidate === null && looksLikeName) {
          candidate = text;
        }
      }
      return candidate !== null ? found(candidate) : notFound();
    },
  },
];

export const IMAGE_STRATEGIES: ReadonlyArray<FieldStrategy<string>> = [
  {
    name: 'lazyImageAttributes',
    extract: ({ row }) => {
      const image = row.find(IMAGE_SELECTOR).first();
      if (image.length === 0) return notFound();
      for (const attribute of IMAGE_ATTRIBUTES) {
        const url = image.attr(attribute) ?? '';
        if (/^https?:\/\//i.test(url) && !url.includes(IMAGE_PLACEHOLDER_MARKER)) {
          return found(url);
        }
      }
      return notFound();
    },
  },
];

export const WEEKS_STRATEGIES: ReadonlyArray<FieldStrategy<number>> = [
  {
    name: 'weeksText',
    extract: ({ text }) => firstInteger(/(\d+)\s+weeks?/i, text),
  },
];

export const LAST_WEEK_STRATEGIES: ReadonlyArray<FieldStrategy<number>> = [
  {
    // A span labelled "LW", holding the number itself or followed by it
    name: 'lwLabelSpan',
    extract: ({ $, row }) => {
      for (const element of row.find(SPAN_SELECTOR).toArray()) {
        const span = $(element);
        const text = normalizeWhitespace(span.text());
        if (!/^LW\b/i.test(text)) continue;

        const inline = firstInteger(/^LW[:\s]*(\d+)/i, text);
        if (inline.found) return inline;

        const next = normalizeWhitespace(span.next().text());
        if (PURE_DIGITS.test(next)) {
          return found(parseInt(next, 10));
        }
      }
      return notFound();
    },
  },
  {
    name: 'lwRowText',
    extract: ({ text }) => firstInteger(/LW[:\s]*(\d+)/i, text),
  },
];

export const PEAK_STRATEGIES: ReadonlyArray<FieldStrategy<number>> = [
  {
    name: 'peakTextFragment',
    extract: ({ fragments }) => {
      for (const fragment of fragments) {
        const outcome = firstInteger(/Peak.*?(\d+)/, fragment);
        if (outcome.found) return outcome;
      }
      return notFound();
    },
  },
  {
    name: 'peakRowText',
    extract: ({ text }) => firstInteger(/Peak[:\s]*(\d+)/i, text),
  },
];

/** Splits "A & B" or "A, B" into names; the first is the primary artist. */
export function splitArtists(artist: string): string[] {
  const separator = artist.includes('&') ? '&' : artist.includes(',') ? ',' : null;
  if (separator === null) return [artist.trim()];
  const names = artist
    .split(separator)
    .map(name => name.trim())
    .filter(name => name.length > 0);
  return names.length > 0 ? names : [artist.trim()];
}

export function collectTextFragments(nodes: ReadonlyArray<AnyNode>, out: string[] = []): string[] {
  for (const node of nodes) {
    if (isText(node)) {
      const text = normalizeWhitespace(node.data);
      if (text) out.push(text);
    } else if (hasChildren(node)) {
      collectTextFragments(node.children, out);
    }
  }
  return out;
}
