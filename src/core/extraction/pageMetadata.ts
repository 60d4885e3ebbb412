import type { CheerioAPI } from 'cheerio';
import { formatIsoDate, isValidCalendarDate, todayIsoDate } from '../../utils/dates';
import { META_DESCRIPTION_SELECTOR } from './selectors';

const MONTHS: Readonly<Record<string, number>> = {
  january: 1,
  february: 2,
  march: 3,
  april: 4,
  may: 5,
  june: 6,
  july: 7,
  august: 8,
  september: 9,
  october: 10,
  november: 11,
  december: 12,
};

type DateReader = (html: string) => string | null;

const DATE_READERS: ReadonlyArray<DateReader> = [
  // "Week of January 21, 2026"
  html => {
    const match = /Week of\s+(\w+)\s+(\d{1,2}),\s+(\d{4})/i.exec(html);
    if (!match) return null;
    const monthName = match[1].toLowerCase();
    if (!Object.prototype.hasOwnProperty.call(MONTHS, monthName)) return null;
    return toIsoOrNull(Number(match[3]), MONTHS[monthName], Number(match[2]));
  },
  // "Week of 1/21/2026"
  html => {
    const match = /Week of\s+(\d{1,2})\/(\d{1,2})\/(\d{4})/.exec(html);
    if (!match) return null;
    return toIsoOrNull(Number(match[3]), Number(match[1]), Number(match[2]));
  },
];

function toIsoOrNull(year: number, month: number, day: number): string | null {
  return isValidCalendarDate(year, month, day) ? formatIsoDate(year, month, day) : null;
}

/** Publication date as YYYY-MM-DD; today's date when the page states none. */
export function parsePublishedDate(html: string, now: Date = new Date()): string {
  for (const read of DATE_READERS) {
    const date = read(html);
    if (date) return date;
  }
  return todayIsoDate(now);
}

export function parseDescription($: CheerioAPI, fallbackDescription: string): string {
  const content = $(META_DESCRIPTION_SELECTOR).first().attr('content')?.trim();
  return content ? content : fallbackDescription;
}
