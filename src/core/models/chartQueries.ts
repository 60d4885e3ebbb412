import type { ChartDocument, Entry, Track, Collection } from './chart';

export function entryItem(entry: Entry): Track | Collection {
  if (entry.track) return entry.track;
  if (entry.collection) return entry.collection;
  // Unreachable for entries built through createEntry
  throw new Error(`Entry at rank ${entry.rank} carries neither a track nor a collection`);
}

export function totalEntries(chart: ChartDocument): number {
  return chart.entries.length;
}

export function getTop(chart: ChartDocument, n = 10): Entry[] {
  return chart.entries.slice(0, Math.max(0, n));
}

/** Case-insensitive substring match over the primary artist and the artist list. */
export function findByArtist(chart: ChartDocument, artist: string): Entry[] {
  const needle = artist.toLowerCase();
  return chart.entries.filter(entry => {
    const item = entryItem(entry);
    return (
      item.artist.toLowerCase().includes(needle) ||
      item.artists.some(name => name.toLowerCase().includes(needle))
    );
  });
}

/** Case-insensitive partial match on track or collection titles. */
export function findByTitle(chart: ChartDocument, title: string): Entry[] {
  const needle = title.toLowerCase();
  return chart.entries.filter(entry => entryItem(entry).title.toLowerCase().includes(needle));
}
