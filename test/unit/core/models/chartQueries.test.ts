import { describe, test, expect } from '@jest/globals';
import { createChartDocument } from '../../../../src/core/models/chart';
import {
  findByArtist,
  findByTitle,
  getTop,
  totalEntries,
} from '../../../../src/core/models/chartQueries';

const chart = createChartDocument({
  descriptor: { source: 'billboard', title: 'Billboard Hot 100', kind: 'single' },
  published_date: '2026-01-17',
  kind: 'single',
  entries: [
    { track: { title: 'Night Drive', artist: 'Artist X', artists: ['Artist X'] }, rank: 1 },
    {
      track: { title: 'Morning Light', artist: 'Band Y', artists: ['Band Y', 'Artist X'] },
      rank: 2,
    },
    { track: { title: 'Night Swim', artist: 'Solo Z', artists: ['Solo Z'] }, rank: 3 },
  ],
});

describe('chart queries', () => {
  test('counts entries', () => {
    expect(totalEntries(chart)).toBe(3);
  });

  test('returns the top n entries', () => {
    expect(getTop(chart, 2).map(entry => entry.rank)).toEqual([1, 2]);
    expect(getTop(chart).map(entry => entry.rank)).toEqual([1, 2, 3]);
    expect(getTop(chart, -1)).toEqual([]);
  });

  test('finds entries by primary or featured artist, ignoring case', () => {
    expect(findByArtist(chart, 'artist x').map(entry => entry.rank)).toEqual([1, 2]);
    expect(findByArtist(chart, 'nobody')).toEqual([]);
  });

  test('finds entries by partial title, ignoring case', () => {
    expect(findByTitle(chart, 'NIGHT').map(entry => entry.rank)).toEqual([1, 3]);
  });
});
