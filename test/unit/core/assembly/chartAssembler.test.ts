import { describe, test, expect } from '@jest/globals';
import { assembleChart } from '../../../../src/core/assembly/chartAssembler';
import { serializeChart } from '../../../../src/core/models/chart';
import { ValidationFailureError } from '../../../../src/mcp/errors';
import { crawlResult, rawRecord } from '../../../helpers/chartFixtures';

const HOT_100 = { title: 'Billboard Hot 100', kind: 'single' as const };
const BILLBOARD_200 = { title: 'Billboard 200', kind: 'collection' as const };

describe('assembleChart', () => {
  test('builds a single-chart document with track entries', () => {
    const doc = assembleChart(
      crawlResult([
        rawRecord({ rank: 1, title: 'Song A', artist: 'Artist X', artists: ['Artist X'] }),
        rawRecord({ rank: 2, title: 'Song B', artist: 'Artist Y', artists: ['Artist Y'], last_week: 1 }),
      ]),
      HOT_100,
      { source: 'billboard' }
    );

    expect(doc.descriptor).toEqual({
      source: 'billboard',
      title: 'Billboard Hot 100',
      description: 'Test chart description.',
      url: 'https://www.billboard.com/charts/hot-100',
      kind: 'single',
    });
    expect(doc.published_date).toBe('2026-01-17');
    expect(doc.kind).toBe('single');
    expect(doc.entries).toHaveLength(2);
    expect(doc.entries[1].last_week).toBe(1);
    expect(doc.entries[0].track).toEqual({
      title: 'Song A',
      artist: 'Artist X',
      artists: ['Artist X'],
      image: '',
      album: '',
    });
    expect(doc.entries[0].collection).toBeUndefined();
  });

  test('builds collection entries for collection charts', () => {
    const doc = assembleChart(
      crawlResult([rawRecord({ title: 'Album A', entry_kind: 'collection' })]),
      BILLBOARD_200,
      { source: 'billboard' }
    );

    expect(doc.kind).toBe('collection');
    expect(doc.entries[0].collection).toEqual({
      title: 'Album A',
      artist: 'Artist X',
      artists: ['Artist X'],
      image: '',
    });
    expect(doc.entries[0].track).toBeUndefined();
  });

  test('sorts by rank, keeps ties in page order and keeps duplicates', () => {
    const doc = assembleChart(
      crawlResult([
        rawRecord({ rank: 3, title: 'Third' }),
        rawRecord({ rank: 1, title: 'First' }),
        rawRecord({ rank: 2, title: 'Second (a)' }),
        rawRecord({ rank: 2, title: 'Second (b)' }),
      ]),
      HOT_100,
      { source: 'billboard' }
    );

    expect(doc.entries.map(entry => [entry.rank, entry.track?.title])).toEqual([
      [1, 'First'],
      [2, 'Second (a)'],
      [2, 'Second (b)'],
      [3, 'Third'],
    ]);
  });

  test('trims to maxEntries after sorting', () => {
    const doc = assembleChart(
      crawlResult([rawRecord({ rank: 2, title: 'B' }), rawRecord({ rank: 1, title: 'A' })]),
      HOT_100,
      { source: 'billboard', maxEntries: 1 }
    );

    expect(doc.entries.map(entry => entry.track?.title)).toEqual(['A']);
  });

  test('rejects a record whose kind disagrees with the chart', () => {
    expect(() =>
      assembleChart(crawlResult([rawRecord({ entry_kind: 'collection' })]), HOT_100, {
        source: 'billboard',
      })
    ).toThrow(ValidationFailureError);
  });

  test('rejects records that break entry invariants', () => {
    expect(() =>
      assembleChart(crawlResult([rawRecord({ title: '   ' })]), HOT_100, { source: 'billboard' })
    ).toThrow('Validation failure: invalid chart entry');
  });

  test('returns a frozen document', () => {
    const doc = assembleChart(crawlResult(), HOT_100, { source: 'billboard' });

    expect(Object.isFrozen(doc)).toBe(true);
    expect(Object.isFrozen(doc.entries)).toBe(true);
    expect(Object.isFrozen(doc.entries[0].track)).toBe(true);
  });

  test('serializes without the absent item key', () => {
    const doc = assembleChart(crawlResult(), HOT_100, { source: 'billboard' });
    const entry = serializeChart(doc).entries[0];

    expect(Object.keys(entry)).toEqual([
      'track',
      'rank',
      'weeks_on_chart',
      'last_week',
      'peak_position',
      'peak_inferred',
    ]);
    expect(JSON.parse(JSON.stringify(serializeChart(doc)))).toEqual(serializeChart(doc));
  });
});
