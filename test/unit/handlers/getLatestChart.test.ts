import { describe, test, expect } from '@jest/globals';
import { handleGetLatestChart } from '../../../src/handlers/getLatestChart';
import { ChartClient } from '../../../src/core/chartClient';
import { createChildLogger } from '../../../src/utils/logger';
import { FakeProvider } from '../../helpers/fakeProvider';

describe('Get Latest Chart Handler', () => {
  const logger = createChildLogger('test-handler');

  function setup() {
    const billboard = new FakeProvider('billboard');
    const client = new ChartClient({ providers: [billboard] });
    return { billboard, client };
  }

  test('returns the serialized chart as JSON text', async () => {
    const { client } = setup();

    const result = await handleGetLatestChart({ chart: 'hot-100' }, logger, client);

    expect(result.content).toHaveLength(1);
    expect(result.content[0].type).toBe('text');
    const parsed = JSON.parse(result.content[0].text);
    expect(parsed.descriptor.title).toBe('Billboard Hot 100');
    expect(parsed.published_date).toBe('2026-01-17');
    expect(parsed.kind).toBe('single');
    expect(parsed.entries).toHaveLength(2);
    expect(parsed.entries[1]).toEqual({
      track: { title: 'Song B', artist: 'Artist Y', artists: ['Artist Y'], image: '', album: '' },
      rank: 2,
      weeks_on_chart: 0,
      last_week: 1,
      peak_position: 0,
      peak_inferred: false,
    });
    expect(parsed.entries[1]).not.toHaveProperty('collection');
  });

  test('applies defaults and forwards options with the correlation id', async () => {
    const { billboard, client } = setup();

    await handleGetLatestChart({ maxEntries: 10, includeImages: false }, logger, client);

    expect(billboard.getLatest).toHaveBeenCalledWith('hot-100', {
      includeImages: false,
      maxEntries: 10,
      fallbackToDefault: undefined,
      correlationId: 'test-handler',
    });
  });

  test('accepts a missing argument object', async () => {
    const { billboard, client } = setup();
    await handleGetLatestChart(undefined, logger, client);
    expect(billboard.getLatest).toHaveBeenCalledTimes(1);
  });

  test('rejects out-of-range maxEntries', async () => {
    const { billboard, client } = setup();

    await expect(handleGetLatestChart({ maxEntries: 0 }, logger, client)).rejects.toThrow();
    await expect(handleGetLatestChart({ maxEntries: 501 }, logger, client)).rejects.toThrow();
    expect(billboard.getLatest).not.toHaveBeenCalled();
  });

  test('rejects unknown providers', async () => {
    const { client } = setup();
    await expect(handleGetLatestChart({ provider: 'deezer' }, logger, client)).rejects.toThrow(
      'Unknown provider: "deezer"'
    );
  });
});
