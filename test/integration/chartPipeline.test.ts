import { describe, test, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { readFileSync } from 'fs';
import { join } from 'path';
import { ChartClient } from '../../src/core/chartClient';
import { serializeChart } from '../../src/core/models/chart';
import { clearEnvironmentCache } from '../../src/config/environment';
import { FetchFailureError } from '../../src/mcp/errors';

const FIXTURE = readFileSync(join(__dirname, '../fixtures/hot-100.html'), 'utf8');

const mockRequest = jest.fn<(options: Record<string, unknown>) => Promise<unknown>>();
const mockClose = jest.fn<() => Promise<void>>();

jest.mock('undici', () => ({
  Client: jest.fn().mockImplementation(() => ({
    request: mockRequest,
    close: mockClose,
    compose: jest.fn().mockReturnThis(),
  })),
  interceptors: {
    redirect: jest.fn().mockReturnValue(() => ({})),
  },
}));

function response(statusCode: number, body: string) {
  const buf = Buffer.from(body, 'utf8');
  return {
    statusCode,
    headers: {},
    body: {
      arrayBuffer: () => {
        const copy = new ArrayBuffer(buf.byteLength);
        new Uint8Array(copy).set(buf);
        return Promise.resolve(copy);
      },
    },
  };
}

describe('Chart pipeline (inline crawl)', () => {
  const originalEnv = process.env;
  let client: ChartClient;

  beforeEach(() => {
    process.env = { ...originalEnv, CRAWL_MODE: 'inline', RETRY_BACKOFF_BASE_MS: '1', RETRY_BACKOFF_MAX_MS: '5' };
    clearEnvironmentCache();
    mockRequest.mockReset();
    mockClose.mockReset();
    mockClose.mockResolvedValue(undefined);
    client = new ChartClient();
  });

  afterEach(async () => {
    await client.close();
    process.env = originalEnv;
    clearEnvironmentCache();
  });

  test('fetches, extracts and assembles the latest chart', async () => {
    mockRequest.mockResolvedValue(response(200, FIXTURE));

    const doc = await client.getChart('Hot 100', { maxEntries: 2 });

    expect(mockRequest).toHaveBeenCalledWith(
      expect.objectContaining({ path: '/charts/hot-100', method: 'GET' })
    );
    expect(doc.descriptor).toEqual({
      source: 'billboard',
      title: 'Billboard Hot 100',
      description: 'Test chart description.',
      url: 'https://www.billboard.com/charts/hot-100',
      kind: 'single',
    });
    expect(doc.published_date).toBe('2026-01-17');
    expect(doc.entries).toHaveLength(2);
    expect(doc.entries[1].last_week).toBe(1);

    expect(serializeChart(doc).entries[0]).toEqual({
      track: {
        title: 'Test Song One',
        artist: 'Artist Alpha',
        artists: ['Artist Alpha'],
        image: 'https://charts-static.example.com/cover-one.jpg',
        album: '',
      },
      rank: 1,
      weeks_on_chart: 2,
      last_week: 3,
      peak_position: 1,
      peak_inferred: false,
    });
  });

  test('retries a transient server error', async () => {
    mockRequest
      .mockResolvedValueOnce(response(503, 'busy'))
      .mockResolvedValueOnce(response(200, FIXTURE));

    const doc = await client.getChart('hot-100');

    expect(mockRequest).toHaveBeenCalledTimes(2);
    expect(doc.entries.map(entry => entry.rank)).toEqual([1, 2, 3]);
  });

  test('does not retry a client error', async () => {
    mockRequest.mockResolvedValue(response(404, 'missing'));

    const error = await client.getChart('hot-100').catch((e: unknown) => e);

    expect(mockRequest).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(FetchFailureError);
    expect(String(error)).toContain('status: 404');
  });

  test('reports a page without rows as no data', async () => {
    mockRequest.mockResolvedValue(response(200, '<html><body>Maintenance</body></html>'));

    await expect(client.getChart('hot-100')).rejects.toThrow(
      'Fetch failed for chart: hot-100: no data returned'
    );
  });
});
