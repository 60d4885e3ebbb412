import { describe, test, expect, beforeEach, jest } from '@jest/globals';
import { gzipSync } from 'zlib';
import { fetchUrl, headerValue, parseRetryAfter } from '../../../../src/core/fetch/httpChartFetcher';
import { clearEnvironmentCache } from '../../../../src/config/environment';
import { NetworkError, TimeoutError } from '../../../../src/mcp/errors';

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

function toArrayBuffer(buf: Buffer): ArrayBuffer {
  const copy = new ArrayBuffer(buf.byteLength);
  new Uint8Array(copy).set(buf);
  return copy;
}

function response(statusCode: number, body: Buffer | string, headers: Record<string, string> = {}) {
  const buf = typeof body === 'string' ? Buffer.from(body, 'utf8') : body;
  return {
    statusCode,
    headers,
    body: { arrayBuffer: () => Promise.resolve(toArrayBuffer(buf)) },
  };
}

describe('httpChartFetcher', () => {
  beforeEach(() => {
    mockRequest.mockReset();
    mockClose.mockReset();
    mockClose.mockResolvedValue(undefined);
    process.env.REQUEST_TIMEOUT_MS = '2000';
    clearEnvironmentCache();
  });

  test('fetches a page and returns its body', async () => {
    mockRequest.mockResolvedValue(response(200, '<html>chart</html>'));

    const result = await fetchUrl('https://www.billboard.com/charts/hot-100?x=1', {
      userAgent: 'test-agent',
    });

    expect(result).toEqual({
      statusCode: 200,
      bodyText: '<html>chart</html>',
      url: 'https://www.billboard.com/charts/hot-100?x=1',
    });
    expect(mockRequest).toHaveBeenCalledWith(
      expect.objectContaining({
        path: '/charts/hot-100?x=1',
        method: 'GET',
        headers: expect.objectContaining({ 'user-agent': 'test-agent' }),
      })
    );
    expect(mockClose).toHaveBeenCalledTimes(1);
  });

  test('decodes gzip bodies', async () => {
    mockRequest.mockResolvedValue(
      response(200, gzipSync(Buffer.from('compressed chart')), { 'content-encoding': 'gzip' })
    );

    const result = await fetchUrl('https://www.billboard.com/charts/hot-100');
    expect(result.bodyText).toBe('compressed chart');
  });

  test('raises NetworkError with status and Retry-After for error statuses', async () => {
    mockRequest.mockResolvedValue(response(503, 'busy', { 'retry-after': '2' }));

    const error = await fetchUrl('https://www.billboard.com/charts/hot-100').catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ statusCode: 503, retryAfterMs: 2000 });
    expect(mockClose).toHaveBeenCalledTimes(1);
  });

  test('times out slow requests', async () => {
    mockRequest.mockImplementation(() => new Promise(() => undefined));

    await expect(
      fetchUrl('https://www.billboard.com/charts/hot-100', { timeoutMs: 50 })
    ).rejects.toBeInstanceOf(TimeoutError);
    expect(mockClose).toHaveBeenCalledTimes(1);
  });

  test('rejects non-http(s) URLs without a request', async () => {
    await expect(fetchUrl('file:///etc/passwd')).rejects.toThrow('Only http(s) schemes are allowed');
    expect(mockRequest).not.toHaveBeenCalled();
  });
});

describe('header helpers', () => {
  test('reads the first value of a header', () => {
    expect(headerValue({ 'retry-after': ['5', '7'] }, 'retry-after')).toBe('5');
    expect(headerValue({ 'retry-after': '3' }, 'retry-after')).toBe('3');
    expect(headerValue(undefined, 'retry-after')).toBeUndefined();
  });

  test('parses Retry-After seconds and dates', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
    expect(parseRetryAfter('120', now)).toBe(120000);
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:30 GMT', now)).toBe(30000);
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:27:00 GMT', now)).toBe(0);
    expect(parseRetryAfter('soon', now)).toBeUndefined();
    expect(parseRetryAfter(undefined, now)).toBeUndefined();
  });
});
