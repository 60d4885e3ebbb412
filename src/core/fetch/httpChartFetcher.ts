import { Client, interceptors } from 'undici';
import type { Dispatcher } from 'undici';
import { brotliDecompressSync, gunzipSync, inflateSync } from 'zlib';
import type pino from 'pino';
import { getEnvironment } from '../../config/environment';
import { MAX_REDIRECTIONS } from '../../config/constants';
import { withTiming, createChildLogger, generateCorrelationId } from '../../utils/logger';
import { TimeoutError, NetworkError } from '../../mcp/errors';

const { redirect } = interceptors;

const CLIENT_CLOSE_TIMEOUT_MS = 2000;

export interface FetchOptions {
  timeoutMs?: number;
  userAgent?: string;
  correlationId?: string;
}

export interface FetchResult {
  statusCode: number;
  bodyText: string;
  url: string;
}

type ResponseHeaders = Dispatcher.ResponseData['headers'];

export function headerValue(headers: ResponseHeaders | undefined, name: string): string | undefined {
  const value = headers?.[name];
  if (Array.isArray(value)) return value[0];
  return value ?? undefined;
}

/**
 * Retry-After as milliseconds. Accepts delta-seconds or an HTTP date; dates in
 * the past yield 0.
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

function buildHeaders(userAgent: string): Record<string, string> {
  return {
    accept:
      'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
    'accept-language': 'en-US,en;q=0.9',
    'accept-encoding': 'gzip, br, deflate',
    'user-agent': userAgent,
    dnt: '1',
    connection: 'keep-alive',
    'upgrade-insecure-requests': '1',
    'sec-fetch-dest': 'document',
    'sec-fetch-mode': 'navigate',
    'sec-fetch-site': 'none',
    'cache-control': 'max-age=0',
  };
}

function decodeBody(buf: Buffer, encoding: string): Buffer {
  if (encoding.includes('br')) return brotliDecompressSync(buf);
  if (encoding.includes('gzip')) return gunzipSync(buf);
  if (encoding.includes('deflate')) return inflateSync(buf);
  return buf;
}

async function closeClient(client: Dispatcher, log: pino.Logger): Promise<void> {
  let timer: NodeJS.Timeout | null = null;
  try {
    await Promise.race([
      client.close(),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error('Client close timeout')), CLIENT_CLOSE_TIMEOUT_MS);
      }),
    ]);
  } catch (error) {
    // The response is already in hand; a failed close only leaks a socket
    log.warn({ error }, 'Client close failed or timed out');
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * One GET with browser-like headers. A fresh client is created and closed per
 * call. Status >= 400 raises NetworkError with the status and any Retry-After.
 */
export async function fetchUrl(url: string, options: FetchOptions = {}): Promise<FetchResult> {
  const env = getEnvironment();
  const timeoutMs = options.timeoutMs ?? env.REQUEST_TIMEOUT_MS;
  const userAgent = options.userAgent ?? env.USER_AGENT;
  const log = createChildLogger(options.correlationId ?? generateCorrelationId());

  if (!/^https?:\/\//i.test(url)) {
    throw new NetworkError('Only http(s) schemes are allowed');
  }

  const urlObj = new URL(url);
  const path = urlObj.pathname + urlObj.search;
  const client: Dispatcher = new Client(urlObj.origin).compose(
    redirect({ maxRedirections: MAX_REDIRECTIONS })
  );
  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | null = null;

  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(new TimeoutError('Request timed out', timeoutMs));
      }, timeoutMs);
    });

    const res = await withTiming(
      log,
      'http.fetch',
      async () =>
        Promise.race([
          client.request({
            path,
            method: 'GET',
            signal: controller.signal,
            headers: buildHeaders(userAgent),
          }),
          timeoutPromise,
        ]),
      { url }
    );

    const encoding = (headerValue(res.headers, 'content-encoding') ?? '').toLowerCase();
    const raw = Buffer.from(await res.body.arrayBuffer());
    const bodyText = decodeBody(raw, encoding).toString('utf8');

    if (timeoutId) clearTimeout(timeoutId);

    log.debug(
      { statusCode: res.statusCode, encoding, bodyLength: bodyText.length },
      'HTTP response read'
    );

    if (res.statusCode >= 400) {
      throw new NetworkError(
        'HTTP error',
        res.statusCode,
        parseRetryAfter(headerValue(res.headers, 'retry-after'))
      );
    }

    return { statusCode: res.statusCode, bodyText, url };
  } catch (err) {
    if (err instanceof TimeoutError || err instanceof NetworkError) {
      throw err;
    }
    if (err instanceof Error && err.name === 'AbortError') {
      throw new TimeoutError('Request timed out', timeoutMs);
    }
    throw err;
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
    await closeClient(client, log);
  }
}
