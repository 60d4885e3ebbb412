import type pino from 'pino';
import { RETRYABLE_STATUS_CODES } from '../../config/constants';
import { NetworkError } from '../../mcp/errors';
import { createChildLogger, generateCorrelationId } from '../../utils/logger';
import { fetchUrl as defaultFetchUrl } from './httpChartFetcher';
import type { FetchOptions, FetchResult } from './httpChartFetcher';

export interface RetryPolicy {
  /** Retries after the first attempt. */
  maxRetries: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  timeoutMs: number;
  userAgent: string;
}

export interface RetryDependencies {
  fetchUrl?: (url: string, options: FetchOptions) => Promise<FetchResult>;
  sleep?: (ms: number) => Promise<void>;
  correlationId?: string;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

export function isRetryableStatus(statusCode: number | undefined): boolean {
  return statusCode !== undefined && RETRYABLE_STATUS_CODES.has(statusCode);
}

/** Delay before retry `retry` (1-based), capped at backoffMaxMs. */
export function computeBackoffMs(
  retry: number,
  policy: Pick<RetryPolicy, 'backoffBaseMs' | 'backoffMaxMs'>,
  retryAfterMs?: number
): number {
  if (retryAfterMs !== undefined) {
    return Math.min(retryAfterMs, policy.backoffMaxMs);
  }
  return Math.min(policy.backoffBaseMs * 2 ** (retry - 1), policy.backoffMaxMs);
}

function shouldRetry(error: unknown): error is NetworkError {
  return error instanceof NetworkError && isRetryableStatus(error.statusCode);
}

export async function fetchWithRetry(
  url: string,
  policy: RetryPolicy,
  deps: RetryDependencies = {}
): Promise<FetchResult> {
  const fetchUrl = deps.fetchUrl ?? defaultFetchUrl;
  const sleep = deps.sleep ?? defaultSleep;
  const correlationId = deps.correlationId ?? generateCorrelationId();
  const log: pino.Logger = createChildLogger(correlationId);

  for (let attempt = 0; ; attempt++) {
    try {
      return await fetchUrl(url, {
        timeoutMs: policy.timeoutMs,
        userAgent: policy.userAgent,
        correlationId,
      });
    } catch (error) {
      if (!shouldRetry(error) || attempt >= policy.maxRetries) {
        throw error;
      }
      const retry = attempt + 1;
      const delayMs = computeBackoffMs(retry, policy, error.retryAfterMs);
      log.warn(
        { url, statusCode: error.statusCode, retry, maxRetries: policy.maxRetries, delayMs },
        'Retryable HTTP status, backing off'
      );
      await sleep(delayMs);
    }
  }
}
