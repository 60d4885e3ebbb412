import { createChildLogger, generateCorrelationId, withTiming } from '../../utils/logger';
import { extractChartPage } from '../extraction/chartPageExtractor';
import { fetchWithRetry as defaultFetchWithRetry } from '../fetch/retryPolicy';
import type { CrawlRequest, CrawlResult } from './protocol';

export interface ExecuteCrawlDependencies {
  fetchWithRetry?: typeof defaultFetchWithRetry;
  now?: () => Date;
}

/** Fetch one chart page (with retry) and extract it. */
export async function executeCrawl(
  request: CrawlRequest,
  deps: ExecuteCrawlDependencies = {}
): Promise<CrawlResult> {
  const fetchWithRetry = deps.fetchWithRetry ?? defaultFetchWithRetry;
  const correlationId = request.correlationId ?? generateCorrelationId();
  const log = createChildLogger(correlationId);

  return withTiming(
    log,
    'chart.crawl',
    async () => {
      const response = await fetchWithRetry(request.url, request.http, { correlationId });
      return extractChartPage(response.bodyText, {
        kind: request.kind,
        includeImages: request.includeImages,
        maxEntries: request.maxEntries,
        url: request.url,
        fallbackDescription: request.fallbackDescription,
        correlationId,
        now: deps.now?.(),
      });
    },
    { chartId: request.chartId }
  );
}
