import { RateLimiterMemory, RateLimiterRes } from 'rate-limiter-flexible';
import type pino from 'pino';
import { getEnvironment } from '../../config/environment';
import { FetchFailureError, NotSupportedError, ValidationError } from '../../mcp/errors';
import { createChildLogger, generateCorrelationId, withTiming } from '../../utils/logger';
import { assembleChart } from '../assembly/chartAssembler';
import { runCrawl as defaultRunCrawl } from '../crawl/crawlRunner';
import type { CrawlMode, RunCrawlOptions } from '../crawl/crawlRunner';
import { CrawlRequestSchema } from '../crawl/protocol';
import type { CrawlRequest, CrawlResult } from '../crawl/protocol';
import type { ChartDescriptor, ChartDocument } from '../models/chart';
import { listCanonicalCharts, resolveChart } from '../resolution/chartResolver';
import { ProviderCapability, capabilityLabel } from './types';
import type { ChartProvider, ChartRequestOptions } from './types';

export interface BillboardProviderConfig {
  includeImages?: boolean;
  maxEntries?: number | null;
  fallbackToDefault?: boolean;
  maxRetries?: number;
  timeoutMs?: number;
  backoffBaseMs?: number;
  backoffMaxMs?: number;
  userAgent?: string;
  /** Crawl starts allowed per second. */
  concurrency?: number;
  crawlMode?: CrawlMode;
  runCrawl?: (request: CrawlRequest, options: RunCrawlOptions) => Promise<CrawlResult | null>;
}

const RATE_LIMIT_KEY = 'billboard.crawl';

export class BillboardProvider implements ChartProvider {
  readonly name = 'billboard';
  readonly capabilities = ProviderCapability.Latest | ProviderCapability.ListCharts;

  private readonly config: BillboardProviderConfig;
  private readonly limiter: RateLimiterMemory;
  private readonly runCrawl: NonNullable<BillboardProviderConfig['runCrawl']>;

  constructor(config: BillboardProviderConfig = {}) {
    this.config = config;
    this.runCrawl = config.runCrawl ?? defaultRunCrawl;
    const concurrency = config.concurrency ?? getEnvironment().CONCURRENCY;
    this.limiter = new RateLimiterMemory({ points: concurrency, duration: 1 });
  }

  async getLatest(chart: string, options: ChartRequestOptions = {}): Promise<ChartDocument> {
    const env = getEnvironment();
    const correlationId = options.correlationId ?? generateCorrelationId();
    const log = createChildLogger(correlationId);

    const resolved = resolveChart(chart, {
      fallbackToDefault:
        options.fallbackToDefault ?? this.config.fallbackToDefault ?? env.FALLBACK_TO_DEFAULT,
      logger: log,
    });
    const maxEntries =
      options.maxEntries !== undefined
        ? options.maxEntries
        : (this.config.maxEntries ?? env.MAX_CHART_ENTRIES ?? null);
    const limit = CrawlRequestSchema.shape.maxEntries.safeParse(maxEntries);
    if (!limit.success) {
      throw new ValidationError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }

    const request: CrawlRequest = {
      chartId: resolved.id,
      url: resolved.url,
      kind: resolved.kind,
      fallbackDescription: resolved.fallbackDescription,
      includeImages: options.includeImages ?? this.config.includeImages ?? env.INCLUDE_IMAGES,
      maxEntries,
      http: {
        maxRetries: options.maxRetries ?? this.config.maxRetries ?? env.MAX_RETRIES,
        backoffBaseMs: this.config.backoffBaseMs ?? env.RETRY_BACKOFF_BASE_MS,
        backoffMaxMs: this.config.backoffMaxMs ?? env.RETRY_BACKOFF_MAX_MS,
        timeoutMs: options.timeoutMs ?? this.config.timeoutMs ?? env.REQUEST_TIMEOUT_MS,
        userAgent: this.config.userAgent ?? env.USER_AGENT,
      },
      correlationId,
    };

    await this.acquireSlot(log);

    const result = await withTiming(
      log,
      'billboard.getLatest',
      () => this.runCrawl(request, { mode: this.config.crawlMode }),
      { chartId: resolved.id, usedFallback: resolved.usedFallback }
    );

    if (!result || result.entries.length === 0) {
      throw new FetchFailureError('no data returned', { chartId: resolved.id, url: resolved.url });
    }

    return assembleChart(result, resolved, { source: this.name, maxEntries });
  }

  async getChart(chart: string, date: string): Promise<ChartDocument> {
    throw new NotSupportedError(
      capabilityLabel('Historical'),
      this.name,
      `cannot fetch "${chart}" for ${date}; only the latest chart is published`
    );
  }

  async listAvailableCharts(): Promise<ChartDescriptor[]> {
    return listCanonicalCharts(this.name);
  }

  async close(): Promise<void> {
    // Nothing pooled: every crawl owns its client and worker
  }

  // Waits for a pacing slot rather than failing
  private async acquireSlot(log: pino.Logger): Promise<void> {
    for (;;) {
      try {
        await this.limiter.consume(RATE_LIMIT_KEY);
        return;
      } catch (e) {
        if (!(e instanceof RateLimiterRes)) throw e;
        const delayMs = Math.max(50, e.msBeforeNext);
        log.debug({ delayMs, remainingPoints: e.remainingPoints }, 'Crawl rate limited; waiting');
        await new Promise(resolve => setTimeout(resolve, delayMs));
      }
    }
  }
}
