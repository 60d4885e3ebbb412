#!/usr/bin/env node

import { ChartCrawlerServer } from './server';
import { logger } from './utils/logger';

export { ChartClient, getChartClient, closeChartClient } from './core/chartClient';
export type { ChartClientOptions, ProviderRequestOptions } from './core/chartClient';
export { BillboardProvider } from './core/providers/billboardProvider';
export type { BillboardProviderConfig } from './core/providers/billboardProvider';
export { SpotifyProvider } from './core/providers/spotifyProvider';
export {
  ProviderCapability,
  supportsCapability,
  assertCapability,
  describeCapabilities,
} from './core/providers/types';
export type { ChartProvider, ChartRequestOptions, ProviderCapabilityName } from './core/providers/types';
export { resolveChart, listCanonicalCharts } from './core/resolution/chartResolver';
export type { ResolvedChart, ResolveOptions } from './core/resolution/chartResolver';
export { extractRawEntries, extractChartPage } from './core/extraction/chartPageExtractor';
export type { RawEntryRecord, ChartPageExtraction, ExtractionOptions } from './core/extraction/types';
export { assembleChart } from './core/assembly/chartAssembler';
export { runCrawl } from './core/crawl/crawlRunner';
export type { CrawlMode, RunCrawlOptions } from './core/crawl/crawlRunner';
export type { CrawlRequest, CrawlResult } from './core/crawl/protocol';
export {
  createTrack,
  createCollection,
  createEntry,
  createChartDocument,
  serializeChart,
} from './core/models/chart';
export type {
  Track,
  Collection,
  Entry,
  ChartDescriptor,
  ChartDocument,
  ChartKind,
  SerializedChart,
} from './core/models/chart';
export { totalEntries, getTop, findByArtist, findByTitle } from './core/models/chartQueries';
export { parseIsoDate, formatIsoDate, todayIsoDate } from './utils/dates';
export {
  InvalidChartError,
  NotSupportedError,
  FetchFailureError,
  ValidationFailureError,
  ValidationError,
  TimeoutError,
  NetworkError,
} from './mcp/errors';
export { ChartCrawlerServer };

if (process.env.NODE_ENV !== 'test' && require.main === module) {
  const server = new ChartCrawlerServer();

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal, closing gracefully...');
    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during graceful shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  server.start().catch(error => {
    logger.error({ error }, 'Fatal error during server startup');
    process.exit(1);
  });
}
