import { getEnvironment, validateEnvironment } from '../config/environment';
import { resolveWorkerPath } from '../core/crawl/crawlRunner';
import type { CrawlMode } from '../core/crawl/crawlRunner';
import { logger } from '../utils/logger';

export interface InitializationReport {
  crawlMode: CrawlMode;
  /** Null in inline mode. */
  workerPath: string | null;
}

export class InitializationService {
  async initialize(): Promise<InitializationReport> {
    try {
      logger.info('Validating environment configuration');
      validateEnvironment();

      const { CRAWL_MODE } = getEnvironment();
      const workerPath = CRAWL_MODE === 'process' ? resolveWorkerPath() : null;
      logger.info({ crawlMode: CRAWL_MODE, workerPath }, 'Application initialized successfully');

      return { crawlMode: CRAWL_MODE, workerPath };
    } catch (error) {
      logger.error({ error }, 'Failed to initialize application');
      throw error;
    }
  }
}
