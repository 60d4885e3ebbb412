import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { InitializationService } from '../../../src/services/initialization';
import { clearEnvironmentCache } from '../../../src/config/environment';

describe('Initialization Service', () => {
  let initService: InitializationService;
  const originalEnv = process.env;

  beforeEach(() => {
    initService = new InitializationService();
    process.env = { ...originalEnv };
    clearEnvironmentCache();
  });

  afterEach(() => {
    process.env = originalEnv;
    clearEnvironmentCache();
  });

  test('skips worker resolution in inline mode', async () => {
    process.env.CRAWL_MODE = 'inline';

    await expect(initService.initialize()).resolves.toEqual({
      crawlMode: 'inline',
      workerPath: null,
    });
  });

  test('resolves the worker in process mode', async () => {
    process.env.CRAWL_MODE = 'process';
    process.env.CRAWL_WORKER_PATH = __filename;

    await expect(initService.initialize()).resolves.toEqual({
      crawlMode: 'process',
      workerPath: __filename,
    });
  });

  test('fails when the worker cannot be found', async () => {
    process.env.CRAWL_MODE = 'process';
    process.env.CRAWL_WORKER_PATH = '/nonexistent/crawlWorker.js';

    await expect(initService.initialize()).rejects.toThrow('Crawl worker not found');
  });

  test('fails with invalid configuration', async () => {
    process.env.MAX_RETRIES = 'many';

    await expect(initService.initialize()).rejects.toThrow('Environment validation failed');
  });
});
