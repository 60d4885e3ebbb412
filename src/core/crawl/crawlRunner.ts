import { spawn } from 'child_process';
import type { EventEmitter } from 'events';
import { existsSync } from 'fs';
import { join } from 'path';
import type { Readable } from 'stream';
import { getEnvironment } from '../../config/environment';
import { FetchFailureError } from '../../mcp/errors';
import { createChildLogger, generateCorrelationId, logger } from '../../utils/logger';
import { executeCrawl } from './executeCrawl';
import { WorkerReplySchema } from './protocol';
import type { CrawlCommand, CrawlRequest, CrawlResult, WorkerReply } from './protocol';

export type CrawlMode = 'process' | 'inline';

/** The slice of ChildProcess the runner relies on. */
export interface WorkerProcess extends EventEmitter {
  readonly pid?: number;
  readonly stdout?: Readable | null;
  readonly stderr?: Readable | null;
  send(message: CrawlCommand, callback?: (error: Error | null) => void): boolean;
  kill(signal?: NodeJS.Signals): boolean;
}

export type WorkerSpawner = (workerPath: string) => WorkerProcess;

export interface RunCrawlOptions {
  mode?: CrawlMode;
  /** Supervision timeout; the worker is killed once it is exceeded. */
  timeoutMs?: number;
  workerPath?: string;
  spawnWorker?: WorkerSpawner;
  executeInline?: (request: CrawlRequest) => Promise<CrawlResult>;
}

export const WORKER_FILE_NAME = 'crawlWorker.js';

export function resolveWorkerPath(): string {
  const override = process.env.CRAWL_WORKER_PATH;
  if (override) {
    if (existsSync(override)) {
      logger.debug({ workerPath: override }, 'Crawl worker resolved via environment override');
      return override;
    }
    logger.debug({ workerPath: override }, 'Crawl worker override not found');
  }

  // Compiled output keeps the worker beside this file
  const sibling = join(__dirname, WORKER_FILE_NAME);
  if (existsSync(sibling)) {
    return sibling;
  }

  throw new Error(
    `Crawl worker not found. Searched: ${[override, sibling].filter(Boolean).join(', ')}. ` +
      'Build the project, set CRAWL_WORKER_PATH, or use CRAWL_MODE=inline.'
  );
}

const spawnProcessWorker: WorkerSpawner = workerPath =>
  spawn(process.execPath, [workerPath], {
    stdio: ['ignore', 'pipe', 'pipe', 'ipc'],
    env: process.env,
  });

/**
 * Crawls one chart page in a fresh child process, or in-process when the mode
 * is `inline`. Resolves null when the worker exits without replying.
 */
export async function runCrawl(
  request: CrawlRequest,
  options: RunCrawlOptions = {}
): Promise<CrawlResult | null> {
  const env = getEnvironment();
  const mode = options.mode ?? env.CRAWL_MODE;

  if (mode === 'inline') {
    const execute = options.executeInline ?? ((req: CrawlRequest) => executeCrawl(req));
    try {
      return await execute(request);
    } catch (error) {
      throw toFetchFailure(error, request);
    }
  }

  let workerPath: string;
  try {
    workerPath = options.workerPath ?? resolveWorkerPath();
  } catch (error) {
    throw toFetchFailure(error, request);
  }

  return runInWorker(
    request,
    workerPath,
    options.spawnWorker ?? spawnProcessWorker,
    options.timeoutMs ?? env.CRAWL_WORKER_TIMEOUT_MS
  );
}

function toFetchFailure(error: unknown, request: CrawlRequest): FetchFailureError {
  if (error instanceof FetchFailureError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new FetchFailureError(message, { chartId: request.chartId, url: request.url, cause: error });
}

function runInWorker(
  request: CrawlRequest,
  workerPath: string,
  spawnWorker: WorkerSpawner,
  timeoutMs: number
): Promise<CrawlResult | null> {
  const log = createChildLogger(request.correlationId ?? generateCorrelationId());
  const context = { chartId: request.chartId, url: request.url };

  return new Promise<CrawlResult | null>((resolve, reject) => {
    let child: WorkerProcess;
    try {
      child = spawnWorker(workerPath);
    } catch (error) {
      reject(toFetchFailure(error, request));
      return;
    }

    let reply: WorkerReply | null = null;
    let failure: FetchFailureError | null = null;
    let timedOut = false;
    let settled = false;

    const settle = (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);

      if (timedOut) {
        reject(
          new FetchFailureError(`crawl worker exceeded ${timeoutMs}ms and was killed`, context)
        );
      } else if (failure) {
        reject(failure);
      } else if (reply?.type === 'result') {
        resolve(reply.result);
      } else if (reply?.type === 'error') {
        reject(new FetchFailureError(reply.error.message, { ...context, cause: reply.error }));
      } else {
        log.warn({ workerPath, code, signal }, 'Crawl worker exited without a reply');
        resolve(null);
      }
    };

    const timer = setTimeout(() => {
      timedOut = true;
      log.warn({ workerPath, timeoutMs, pid: child.pid }, 'Crawl worker timed out, killing');
      child.kill('SIGKILL');
    }, timeoutMs);

    // One-shot: only the first reply counts
    child.on('message', (message: unknown) => {
      if (reply || failure) return;
      const parsed = WorkerReplySchema.safeParse(message);
      if (parsed.success) {
        reply = parsed.data;
      } else {
        failure = new FetchFailureError('malformed reply from crawl worker', context);
      }
    });

    child.on('error', (error: Error) => {
      failure ??= new FetchFailureError(`crawl worker error: ${error.message}`, {
        ...context,
        cause: error,
      });
      // A worker that never started emits no exit
      if (child.pid === undefined) settle(null, null);
    });

    child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      log.debug({ workerPath, code, signal }, 'Crawl worker exited');
      settle(code, signal);
    });

    child.stdout?.on('data', (chunk: Buffer) => {
      log.debug({ workerPath, output: chunk.toString('utf8').trim() }, 'Crawl worker stdout');
    });
    child.stderr?.on('data', (chunk: Buffer) => {
      log.debug({ workerPath, output: chunk.toString('utf8').trim() }, 'Crawl worker stderr');
    });

    log.debug({ workerPath, pid: child.pid, chartId: request.chartId }, 'Crawl worker started');
    child.send({ type: 'crawl', request }, error => {
      if (!error) return;
      failure ??= new FetchFailureError(`could not send crawl request: ${error.message}`, {
        ...context,
        cause: error,
      });
      child.kill('SIGKILL');
    });
  });
}
