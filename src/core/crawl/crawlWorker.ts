import { logger } from '../../utils/logger';
import { executeCrawl as defaultExecuteCrawl } from './executeCrawl';
import { CrawlCommandSchema, serializeError } from './protocol';
import type { CrawlRequest, CrawlResult, WorkerReply } from './protocol';

/** The parent side of the IPC channel as the worker sees it. */
export interface ParentChannel {
  onMessage(listener: (message: unknown) => void): void;
  send(reply: WorkerReply): Promise<void>;
  disconnect(): void;
}

export function processChannel(proc: NodeJS.Process = process): ParentChannel {
  return {
    onMessage: listener => {
      proc.once('message', listener);
    },
    send: reply =>
      new Promise<void>((resolve, reject) => {
        if (!proc.send) {
          reject(new Error('Crawl worker started without an IPC channel'));
          return;
        }
        proc.send(reply, undefined, {}, error => (error ? reject(error) : resolve()));
      }),
    disconnect: () => {
      if (proc.connected) proc.disconnect?.();
    },
  };
}

/**
 * Waits for exactly one crawl command, answers it once, then disconnects so the
 * process can exit.
 */
export function runWorker(
  channel: ParentChannel,
  execute: (request: CrawlRequest) => Promise<CrawlResult> = request => defaultExecuteCrawl(request)
): Promise<void> {
  return new Promise<void>(resolve => {
    channel.onMessage(message => {
      const reply = handleCommand(message, execute);
      void reply
        .then(answer => channel.send(answer))
        .catch((error: unknown) => {
          logger.error({ error }, 'Crawl worker could not deliver its reply');
        })
        .finally(() => {
          channel.disconnect();
          resolve();
        });
    });
  });
}

async function handleCommand(
  message: unknown,
  execute: (request: CrawlRequest) => Promise<CrawlResult>
): Promise<WorkerReply> {
  const parsed = CrawlCommandSchema.safeParse(message);
  if (!parsed.success) {
    return {
      type: 'error',
      error: { name: 'ValidationError', message: `Malformed crawl command: ${parsed.error.message}` },
    };
  }
  try {
    const result = await execute(parsed.data.request);
    return { type: 'result', result };
  } catch (error) {
    return { type: 'error', error: serializeError(error) };
  }
}

if (require.main === module) {
  void runWorker(processChannel());
}
