import { EventEmitter } from 'events';
import type { WorkerProcess } from '../../src/core/crawl/crawlRunner';
import type { CrawlCommand } from '../../src/core/crawl/protocol';

type Script = (worker: FakeWorker, command: CrawlCommand) => void;

/** In-process stand-in for a crawl worker child process. */
export class FakeWorker extends EventEmitter implements WorkerProcess {
  pid: number | undefined = 4242;
  readonly sent: CrawlCommand[] = [];
  readonly kills: NodeJS.Signals[] = [];

  constructor(private readonly script: Script = () => undefined) {
    super();
  }

  send(message: CrawlCommand, callback?: (error: Error | null) => void): boolean {
    this.sent.push(message);
    callback?.(null);
    setImmediate(() => this.script(this, message));
    return true;
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.kills.push(signal);
    setImmediate(() => this.emit('exit', null, signal));
    return true;
  }

  reply(message: unknown): void {
    this.emit('message', message);
  }

  exit(code: number | null = 0): void {
    this.emit('exit', code, null);
  }
}
