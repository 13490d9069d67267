import { appendFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import { attemptAsync, type Result } from './result.js';

const DEFAULT_MAX_QUEUE = 10000;
const DEFAULT_CLOSE_TIMEOUT = 2000;

export interface WriteJob {
  path: string;
  text: string;
}

export interface AsyncFileWriterOptions {
  maxQueue?: number;
}

export function dropNotice(count: number): string {
  return `[log-writer] dropped ${count} chunks due to backpressure\n`;
}

/**
 * Appends text to log files off the producer's path. `write` only queues;
 * a single worker loop drains the queue in FIFO order. When the queue is full
 * the chunk is dropped and counted, and the count is written into that file
 * after its next successful append.
 */
export class AsyncFileWriter {
  private queue: WriteJob[];
  private maxQueue: number;
  private pendingDrops: Map<string, number>;
  private knownDirs: Set<string>;
  private stopRequested: boolean;
  private finished: boolean;
  private inFlight: boolean;
  private wake: (() => void) | null;
  private idleWaiters: Array<() => void>;
  private totalDropped: number;
  private worker: Promise<void>;

  constructor(options: AsyncFileWriterOptions = {}) {
    this.queue = [];
    this.maxQueue = options.maxQueue ?? DEFAULT_MAX_QUEUE;
    this.pendingDrops = new Map();
    this.knownDirs = new Set();
    this.stopRequested = false;
    this.finished = false;
    this.inFlight = false;
    this.wake = null;
    this.idleWaiters = [];
    this.totalDropped = 0;
    this.worker = this.run();
  }

  /** Queues `text` for appending to `path`. Returns false when the chunk was not queued. */
  write(path: string, text: string): boolean {
    if (!text) {
      return false;
    }
    if (this.finished) {
      return false;
    }
    if (this.queue.length >= this.maxQueue) {
      this.pendingDrops.set(path, (this.pendingDrops.get(path) ?? 0) + 1);
      this.totalDropped++;
      return false;
    }
    this.queue.push({ path, text });
    this.wakeWorker();
    return true;
  }

  /** Resolves once every queued job has been attempted. */
  drain(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Asks the worker to finish the queue and exit, waiting at most `timeoutMs`.
   * Resolves either way; jobs still queued after the timeout may be lost.
   */
  async close(timeoutMs: number = DEFAULT_CLOSE_TIMEOUT): Promise<void> {
    this.stopRequested = true;
    this.wakeWorker();

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, timeoutMs);
    });

    await Promise.race([this.worker, timeout]);
    clearTimeout(timer);
  }

  get pending(): number {
    return this.queue.length;
  }

  get droppedTotal(): number {
    return this.totalDropped;
  }

  get closed(): boolean {
    return this.finished;
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && !this.inFlight;
  }

  private wakeWorker(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private waitForJob(): Promise<void> {
    return new Promise((resolve) => {
      this.wake = resolve;
    });
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach(resolve => resolve());
  }

  private async run(): Promise<void> {
    while (!this.stopRequested || this.queue.length > 0) {
      const job = this.queue.shift();
      if (!job) {
        this.notifyIdle();
        await this.waitForJob();
        continue;
      }

      this.inFlight = true;
      // Failed appends are skipped: the worker keeps draining whatever comes next.
      await this.process(job);
      this.inFlight = false;
    }

    this.finished = true;
    this.notifyIdle();
  }

  private async process(job: WriteJob): Promise<Result> {
    const written = await this.append(job.path, job.text);
    if (!written.ok) {
      return written;
    }

    const dropped = this.pendingDrops.get(job.path);
    if (dropped) {
      this.pendingDrops.delete(job.path);
      return this.append(job.path, dropNotice(dropped));
    }
    return written;
  }

  private append(path: string, text: string): Promise<Result> {
    return attemptAsync(async () => {
      const dir = dirname(path);
      if (!this.knownDirs.has(dir)) {
        await mkdir(dir, { recursive: true });
        this.knownDirs.add(dir);
      }
      await appendFile(path, text, 'utf8');
    });
  }
}
