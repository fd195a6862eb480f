import { Worker } from 'node:worker_threads';
import logger from '../lib/logger.js';
import { groupFragments } from './engine.js';
import { isLayoutReply, type LayoutRequest } from './protocol.js';
import type { OcrBlock, SectionMap } from './types.js';

/**
 * Runs layout reconstruction somewhere other than the I/O event loop.
 * The pipeline awaits `group` exactly as it awaits any other collaborator.
 */
export interface LayoutExecutor {
  group(blocks: readonly OcrBlock[]): Promise<SectionMap>;
  close(): Promise<void>;
}

/** Runs on the calling thread. Used with LAYOUT_WORKER_THREADS=0 and when running from source. */
export class InlineLayoutExecutor implements LayoutExecutor {
  async group(blocks: readonly OcrBlock[]): Promise<SectionMap> {
    return groupFragments(blocks);
  }

  async close(): Promise<void> {}
}

/** True when this module was loaded from its .ts source (tsx, Vitest) rather than dist/. */
export function loadedFromSource(moduleUrl: string = import.meta.url): boolean {
  return moduleUrl.endsWith('.ts');
}

/** Starts the compiled worker entry that sits beside this module in dist/. */
export function spawnLayoutWorker(): Worker {
  return new Worker(new URL('./layout-worker.js', import.meta.url));
}

interface Waiter {
  resolve: (worker: Worker) => void;
  reject: (err: Error) => void;
}

/**
 * Fixed-size pool of worker threads. Workers are spawned on demand up to `size`.
 * A worker that errors or exits, busy or idle, is dropped from the pool and its
 * in-flight request rejected; the next request spawns a replacement.
 */
export class WorkerThreadLayoutExecutor implements LayoutExecutor {
  private readonly idle: Worker[] = [];
  private readonly live = new Set<Worker>();
  private readonly waiting: Waiter[] = [];
  private readonly inflight = new Map<Worker, (err: Error) => void>();
  private nextId = 1;
  private closed = false;

  constructor(
    private readonly size: number,
    private readonly spawn: () => Worker = spawnLayoutWorker,
  ) {
    if (size < 1) throw new Error('Layout worker pool size must be at least 1');
  }

  async group(blocks: readonly OcrBlock[]): Promise<SectionMap> {
    if (this.closed) throw new Error('Layout executor is closed');
    const worker = await this.acquire();
    try {
      if (this.closed) throw new Error('Layout executor is closed');
      if (!this.live.has(worker)) throw new Error('Layout worker exited before the request was sent');
      return await this.run(worker, blocks);
    } finally {
      this.release(worker);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    const closedError = new Error('Layout executor is closed');
    for (const waiter of this.waiting.splice(0)) waiter.reject(closedError);
    for (const fail of [...this.inflight.values()]) fail(closedError);
    this.inflight.clear();
    const workers = [...this.live];
    this.live.clear();
    this.idle.length = 0;
    await Promise.all(workers.map((worker) => worker.terminate()));
  }

  get stats(): { live: number; idle: number; waiting: number } {
    return { live: this.live.size, idle: this.idle.length, waiting: this.waiting.length };
  }

  private acquire(): Promise<Worker> {
    const idle = this.idle.pop();
    if (idle) return Promise.resolve(idle);
    if (this.live.size < this.size) return Promise.resolve(this.start());
    return new Promise((resolve, reject) => this.waiting.push({ resolve, reject }));
  }

  private start(): Worker {
    const worker = this.spawn();
    this.live.add(worker);
    worker.on('error', (err: Error) => this.discard(worker, err));
    worker.on('exit', (code: number) => this.discard(worker, new Error(`Layout worker exited with code ${code}`)));
    return worker;
  }

  private release(worker: Worker): void {
    if (!this.live.has(worker)) return;
    const next = this.waiting.shift();
    if (next) {
      next.resolve(worker);
    } else {
      this.idle.push(worker);
    }
  }

  private discard(worker: Worker, reason: Error): void {
    if (!this.live.delete(worker)) return;
    const idleIndex = this.idle.indexOf(worker);
    if (idleIndex >= 0) this.idle.splice(idleIndex, 1);
    this.inflight.get(worker)?.(reason);
    logger.warn({ error: reason.message }, 'Layout worker dropped from pool');
    worker.terminate().catch((err: unknown) => {
      logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Failed to terminate layout worker');
    });
    const next = this.waiting.shift();
    if (next && !this.closed) next.resolve(this.start());
  }

  private run(worker: Worker, blocks: readonly OcrBlock[]): Promise<SectionMap> {
    const id = this.nextId++;
    return new Promise<SectionMap>((resolve, reject) => {
      const settle = () => {
        worker.off('message', onMessage);
        this.inflight.delete(worker);
      };
      const onMessage = (message: unknown) => {
        if (!isLayoutReply(message) || message.id !== id) return;
        settle();
        if (message.ok) {
          resolve(message.sections);
        } else {
          reject(new Error(message.error));
        }
      };

      this.inflight.set(worker, (err) => {
        settle();
        reject(err);
      });
      worker.on('message', onMessage);
      const request: LayoutRequest = { id, blocks };
      worker.postMessage(request);
    });
  }
}

/**
 * The worker entry only exists as compiled JavaScript, so a process running the
 * .ts sources groups inline whatever LAYOUT_WORKER_THREADS says.
 */
export function createLayoutExecutor(threads: number, fromSource: boolean = loadedFromSource()): LayoutExecutor {
  if (threads <= 0) return new InlineLayoutExecutor();
  if (fromSource) {
    logger.info({ threads }, 'Running from source; layout grouping runs inline');
    return new InlineLayoutExecutor();
  }
  return new WorkerThreadLayoutExecutor(threads);
}
