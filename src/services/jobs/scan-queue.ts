import Bottleneck from 'bottleneck';
import pino from 'pino';
import type { ScanDepth } from '../../types/index.js';
import { PageNotFoundError, getErrorMessage, isRetryable } from '../../utils/errors.js';
import { InFlightRegistry } from '../scanner/single-flight.js';

const log = pino({ name: 'scan-queue' });

export const DEFAULT_MAX_ATTEMPTS = 3;

/** (attempt⁴ + 2) seconds: 3s, 18s, 83s, … */
export function polynomialBackoffMs(attempt: number): number {
  return (attempt ** 4 + 2) * 1000;
}

export interface TriggerOptions {
  depth?: ScanDepth;
  /** Run later instead of now. The page is re-checked when the timer fires. */
  delayMs?: number;
}

export type SkipTriggerReason = 'already_running' | 'already_queued' | 'closed';

export type TriggerResult =
  | { status: 'enqueued' }
  | { status: 'skipped'; reason: SkipTriggerReason };

export type ScanWorker = (pageId: string, options: { depth?: ScanDepth }) => Promise<unknown>;

export interface ScanQueueOptions {
  worker: ScanWorker;
  concurrency: number;
  maxAttempts?: number;
  backoffMs?: (attempt: number) => number;
  registry?: InFlightRegistry;
}

interface ScanJob {
  pageId: string;
  depth?: ScanDepth;
  attempt: number;
}

export interface QueueStats {
  queued: number;
  running: number;
  delayed: number;
  retrying: number;
}

/**
 * In-process scan queue. Workers run through a Bottleneck limiter and hold
 * the page's single-flight key for the whole pass, so a page is never
 * scanned twice at once and never waits in the queue twice.
 */
export class ScanQueue {
  private readonly limiter: Bottleneck;
  private readonly registry: InFlightRegistry;
  private readonly worker: ScanWorker;
  private readonly maxAttempts: number;
  private readonly backoffMs: (attempt: number) => number;

  private readonly queued = new Set<string>();
  private readonly delayed = new Map<string, NodeJS.Timeout>();
  private readonly retrying = new Map<string, NodeJS.Timeout>();
  private scheduled = 0;
  private running = 0;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(options: ScanQueueOptions) {
    this.worker = options.worker;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.backoffMs = options.backoffMs ?? polynomialBackoffMs;
    this.registry = options.registry ?? new InFlightRegistry();
    this.limiter = new Bottleneck({ maxConcurrent: options.concurrency });
  }

  trigger(pageId: string, options: TriggerOptions = {}): TriggerResult {
    if (this.closed) {
      return { status: 'skipped', reason: 'closed' };
    }

    if (options.delayMs && options.delayMs > 0) {
      return this.delay(pageId, options.depth, options.delayMs);
    }

    if (this.registry.isHeld(pageId)) {
      log.info({ pageId }, 'Scan already running, trigger skipped');
      return { status: 'skipped', reason: 'already_running' };
    }
    if (this.queued.has(pageId) || this.retrying.has(pageId)) {
      log.info({ pageId }, 'Scan already queued, trigger skipped');
      return { status: 'skipped', reason: 'already_queued' };
    }

    this.enqueue({ pageId, depth: options.depth, attempt: 1 });
    return { status: 'enqueued' };
  }

  /** Resolves once nothing is queued, running, delayed or waiting to retry. */
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Stop accepting work, cancel timers, drop waiting jobs and let running ones finish. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const timer of [...this.delayed.values(), ...this.retrying.values()]) {
      clearTimeout(timer);
    }
    this.delayed.clear();
    this.retrying.clear();
    await this.limiter.stop({ dropWaitingJobs: true });
    this.notifyIfIdle();
  }

  stats(): QueueStats {
    return {
      queued: this.queued.size,
      running: this.running,
      delayed: this.delayed.size,
      retrying: this.retrying.size,
    };
  }

  private delay(pageId: string, depth: ScanDepth | undefined, delayMs: number): TriggerResult {
    if (this.delayed.has(pageId)) {
      return { status: 'skipped', reason: 'already_queued' };
    }

    const timer = setTimeout(() => {
      this.delayed.delete(pageId);
      const result = this.trigger(pageId, { depth });
      log.info({ pageId, result }, 'Delayed scan fired');
      this.notifyIfIdle();
    }, delayMs);
    this.delayed.set(pageId, timer);
    log.info({ pageId, delayMs }, 'Scan scheduled');
    return { status: 'enqueued' };
  }

  private enqueue(job: ScanJob): void {
    this.queued.add(job.pageId);
    this.scheduled++;
    this.limiter
      .schedule(() => this.execute(job))
      .catch((err) => {
        this.queued.delete(job.pageId);
        log.warn({ pageId: job.pageId, err }, 'Scan job dropped');
      })
      .finally(() => {
        this.scheduled--;
        this.notifyIfIdle();
      });
  }

  private async execute(job: ScanJob): Promise<void> {
    this.queued.delete(job.pageId);

    if (!this.registry.tryAcquire(job.pageId)) {
      log.info({ pageId: job.pageId }, 'Page already in flight, job skipped');
      return;
    }

    this.running++;
    try {
      await this.worker(job.pageId, { depth: job.depth });
    } catch (err) {
      this.handleFailure(job, err);
    } finally {
      this.running--;
      this.registry.release(job.pageId);
    }
  }

  private handleFailure(job: ScanJob, err: unknown): void {
    if (err instanceof PageNotFoundError || !isRetryable(err)) {
      log.warn({ pageId: job.pageId, err: getErrorMessage(err) }, 'Scan job discarded');
      return;
    }

    if (job.attempt >= this.maxAttempts || this.closed) {
      log.error({ pageId: job.pageId, attempt: job.attempt, err }, 'Scan job failed, giving up');
      return;
    }

    const waitMs = this.backoffMs(job.attempt);
    log.warn({ pageId: job.pageId, attempt: job.attempt, waitMs, err: getErrorMessage(err) }, 'Scan job failed, will retry');

    const timer = setTimeout(() => {
      this.retrying.delete(job.pageId);
      this.enqueue({ ...job, attempt: job.attempt + 1 });
    }, waitMs);
    this.retrying.set(job.pageId, timer);
  }

  private isIdle(): boolean {
    return this.scheduled === 0 && this.delayed.size === 0 && this.retrying.size === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }
}
