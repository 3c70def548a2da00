/** Run-wide progress counters with periodic log lines */
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { ProgressSummary } from '../types.js';

export interface ProgressEvent {
  success: boolean;
  retry: boolean;
}

export interface ProgressTrackerOptions {
  logger?: Logger;
  /** Log a progress line every N events (default 1) */
  logEvery?: number;
  now?: () => number;
  memoryUsage?: () => number;
}

const MB = 1024 * 1024;

/**
 * `update` is synchronous and never awaits, so each call is one atomic
 * critical section with respect to the workers.
 */
export class ProgressTracker {
  private readonly unique = new Set<string>();
  private processed = 0;
  private succeeded = 0;
  private failed = 0;
  private retried = 0;
  private peakRss = 0;
  private readonly startedAt: number;
  private readonly logger: Logger;
  private readonly logEvery: number;
  private readonly now: () => number;
  private readonly memoryUsage: () => number;

  constructor(private readonly total: number, options: ProgressTrackerOptions = {}) {
    this.logger = (options.logger ?? silentLogger).child({ component: 'progress' });
    this.logEvery = Math.max(1, options.logEvery ?? 1);
    this.now = options.now ?? Date.now;
    this.memoryUsage = options.memoryUsage ?? (() => process.memoryUsage().rss);
    this.startedAt = this.now();
  }

  /** One call per executed attempt: success, terminal failure, or retry. */
  update(identity: string, event: ProgressEvent): void {
    this.processed++;
    this.unique.add(identity);
    if (event.retry) this.retried++;
    else if (event.success) this.succeeded++;
    else this.failed++;

    this.peakRss = Math.max(this.peakRss, this.memoryUsage());

    if (this.processed % this.logEvery === 0) {
      const { itemsPerSecond } = this.summary();
      this.logger.info({
        percent: Number(this.percentDone().toFixed(1)),
        processed: this.processed,
        succeeded: this.succeeded,
        failed: this.failed,
        retried: this.retried,
        itemsPerSecond: Number(itemsPerSecond.toFixed(2)),
        rssMb: Math.round(this.peakRss / MB),
      }, 'progress');
    }
  }

  /** Share of distinct items seen at least once, capped at 100. */
  percentDone(): number {
    if (this.total === 0) return 100;
    return Math.min(100, (this.unique.size / this.total) * 100);
  }

  summary(): ProgressSummary {
    const elapsedSeconds = (this.now() - this.startedAt) / 1000;
    return {
      total: this.total,
      processed: this.processed,
      succeeded: this.succeeded,
      failed: this.failed,
      retried: this.retried,
      elapsedSeconds,
      itemsPerSecond: elapsedSeconds > 0 ? this.processed / elapsedSeconds : 0,
      peakRssMb: Math.round((this.peakRss / MB) * 100) / 100,
    };
  }

  stop(): ProgressSummary {
    const summary = this.summary();
    const pct = (n: number) => (this.total > 0 ? ((n / this.total) * 100).toFixed(1) : '0.0');
    this.logger.info({
      ...summary,
      successRate: `${pct(summary.succeeded)}%`,
      failureRate: `${pct(summary.failed)}%`,
      perMinute: Number((summary.itemsPerSecond * 60).toFixed(2)),
    }, 'Run summary');
    return summary;
  }
}
