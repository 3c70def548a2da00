/** Scheduler: sizes the worker set, runs it over one shared queue and collects results */
import { ClientLifecycle, type ClientFactory } from '../clients/ClientLifecycle.js';
import type { TaskExecutor } from '../executors/TaskExecutor.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { ProxyPool } from '../proxy/ProxyPool.js';
import type { ProxySource } from '../proxy/ProxySource.js';
import type { EngineConfig, ProgressSummary, ProxyEndpoint, ResultRecord, WorkItem } from '../types.js';
import { createJitter, type Jitter } from '../utils.js';
import { ProgressTracker } from './ProgressTracker.js';
import { RetryPolicy } from './RetryPolicy.js';
import { TaskQueue } from './TaskQueue.js';
import { Worker, type WorkerDeps, type WorkerObserver } from './Worker.js';

export type WorkerPoolConfig = Pick<
  EngineConfig,
  'maxConcurrency' | 'maxRetries' | 'maxTasksPerClient' | 'spareProxies' | 'jitterMinMs' | 'jitterMaxMs'
>;

export interface WorkerPoolOptions<TClient, TItem extends WorkItem, TPayload> {
  config: WorkerPoolConfig;
  factory: ClientFactory<TClient>;
  executor: TaskExecutor<TClient, TItem, TPayload>;
  proxySource: ProxySource;
  logger?: Logger;
  observer?: WorkerObserver;
  /** Builds the run's proxy pool from the snapshot; replaceable in tests */
  createProxyPool?: (endpoints: readonly ProxyEndpoint[]) => ProxyPool;
  jitter?: Jitter;
  progressLogEvery?: number;
}

export interface RunStats {
  workerCount: number;
  proxyCount: number;
  progress: ProgressSummary;
}

export const computeWorkerCount = (itemCount: number, maxConcurrency: number, proxyCount: number): number =>
  Math.min(itemCount, Math.max(2, Math.min(maxConcurrency, proxyCount || 1)));

export class WorkerPool<TClient, TItem extends WorkItem, TPayload> {
  private readonly logger: Logger;
  private stats: RunStats | null = null;

  constructor(private readonly options: WorkerPoolOptions<TClient, TItem, TPayload>) {
    this.logger = (options.logger ?? silentLogger).child({ component: 'WorkerPool' });
  }

  get lastRun(): RunStats | null {
    return this.stats;
  }

  /**
   * Returns one terminal record per item, in no particular order.
   * A worker that cannot create any client aborts the whole run: the other
   * workers stop at their next turn and the error is rethrown.
   */
  async run(items: readonly TItem[]): Promise<ResultRecord<TPayload>[]> {
    if (items.length === 0) return [];

    const { config } = this.options;
    const baseLogger = this.options.logger ?? silentLogger;
    const snapshot = await this.options.proxySource.listAvailableEndpoints();
    const working = snapshot.slice(0, config.maxConcurrency + config.spareProxies);
    const proxies = this.options.createProxyPool?.(working) ?? new ProxyPool(working, { logger: baseLogger });

    const proxyCount = proxies.size;
    const queue = TaskQueue.from(items);
    const workerCount = computeWorkerCount(items.length, config.maxConcurrency, proxyCount);
    const tracker = new ProgressTracker(items.length, { logger: baseLogger, logEvery: this.options.progressLogEvery });
    const lifecycle = new ClientLifecycle(this.options.factory, proxies, { logger: baseLogger });
    const controller = new AbortController();

    this.logger.info({ items: items.length, workers: workerCount, proxies: proxyCount }, 'Starting run');

    const deps: WorkerDeps<TClient, TItem, TPayload> = {
      queue,
      lifecycle,
      executor: this.options.executor,
      retry: new RetryPolicy(config.maxRetries),
      tracker,
      maxTasksPerClient: config.maxTasksPerClient,
      jitter: this.options.jitter ?? createJitter(config.jitterMinMs, config.jitterMaxMs),
      logger: baseLogger.child({ component: 'Worker' }),
      perf: baseLogger.child({ component: 'performance' }),
      observer: this.options.observer,
      signal: controller.signal,
    };

    const settled = await Promise.allSettled(
      Array.from({ length: workerCount }, (_, id) =>
        new Worker(id, deps).run().catch((error: unknown) => {
          controller.abort();
          throw error;
        }),
      ),
    );

    const progress = tracker.stop();
    this.stats = { workerCount, proxyCount, progress };

    const failure = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected');
    if (failure) {
      this.logger.error({ err: failure.reason }, 'Run aborted');
      throw failure.reason;
    }

    return settled.flatMap(s => (s.status === 'fulfilled' ? s.value : []));
  }
}
