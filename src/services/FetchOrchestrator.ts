/** Orchestrates a fetch run: proxies, client kind, worker pool, persistence */
import type { AxiosAdapter } from 'axios';
import type { Page } from 'playwright';
import { BrowserClientFactory, launchChromium, type BrowserLauncher } from '../clients/BrowserClientFactory.js';
import type { ClientFactory } from '../clients/ClientLifecycle.js';
import { loadCookies } from '../clients/cookies.js';
import { HttpClientFactory } from '../clients/HttpClientFactory.js';
import { WorkerPool, type RunStats } from '../engine/WorkerPool.js';
import type { WorkerObserver } from '../engine/Worker.js';
import { BrowserPageExecutor } from '../executors/BrowserPageExecutor.js';
import { htmlExtractor, type Extractor } from '../executors/extractors.js';
import { HttpRequestExecutor } from '../executors/HttpRequestExecutor.js';
import type { TaskExecutor } from '../executors/TaskExecutor.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { proxySourceFromConfig, type ProxySource } from '../proxy/ProxySource.js';
import type { EngineConfig, ErrorRecord, ResultRecord, RunOptions, RunReport, WorkItem } from '../types.js';
import type { Jitter } from '../utils.js';
import { dedupeItems } from './items.js';
import { StorageService } from './StorageService.js';

export interface FetchOrchestratorOptions {
  logger?: Logger;
  proxySource?: ProxySource;
  storage?: StorageService;
  /** Browser mode extraction; defaults to the page HTML */
  extract?: Extractor<unknown, Page>;
  launch?: BrowserLauncher;
  httpAdapter?: AxiosAdapter;
  observer?: WorkerObserver;
  jitter?: Jitter;
}

export interface RunOutput {
  report: RunReport;
  results: ResultRecord[];
}

export class FetchOrchestrator {
  private readonly logger: Logger;
  private readonly storage: StorageService;
  private readonly proxySource: ProxySource;

  constructor(private config: EngineConfig, private options: FetchOrchestratorOptions = {}) {
    this.logger = (options.logger ?? silentLogger).child({ component: 'FetchOrchestrator' });
    this.storage = options.storage ?? new StorageService(config.outputDir);
    this.proxySource = options.proxySource ?? proxySourceFromConfig(config);
  }

  /**
   * Items sharing an identity are collapsed to the first one, so the run
   * yields one record per distinct identity.
   */
  async run(options: RunOptions): Promise<RunOutput> {
    const startedAt = new Date();
    const config = options.concurrency ? { ...this.config, maxConcurrency: options.concurrency } : this.config;
    const { unique: items, duplicates } = dedupeItems(options.items);
    if (duplicates > 0) this.logger.warn({ duplicates }, 'Dropped items with duplicate identities');

    this.logger.info({ mode: options.mode, items: items.length, maxConcurrency: config.maxConcurrency }, 'Starting fetch');

    const cookies = await loadCookies(config.cookiesPath, this.logger);
    const { results, stats }: { results: ResultRecord[]; stats: RunStats | null } = options.mode === 'browser'
      ? await this.execute(
          new BrowserClientFactory<Page>(config, this.options.launch ?? launchChromium),
          new BrowserPageExecutor<unknown, Page>({
            config,
            extract: this.options.extract ?? htmlExtractor,
            cookies,
            logger: this.options.logger,
          }),
          config,
          items,
        )
      : await this.execute(
          new HttpClientFactory(config, { cookies, adapter: this.options.httpAdapter }),
          new HttpRequestExecutor(),
          config,
          items,
        );

    const failed = results.filter((r): r is ErrorRecord => r.status === 'error');
    if (failed.length > 0) {
      this.logger.warn({ failed: failed.length }, 'Some items failed');
      for (const r of failed) this.logger.debug({ identity: r.identity, error: r.error, retriesUsed: r.retriesUsed }, 'Failed item');
    }

    const saved = options.save === false ? undefined : await this.storage.saveRun(options.mode, items, results);
    const completedAt = new Date();
    const report: RunReport = {
      mode: options.mode,
      totalItems: items.length,
      succeeded: results.length - failed.length,
      failed: failed.length,
      workerCount: stats?.workerCount ?? 0,
      proxyCount: stats?.proxyCount ?? 0,
      progress: stats?.progress ?? emptyProgress(items.length),
      startedAt,
      completedAt,
      duration: (completedAt.getTime() - startedAt.getTime()) / 1000,
      ...(saved && { outputFile: saved.outputFile, failedFile: saved.failedFile }),
    };

    this.logger.info({ succeeded: report.succeeded, failed: report.failed, duration: report.duration }, 'Done');
    return { report, results };
  }

  private async execute<TClient, TPayload>(
    factory: ClientFactory<TClient>,
    executor: TaskExecutor<TClient, WorkItem, TPayload>,
    config: EngineConfig,
    items: WorkItem[],
  ): Promise<{ results: ResultRecord<TPayload>[]; stats: RunStats | null }> {
    const pool = new WorkerPool<TClient, WorkItem, TPayload>({
      config,
      factory,
      executor,
      proxySource: this.proxySource,
      logger: this.options.logger,
      observer: this.options.observer,
      jitter: this.options.jitter,
    });
    const results = await pool.run(items);
    return { results, stats: pool.lastRun };
  }
}

const emptyProgress = (total: number): RunReport['progress'] => ({
  total,
  processed: 0,
  succeeded: 0,
  failed: 0,
  retried: 0,
  elapsedSeconds: 0,
  itemsPerSecond: 0,
  peakRssMb: 0,
});
