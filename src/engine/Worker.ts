/** One worker: a sequential task loop over a recyclable client */
import type { ClientHandle, ClientLifecycle } from '../clients/ClientLifecycle.js';
import type { ExecutionOutcome, TaskExecutor } from '../executors/TaskExecutor.js';
import type { Logger } from '../logger.js';
import type { ResultRecord, Task, WorkItem } from '../types.js';
import type { Jitter } from '../utils.js';
import { measureAttempt, type SettledAttempt } from './measure.js';
import type { ProgressTracker } from './ProgressTracker.js';
import type { RetryPolicy } from './RetryPolicy.js';
import type { TaskQueue } from './TaskQueue.js';

export type WorkerState = 'NO_CLIENT' | 'ACTIVE' | 'RECYCLING' | 'DONE';

export interface WorkerObserver {
  onClientOpened?(workerId: number, clientId: number, proxy: string | null): void;
  onClientRecycled?(workerId: number, clientId: number, tasksServed: number): void;
  onClientClosed?(workerId: number, clientId: number): void;
}

export interface WorkerDeps<TClient, TItem extends WorkItem, TPayload> {
  queue: TaskQueue<TItem>;
  lifecycle: ClientLifecycle<TClient>;
  executor: TaskExecutor<TClient, TItem, TPayload>;
  retry: RetryPolicy;
  tracker: ProgressTracker;
  maxTasksPerClient: number;
  jitter: Jitter;
  logger: Logger;
  perf: Logger;
  observer?: WorkerObserver;
  /** Set when another worker failed and the run is being torn down */
  signal?: AbortSignal;
}

export class Worker<TClient, TItem extends WorkItem, TPayload> {
  private state: WorkerState = 'NO_CLIENT';
  private readonly results: ResultRecord<TPayload>[] = [];
  private readonly logger: Logger;

  constructor(readonly id: number, private readonly deps: WorkerDeps<TClient, TItem, TPayload>) {
    this.logger = deps.logger.child({ workerId: id });
  }

  get currentState(): WorkerState {
    return this.state;
  }

  /**
   * Runs until the shared queue is empty and returns this worker's terminal
   * records. Rejects only when no client can be created, or on a bug.
   */
  async run(): Promise<ResultRecord<TPayload>[]> {
    const { queue, signal } = this.deps;
    let handle = await this.open();

    try {
      while (!signal?.aborted) {
        const task = queue.shift();
        if (!task) break;

        if (handle.tasksServed >= this.deps.maxTasksPerClient) {
          try {
            handle = await this.recycle(handle);
          } catch (error) {
            queue.push(task);
            throw error;
          }
        }

        await this.process(handle, task);
        handle.tasksServed++;
        await this.deps.jitter();
      }
    } finally {
      await this.close(handle);
      this.state = 'DONE';
    }

    this.logger.debug({ results: this.results.length }, 'Worker finished');
    return this.results;
  }

  private async open(): Promise<ClientHandle<TClient>> {
    const handle = await this.deps.lifecycle.open(this.id);
    this.deps.observer?.onClientOpened?.(this.id, handle.id, handle.proxy?.name ?? null);
    this.state = 'ACTIVE';
    await this.deps.jitter();
    return handle;
  }

  private async close(handle: ClientHandle<TClient>): Promise<void> {
    if (await this.deps.lifecycle.close(handle)) {
      this.deps.observer?.onClientClosed?.(this.id, handle.id);
    }
  }

  private async recycle(handle: ClientHandle<TClient>): Promise<ClientHandle<TClient>> {
    this.state = 'RECYCLING';
    this.logger.info({ clientId: handle.id, tasksServed: handle.tasksServed }, 'Recycling client');
    this.deps.observer?.onClientRecycled?.(this.id, handle.id, handle.tasksServed);
    await this.close(handle);
    this.state = 'NO_CLIENT';
    return this.open();
  }

  private async process(handle: ClientHandle<TClient>, task: Task<TItem>): Promise<void> {
    const { executor, retry, queue } = this.deps;
    const attempt = retry.attemptInfo(task);

    const settled = await measureAttempt<TPayload>(
      { task, attempt, workerId: this.id, proxy: handle.proxy?.name ?? 'direct' },
      () => executor.execute(handle.client, task, attempt),
      outcome => this.settle(task, outcome),
      { perf: this.deps.perf, tracker: this.deps.tracker },
    );

    if (settled.record) this.results.push(settled.record);
    else queue.push(task);
  }

  private settle(task: Task<TItem>, outcome: ExecutionOutcome<TPayload>): SettledAttempt<TPayload> {
    const { retry } = this.deps;
    if (outcome.ok) {
      return { success: true, retry: false, record: retry.recordSuccess(task, outcome.payload) };
    }

    const decision = retry.recordFailure(task, outcome.error);
    if (decision.needsRetry) {
      this.logger.debug(
        { identity: task.identity, retries: task.retries, maxRetries: retry.maxRetries, errorKind: outcome.error.kind },
        `Requeueing after failure: ${outcome.error.message}`,
      );
      return { success: false, retry: true };
    }

    this.logger.warn(
      { identity: task.identity, retriesUsed: decision.record.retriesUsed, errorKind: outcome.error.kind },
      `Giving up: ${outcome.error.message}`,
    );
    return { success: false, retry: false, record: decision.record };
  }
}
