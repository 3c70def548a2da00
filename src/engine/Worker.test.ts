import { describe, expect, it } from 'vitest';
import { ClientLifecycle, type ClientFactory } from '../clients/ClientLifecycle.js';
import { TransportError } from '../errors.js';
import { fail, succeed, type ExecutionOutcome, type TaskExecutor } from '../executors/TaskExecutor.js';
import { silentLogger } from '../logger.js';
import { ProxyPool } from '../proxy/ProxyPool.js';
import type { Task, WorkItem } from '../types.js';
import { ProgressTracker } from './ProgressTracker.js';
import { RetryPolicy } from './RetryPolicy.js';
import { TaskQueue } from './TaskQueue.js';
import { Worker, type WorkerDeps, type WorkerObserver } from './Worker.js';

interface Client {
  serial: number;
}

class CountingFactory implements ClientFactory<Client> {
  serial = 0;
  closed: number[] = [];

  async create(): Promise<Client> {
    return { serial: this.serial++ };
  }

  async close(client: Client): Promise<void> {
    this.closed.push(client.serial);
  }
}

/** Records which client served each attempt. */
class RecordingExecutor implements TaskExecutor<Client, WorkItem, number> {
  readonly served: [string, number][] = [];

  constructor(private failOnce = new Set<string>()) {}

  async execute(client: Client, task: Task): Promise<ExecutionOutcome<number>> {
    this.served.push([task.identity, client.serial]);
    if (this.failOnce.delete(task.identity)) return fail(new TransportError('reset'));
    return succeed(client.serial);
  }
}

const setup = (count: number, executor: RecordingExecutor, options: { cap: number; signal?: AbortSignal }) => {
  const factory = new CountingFactory();
  const events: string[] = [];
  const observer: WorkerObserver = {
    onClientOpened: (_, clientId) => events.push(`open:${clientId}`),
    onClientRecycled: (_, clientId, served) => events.push(`recycle:${clientId}:${served}`),
    onClientClosed: (_, clientId) => events.push(`close:${clientId}`),
  };
  const deps: WorkerDeps<Client, WorkItem, number> = {
    queue: TaskQueue.from(Array.from({ length: count }, (_, i) => `item-${i + 1}`)),
    lifecycle: new ClientLifecycle(factory, new ProxyPool([])),
    executor,
    retry: new RetryPolicy(3),
    tracker: new ProgressTracker(count),
    maxTasksPerClient: options.cap,
    jitter: async () => {},
    logger: silentLogger,
    perf: silentLogger,
    observer,
    signal: options.signal,
  };
  return { worker: new Worker(0, deps), factory, events, deps };
};

describe('Worker', () => {
  it('recycles its client every maxTasksPerClient attempts', async () => {
    const { worker, factory, events } = setup(10, new RecordingExecutor(), { cap: 3 });

    const results = await worker.run();

    expect(results).toHaveLength(10);
    expect(events.filter(e => e.startsWith('recycle'))).toEqual(['recycle:0:3', 'recycle:1:3', 'recycle:2:3']);
    expect(events.filter(e => e.startsWith('open'))).toHaveLength(4);
    expect(events.at(-1)).toBe('close:3');
    expect(factory.closed).toEqual([0, 1, 2, 3]);
    expect(worker.currentState).toBe('DONE');
  });

  it('counts failed attempts toward the recycle cap', async () => {
    const executor = new RecordingExecutor(new Set(['item-1']));
    const { worker } = setup(2, executor, { cap: 2 });

    await worker.run();

    // item-1 fails, item-2 succeeds, then the requeued item-1 runs on a fresh client
    expect(executor.served).toEqual([
      ['item-1', 0],
      ['item-2', 0],
      ['item-1', 1],
    ]);
  });

  it('stops taking tasks once aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const executor = new RecordingExecutor();
    const { worker, deps, factory } = setup(4, executor, { cap: 10, signal: controller.signal });

    expect(await worker.run()).toEqual([]);
    expect(executor.served).toEqual([]);
    expect(deps.queue.size).toBe(4);
    expect(factory.closed).toEqual([0]);
  });
});
