/** Creates, recycles and destroys per-worker clients bound to pool proxies */
import { WorkerError, toErrorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { ProxyPool } from '../proxy/ProxyPool.js';
import type { ProxyEndpoint } from '../types.js';

export interface ClientFactory<TClient> {
  /** Creates a client that connects through `proxy`, or directly when it is null. */
  create(proxy: ProxyEndpoint | null, workerId: number): Promise<TClient>;
  close(client: TClient): Promise<void>;
}

export interface ClientHandle<TClient> {
  readonly id: number;
  readonly workerId: number;
  readonly client: TClient;
  readonly proxy: ProxyEndpoint | null;
  tasksServed: number;
}

export interface ClientLifecycleOptions {
  logger?: Logger;
}

export class ClientLifecycle<TClient> {
  private nextId = 0;
  private readonly live = new Set<ClientHandle<TClient>>();
  private readonly logger: Logger;

  constructor(
    private readonly factory: ClientFactory<TClient>,
    private readonly proxies: ProxyPool,
    options: ClientLifecycleOptions = {},
  ) {
    this.logger = (options.logger ?? silentLogger).child({ component: 'ClientLifecycle' });
  }

  get liveCount(): number {
    return this.live.size;
  }

  /**
   * Acquires a proxy and builds a client on it. A proxy that cannot carry a
   * client is dropped from the pool and one direct connection is attempted.
   */
  async open(workerId: number): Promise<ClientHandle<TClient>> {
    const proxy = this.proxies.acquire();
    try {
      return this.track(workerId, proxy, await this.factory.create(proxy, workerId));
    } catch (error) {
      if (!proxy) {
        throw new WorkerError(workerId, `cannot create client: ${toErrorMessage(error)}`, { cause: error });
      }
      this.logger.warn({ workerId, proxy: proxy.name, err: error }, 'Client creation failed, falling back to direct connection');
      this.proxies.markFailed(proxy);
    }

    try {
      return this.track(workerId, null, await this.factory.create(null, workerId));
    } catch (error) {
      throw new WorkerError(workerId, `cannot create client: ${toErrorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Closes the client, then releases its proxy. Close failures are logged, never thrown.
   * Resolves false when the handle was already closed.
   */
  async close(handle: ClientHandle<TClient>): Promise<boolean> {
    if (!this.live.delete(handle)) return false;
    try {
      await this.factory.close(handle.client);
    } catch (error) {
      this.logger.warn({ workerId: handle.workerId, clientId: handle.id, err: error }, 'Failed to close client');
    }
    // Only now may another client take the proxy
    this.proxies.release(handle.proxy);
    this.logger.debug({ workerId: handle.workerId, clientId: handle.id, tasksServed: handle.tasksServed }, 'Client closed');
    return true;
  }

  private track(workerId: number, proxy: ProxyEndpoint | null, client: TClient): ClientHandle<TClient> {
    const handle: ClientHandle<TClient> = { id: this.nextId++, workerId, client, proxy, tasksServed: 0 };
    this.live.add(handle);
    this.logger.info({ workerId, clientId: handle.id, proxy: proxy?.name ?? 'direct' }, 'Client opened');
    return handle;
  }
}
