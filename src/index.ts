/** pagefleet - concurrent page fetching with proxy rotation */

export { ProxyPool, type ProxyPoolOptions } from './proxy/ProxyPool.js';
export {
  FileProxySource,
  StaticProxySource,
  parseProxyFile,
  proxySourceFromConfig,
  type ProxySource,
} from './proxy/ProxySource.js';
export { ClientLifecycle, type ClientFactory, type ClientHandle } from './clients/ClientLifecycle.js';
export {
  BrowserClientFactory,
  createChromiumFactory,
  launchChromium,
  type BrowserLauncher,
  type BrowserSession,
} from './clients/BrowserClientFactory.js';
export { HttpClientFactory, type HttpSession } from './clients/HttpClientFactory.js';
export type { BrowserCookie, BrowserHandle, ContextHandle, PageHandle } from './clients/handles.js';
export { loadCookies } from './clients/cookies.js';
export type { ExecutionOutcome, TaskExecutor } from './executors/TaskExecutor.js';
export { HttpRequestExecutor, type HttpPayload } from './executors/HttpRequestExecutor.js';
export { BrowserPageExecutor, type BrowserPageExecutorOptions } from './executors/BrowserPageExecutor.js';
export { waitForReadiness, type ReadinessCondition, type ReadinessSpec } from './executors/readiness.js';
export { htmlExtractor, scriptExtractor, type Extractor, type HtmlPayload } from './executors/extractors.js';
export { WorkerPool, computeWorkerCount, type RunStats, type WorkerPoolOptions } from './engine/WorkerPool.js';
export { Worker, type WorkerObserver, type WorkerState } from './engine/Worker.js';
export { RetryPolicy } from './engine/RetryPolicy.js';
export { TaskQueue } from './engine/TaskQueue.js';
export { ProgressTracker } from './engine/ProgressTracker.js';
export { FetchOrchestrator, type FetchOrchestratorOptions, type RunOutput } from './services/FetchOrchestrator.js';
export { StorageService, collectFailedItems } from './services/StorageService.js';
export { loadItems, parseItems, dedupeItems } from './services/items.js';
export * from './errors.js';
export * from './types.js';
export { config, createConfig, parseProxies, validateConfig } from './config.js';
export { createLogger, silentLogger, type Logger } from './logger.js';
