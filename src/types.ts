/** Shared types for the fetch engine */

export type WaitUntil = 'load' | 'domcontentloaded' | 'networkidle' | 'commit';
export type ReadinessPolicy = 'retry' | 'partial';
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';
export type FetchMode = 'http' | 'browser';

export interface ProxyEndpoint {
  readonly name: string;
  /** Proxy URL, e.g. `http://127.0.0.1:10801` */
  readonly server: string;
  readonly username?: string;
  readonly password?: string;
  readonly locale?: string;
  readonly timezoneId?: string;
  readonly userAgent?: string;
  readonly acceptLanguage?: string;
}

export interface RequestDescriptor {
  url: string;
  method?: HttpMethod;
  params?: Record<string, string | number | boolean>;
  headers?: Record<string, string>;
  data?: unknown;
  requestId?: string;
}

export type WorkItem = string | RequestDescriptor;

export interface Task<TItem extends WorkItem = WorkItem> {
  readonly item: TItem;
  readonly identity: string;
  retries: number;
}

export interface AttemptInfo {
  /** 1-based attempt number */
  number: number;
  /** A failure on this attempt is terminal */
  final: boolean;
}

export interface SuccessRecord<TPayload> {
  identity: string;
  status: 'success';
  payload: TPayload;
  retriesUsed: number;
}

export interface ErrorRecord {
  identity: string;
  status: 'error';
  error: string;
  errorKind: string;
  retriesUsed: number;
}

export type ResultRecord<TPayload = unknown> = SuccessRecord<TPayload> | ErrorRecord;

export interface EngineConfig {
  maxConcurrency: number;
  maxRetries: number;
  maxTasksPerClient: number;
  /** Proxies kept beyond maxConcurrency so recycled clients can rotate */
  spareProxies: number;
  navigationTimeoutMs: number;
  requestTimeoutMs: number;
  readinessTimeoutMs: number;
  waitUntil: WaitUntil;
  readySelector?: string;
  fallbackReadySelector?: string;
  readinessPolicy: ReadinessPolicy;
  jitterMinMs: number;
  jitterMaxMs: number;
  headless: boolean;
  locale: string;
  timezoneId: string;
  acceptLanguage: string;
  userAgent?: string;
  blockImages: boolean;
  blockFonts: boolean;
  cookiesPath?: string;
  proxiesFile?: string;
  proxies?: string;
  outputDir: string;
  logLevel: string;
}

export interface ProgressSummary {
  total: number;
  processed: number;
  succeeded: number;
  failed: number;
  retried: number;
  elapsedSeconds: number;
  itemsPerSecond: number;
  peakRssMb: number;
}

export interface RunReport {
  mode: FetchMode;
  /** Distinct identities run; duplicates are dropped before the run */
  totalItems: number;
  succeeded: number;
  failed: number;
  workerCount: number;
  proxyCount: number;
  progress: ProgressSummary;
  startedAt: Date;
  completedAt: Date;
  duration: number;
  outputFile?: string;
  failedFile?: string;
}

export interface RunOptions {
  items: WorkItem[];
  mode: FetchMode;
  concurrency?: number;
  save?: boolean;
}

export const identityOf = (item: WorkItem): string =>
  typeof item === 'string' ? item : item.requestId ?? item.url;

export const urlOf = (item: WorkItem): string => (typeof item === 'string' ? item : item.url);
