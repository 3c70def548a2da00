/** Loads pages in isolated contexts on a worker's browser and runs the extractor */
import { errors as playwrightErrors, type Page } from 'playwright';
import {
  ExtractionError,
  type FetchError,
  ReadinessTimeoutError,
  TimeoutError,
  TransportError,
  toErrorMessage,
} from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { BrowserSession } from '../clients/BrowserClientFactory.js';
import type { BrowserCookie, ContextHandle, ContextOptions, PageHandle } from '../clients/handles.js';
import { STEALTH_SCRIPT, USER_AGENTS, VIEWPORTS, pickRandom } from '../clients/fingerprint.js';
import type { AttemptInfo, EngineConfig, ProxyEndpoint, Task, WorkItem } from '../types.js';
import { urlOf } from '../types.js';
import type { Extractor } from './extractors.js';
import { waitForReadiness, type ReadinessCondition } from './readiness.js';
import { fail, succeed, type ExecutionOutcome, type TaskExecutor } from './TaskExecutor.js';

const IMAGE_PATTERN = '**/*.{png,jpg,jpeg,gif,svg,webp,ico}';
const FONT_PATTERN = '**/*.{woff,woff2,ttf,otf,eot}';

export type BrowserExecutorConfig = Pick<
  EngineConfig,
  | 'navigationTimeoutMs'
  | 'waitUntil'
  | 'readinessTimeoutMs'
  | 'readySelector'
  | 'fallbackReadySelector'
  | 'readinessPolicy'
  | 'locale'
  | 'timezoneId'
  | 'acceptLanguage'
  | 'userAgent'
  | 'blockImages'
  | 'blockFonts'
>;

export interface BrowserPageExecutorOptions<TPayload, TPage extends PageHandle> {
  config: BrowserExecutorConfig;
  extract: Extractor<TPayload, TPage>;
  /** Overrides config.readySelector */
  primary?: ReadinessCondition<TPage>;
  /** Overrides config.fallbackReadySelector */
  fallback?: ReadinessCondition<TPage>;
  cookies?: readonly BrowserCookie[] | null;
  logger?: Logger;
  random?: () => number;
}

export function classifyNavigationError(error: unknown, url: string): FetchError {
  if (error instanceof playwrightErrors.TimeoutError) {
    return new TimeoutError(`Navigation to ${url} timed out: ${error.message}`, { cause: error });
  }
  return new TransportError(`Navigation to ${url} failed: ${toErrorMessage(error)}`, { cause: error });
}

export class BrowserPageExecutor<TPayload, TPage extends PageHandle = Page>
  implements TaskExecutor<BrowserSession<TPage>, WorkItem, TPayload>
{
  private readonly config: BrowserExecutorConfig;
  private readonly extract: Extractor<TPayload, TPage>;
  private readonly primary?: ReadinessCondition<TPage>;
  private readonly fallback?: ReadinessCondition<TPage>;
  private readonly cookies: readonly BrowserCookie[];
  private readonly logger: Logger;
  private readonly random: () => number;

  constructor(options: BrowserPageExecutorOptions<TPayload, TPage>) {
    this.config = options.config;
    this.extract = options.extract;
    this.primary = options.primary ?? options.config.readySelector;
    this.fallback = options.fallback ?? options.config.fallbackReadySelector;
    this.cookies = options.cookies ?? [];
    this.logger = (options.logger ?? silentLogger).child({ component: 'BrowserPageExecutor' });
    this.random = options.random ?? Math.random;
  }

  async execute(session: BrowserSession<TPage>, task: Task, attempt: AttemptInfo): Promise<ExecutionOutcome<TPayload>> {
    const url = urlOf(task.item);
    let context: ContextHandle<TPage> | null = null;
    let page: TPage | null = null;

    try {
      try {
        context = await session.browser.newContext(this.contextOptions(session.proxy));
        await this.prepareContext(context);
        page = await context.newPage();
        await page.goto(url, { timeout: this.config.navigationTimeoutMs, waitUntil: this.config.waitUntil });
      } catch (error) {
        return fail(classifyNavigationError(error, url));
      }

      try {
        const stage = await waitForReadiness(page, {
          primary: this.primary,
          fallback: this.fallback,
          timeoutMs: this.config.readinessTimeoutMs,
        });
        if (stage === 'fallback') this.logger.info({ url }, 'Primary readiness condition failed, page ready via fallback');
      } catch (error) {
        const readinessError = error instanceof ReadinessTimeoutError
          ? error
          : new ReadinessTimeoutError(toErrorMessage(error), { cause: error });
        if (this.config.readinessPolicy !== 'partial' || !attempt.final) return fail(readinessError);
        this.logger.warn({ url, attempt: attempt.number, err: readinessError }, 'No retries left, continuing with partial page');
      }

      try {
        return succeed(await this.extract(page, task.item));
      } catch (error) {
        return fail(new ExtractionError(`Extraction failed on ${url}: ${toErrorMessage(error)}`, { cause: error }));
      }
    } finally {
      await this.teardown(page, context, url);
    }
  }

  private contextOptions(proxy: ProxyEndpoint | null): ContextOptions {
    return {
      userAgent: proxy?.userAgent ?? this.config.userAgent ?? pickRandom(USER_AGENTS, this.random),
      viewport: pickRandom(VIEWPORTS, this.random),
      locale: proxy?.locale ?? this.config.locale,
      timezoneId: proxy?.timezoneId ?? this.config.timezoneId,
      colorScheme: 'light',
      extraHTTPHeaders: { 'Accept-Language': proxy?.acceptLanguage ?? this.config.acceptLanguage },
    };
  }

  private async prepareContext(context: ContextHandle<TPage>): Promise<void> {
    await context.addInitScript(STEALTH_SCRIPT);
    if (this.config.blockImages) await context.route(IMAGE_PATTERN, route => route.abort());
    if (this.config.blockFonts) await context.route(FONT_PATTERN, route => route.abort());
    if (this.cookies.length > 0) await context.addCookies([...this.cookies]);
  }

  private async teardown(page: TPage | null, context: ContextHandle<TPage> | null, url: string): Promise<void> {
    try {
      await page?.close();
      await context?.close();
    } catch (error) {
      this.logger.warn({ url, err: error }, 'Failed to close page context');
    }
  }
}
