import { errors as playwrightErrors } from 'playwright';
import { describe, expect, it } from 'vitest';
import type { BrowserSession } from '../clients/BrowserClientFactory.js';
import type { BrowserCookie, BrowserHandle, ContextHandle, ContextOptions, PageHandle } from '../clients/handles.js';
import type { ProxyEndpoint, Task } from '../types.js';
import { BrowserPageExecutor, type BrowserExecutorConfig } from './BrowserPageExecutor.js';
import { htmlExtractor, type Extractor } from './extractors.js';

interface PageScript {
  gotoError?: Error;
  present?: string[];
  html?: string;
}

class FakePage implements PageHandle {
  closed = false;
  private current = 'about:blank';

  constructor(private script: PageScript) {}

  async goto(url: string) {
    if (this.script.gotoError) throw this.script.gotoError;
    this.current = url;
    return null;
  }

  async waitForSelector(selector: string, options: { timeout: number }) {
    if (!(this.script.present ?? []).includes(selector)) throw new Error(`Timeout ${options.timeout}ms exceeded`);
    return null;
  }

  async content() {
    return this.script.html ?? '<html><body>ok</body></html>';
  }

  url() {
    return this.current;
  }

  async close() {
    this.closed = true;
  }
}

class FakeContext implements ContextHandle<FakePage> {
  closed = false;
  routes: string[] = [];
  cookies: BrowserCookie[] = [];
  initScripts = 0;

  constructor(readonly page: FakePage, readonly options: ContextOptions) {}

  async newPage() {
    return this.page;
  }

  async route(url: string) {
    this.routes.push(url);
  }

  async addCookies(cookies: BrowserCookie[]) {
    this.cookies.push(...cookies);
  }

  async addInitScript() {
    this.initScripts++;
  }

  async close() {
    this.closed = true;
  }
}

class FakeBrowser implements BrowserHandle<FakePage> {
  contexts: FakeContext[] = [];

  constructor(private script: PageScript) {}

  async newContext(options: ContextOptions) {
    const context = new FakeContext(new FakePage(this.script), options);
    this.contexts.push(context);
    return context;
  }

  async close() {}
}

const CONFIG: BrowserExecutorConfig = {
  navigationTimeoutMs: 1000,
  waitUntil: 'domcontentloaded',
  readinessTimeoutMs: 500,
  readySelector: '#main',
  fallbackReadySelector: '.fallback',
  readinessPolicy: 'retry',
  locale: 'en-US',
  timezoneId: 'UTC',
  acceptLanguage: 'en-US',
  userAgent: 'agent/1.0',
  blockImages: true,
  blockFonts: true,
};

const PAGE_URL = 'https://example.test/item/1';
const task: Task = { item: PAGE_URL, identity: PAGE_URL, retries: 0 };
const FIRST = { number: 1, final: false };
const LAST = { number: 3, final: true };

const setup = (script: PageScript, proxy: ProxyEndpoint | null = null) => {
  const browser = new FakeBrowser(script);
  const session: BrowserSession<FakePage> = { browser, proxy };
  return { browser, session };
};

describe('BrowserPageExecutor', () => {
  it('extracts once the primary selector is attached', async () => {
    const { browser, session } = setup({ present: ['#main'], html: '<main id="main"></main>' });
    const executor = new BrowserPageExecutor({ config: CONFIG, extract: htmlExtractor });

    expect(await executor.execute(session, task, FIRST)).toEqual({
      ok: true,
      payload: { url: PAGE_URL, html: '<main id="main"></main>' },
    });
    const [context] = browser.contexts;
    expect(context.page.closed).toBe(true);
    expect(context.closed).toBe(true);
  });

  it('succeeds through the fallback selector without a retry', async () => {
    const { session } = setup({ present: ['.fallback'] });
    const executor = new BrowserPageExecutor({ config: CONFIG, extract: htmlExtractor });
    const outcome = await executor.execute(session, task, FIRST);
    expect(outcome.ok).toBe(true);
  });

  it('fails the attempt when neither selector appears', async () => {
    const { browser, session } = setup({ present: [] });
    const executor = new BrowserPageExecutor({ config: CONFIG, extract: htmlExtractor });
    const outcome = await executor.execute(session, task, FIRST);

    if (outcome.ok) throw new Error('expected a failure');
    expect(outcome.error.kind).toBe('ReadinessTimeout');
    expect(outcome.error.message).toBe(
      "Both primary '#main' and fallback '.fallback' failed: Timeout 500ms exceeded, Timeout 500ms exceeded",
    );
    expect(browser.contexts[0].closed).toBe(true);
  });

  it('keeps a partial page on the final attempt under the partial policy', async () => {
    const { session } = setup({ present: [], html: '<p>partial</p>' });
    const executor = new BrowserPageExecutor({
      config: { ...CONFIG, readinessPolicy: 'partial' },
      extract: htmlExtractor,
    });

    const early = await executor.execute(session, task, FIRST);
    expect(early.ok).toBe(false);
    expect(await executor.execute(session, task, LAST)).toEqual({
      ok: true,
      payload: { url: PAGE_URL, html: '<p>partial</p>' },
    });
  });

  it('classifies navigation timeouts', async () => {
    const { browser, session } = setup({ gotoError: new playwrightErrors.TimeoutError('Timeout 1000ms exceeded') });
    const executor = new BrowserPageExecutor({ config: CONFIG, extract: htmlExtractor });
    const outcome = await executor.execute(session, task, FIRST);

    if (outcome.ok) throw new Error('expected a failure');
    expect(outcome.error.kind).toBe('Timeout');
    expect(outcome.error.message).toBe(`Navigation to ${PAGE_URL} timed out: Timeout 1000ms exceeded`);
    expect(browser.contexts[0].page.closed).toBe(true);
    expect(browser.contexts[0].closed).toBe(true);
  });

  it('classifies other navigation failures as transport errors', async () => {
    const { session } = setup({ gotoError: new Error('net::ERR_PROXY_CONNECTION_FAILED') });
    const executor = new BrowserPageExecutor({ config: CONFIG, extract: htmlExtractor });
    const outcome = await executor.execute(session, task, FIRST);

    if (outcome.ok) throw new Error('expected a failure');
    expect(outcome.error.kind).toBe('TransportError');
    expect(outcome.error.message).toBe(`Navigation to ${PAGE_URL} failed: net::ERR_PROXY_CONNECTION_FAILED`);
  });

  it('wraps extractor failures', async () => {
    const { browser, session } = setup({ present: ['#main'] });
    const extract: Extractor<string, FakePage> = async () => {
      throw new Error('price missing');
    };
    const executor = new BrowserPageExecutor({ config: CONFIG, extract });
    const outcome = await executor.execute(session, task, FIRST);

    if (outcome.ok) throw new Error('expected a failure');
    expect(outcome.error.kind).toBe('ExtractionError');
    expect(outcome.error.message).toBe(`Extraction failed on ${PAGE_URL}: price missing`);
    expect(browser.contexts[0].closed).toBe(true);
  });

  it('prepares each context with blocking, cookies and the proxy identity', async () => {
    const proxy: ProxyEndpoint = {
      name: 'de1',
      server: 'http://10.0.0.5:3128',
      locale: 'de-DE',
      timezoneId: 'Europe/Berlin',
      acceptLanguage: 'de-DE,de;q=0.9',
    };
    const { browser, session } = setup({ present: ['#main'] }, proxy);
    const executor = new BrowserPageExecutor({
      config: CONFIG,
      extract: htmlExtractor,
      cookies: [{ name: 'sid', value: 'test-token', domain: 'example.test', path: '/' }],
      random: () => 0,
    });
    await executor.execute(session, task, FIRST);

    const [context] = browser.contexts;
    expect(context.initScripts).toBe(1);
    expect(context.routes).toHaveLength(2);
    expect(context.cookies).toEqual([{ name: 'sid', value: 'test-token', domain: 'example.test', path: '/' }]);
    expect(context.options).toEqual({
      userAgent: 'agent/1.0',
      viewport: { width: 1920, height: 1080 },
      locale: 'de-DE',
      timezoneId: 'Europe/Berlin',
      colorScheme: 'light',
      extraHTTPHeaders: { 'Accept-Language': 'de-DE,de;q=0.9' },
    });
  });

  it('skips waiting when no selector is configured', async () => {
    const { session } = setup({ present: [] });
    const executor = new BrowserPageExecutor({
      config: { ...CONFIG, readySelector: undefined, fallbackReadySelector: undefined },
      extract: htmlExtractor,
    });
    expect((await executor.execute(session, task, FIRST)).ok).toBe(true);
  });
});
