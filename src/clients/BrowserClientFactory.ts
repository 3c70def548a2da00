/** Launches one Chromium instance per worker client */
import { chromium, type LaunchOptions, type Page } from 'playwright';
import type { EngineConfig, ProxyEndpoint } from '../types.js';
import type { ClientFactory } from './ClientLifecycle.js';
import type { BrowserHandle, PageHandle } from './handles.js';

const BROWSER_ARGS = ['--disable-blink-features=AutomationControlled', '--disable-dev-shm-usage', '--no-sandbox'];

export interface BrowserSession<TPage extends PageHandle = Page> {
  readonly browser: BrowserHandle<TPage>;
  /** Per-endpoint locale and user agent metadata feed each new context */
  readonly proxy: ProxyEndpoint | null;
}

export type BrowserLauncher<TPage extends PageHandle = Page> = (options: LaunchOptions) => Promise<BrowserHandle<TPage>>;

export const toPlaywrightProxy = (proxy: ProxyEndpoint): NonNullable<LaunchOptions['proxy']> => ({
  server: proxy.server,
  ...(proxy.username ? { username: proxy.username } : {}),
  ...(proxy.password ? { password: proxy.password } : {}),
});

export class BrowserClientFactory<TPage extends PageHandle = Page> implements ClientFactory<BrowserSession<TPage>> {
  constructor(
    private config: Pick<EngineConfig, 'headless'>,
    private launch: BrowserLauncher<TPage>,
  ) {}

  async create(proxy: ProxyEndpoint | null): Promise<BrowserSession<TPage>> {
    const browser = await this.launch({
      headless: this.config.headless,
      args: BROWSER_ARGS,
      ...(proxy && { proxy: toPlaywrightProxy(proxy) }),
    });
    return { browser, proxy };
  }

  async close(session: BrowserSession<TPage>): Promise<void> {
    await session.browser.close();
  }
}

export const launchChromium: BrowserLauncher = options => chromium.launch(options);

export const createChromiumFactory = (config: Pick<EngineConfig, 'headless'>) =>
  new BrowserClientFactory<Page>(config, launchChromium);
