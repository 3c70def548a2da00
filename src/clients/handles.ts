/**
 * The slice of the Playwright API the engine touches.
 * Playwright's `Browser`, `BrowserContext` and `Page` satisfy these structurally.
 */
import type { WaitUntil } from '../types.js';

export interface BrowserCookie {
  name: string;
  value: string;
  url?: string;
  domain?: string;
  path?: string;
  expires?: number;
  httpOnly?: boolean;
  secure?: boolean;
  sameSite?: 'Strict' | 'Lax' | 'None';
}

export interface ContextOptions {
  userAgent?: string;
  viewport?: { width: number; height: number };
  locale?: string;
  timezoneId?: string;
  colorScheme?: 'light' | 'dark' | 'no-preference';
  extraHTTPHeaders?: Record<string, string>;
}

export interface RouteHandle {
  abort(errorCode?: string): Promise<void>;
}

export interface PageHandle {
  goto(url: string, options: { timeout: number; waitUntil: WaitUntil }): Promise<unknown>;
  waitForSelector(selector: string, options: { timeout: number; state: 'attached' }): Promise<unknown>;
  content(): Promise<string>;
  url(): string;
  close(): Promise<void>;
}

export interface ContextHandle<TPage extends PageHandle = PageHandle> {
  newPage(): Promise<TPage>;
  route(url: string, handler: (route: RouteHandle) => Promise<void>): Promise<void>;
  addCookies(cookies: BrowserCookie[]): Promise<void>;
  addInitScript(script: () => void): Promise<void>;
  close(): Promise<void>;
}

export interface BrowserHandle<TPage extends PageHandle = PageHandle> {
  newContext(options: ContextOptions): Promise<ContextHandle<TPage>>;
  close(): Promise<void>;
}
