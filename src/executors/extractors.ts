/** Built-in extraction routines for the browser executor */
import fs from 'fs/promises';
import type { PageHandle } from '../clients/handles.js';
import type { WorkItem } from '../types.js';

/** Caller-supplied routine run against a ready page. The engine only catches its errors. */
export type Extractor<TPayload, TPage extends PageHandle = PageHandle> = (
  page: TPage,
  item: WorkItem,
) => Promise<TPayload>;

export interface HtmlPayload {
  url: string;
  html: string;
}

export const htmlExtractor: Extractor<HtmlPayload> = async page => ({
  url: page.url(),
  html: await page.content(),
});

export interface ScriptablePage extends PageHandle {
  evaluate(script: string): Promise<unknown>;
}

/**
 * Evaluates a JS file in the page. A file holding a function expression
 * is invoked by Playwright; its return value becomes the payload.
 * The file is read once, on first use.
 */
export function scriptExtractor<TPage extends ScriptablePage>(scriptPath: string): Extractor<unknown, TPage> {
  let script: Promise<string> | null = null;
  return async page => {
    script ??= fs.readFile(scriptPath, 'utf-8');
    return page.evaluate(await script);
  };
}
