/** Cookie file loading shared by both client kinds */
import fs from 'fs/promises';
import { z } from 'zod';
import type { Logger } from '../logger.js';
import type { BrowserCookie } from './handles.js';

const CookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  url: z.string().optional(),
  domain: z.string().optional(),
  path: z.string().optional(),
  expires: z.number().optional(),
  httpOnly: z.boolean().optional(),
  secure: z.boolean().optional(),
  sameSite: z.enum(['Strict', 'Lax', 'None']).optional(),
});

const CookieFileSchema = z.array(CookieSchema);

/** A missing or malformed file is not fatal: the run continues without cookies. */
export async function loadCookies(filePath: string | undefined, logger: Logger): Promise<BrowserCookie[] | null> {
  if (!filePath) return null;
  try {
    const raw = await fs.readFile(filePath, 'utf-8');
    const parsed = CookieFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      logger.warn({ cookiesPath: filePath, issue: parsed.error.issues[0]?.message }, 'Ignoring malformed cookies file');
      return null;
    }
    return parsed.data;
  } catch (error) {
    logger.warn({ cookiesPath: filePath, err: error }, 'Failed to load cookies');
    return null;
  }
}

/** `Cookie` header value for HTTP sessions. */
export const cookieHeader = (cookies: readonly BrowserCookie[]): string =>
  cookies.map(c => `${c.name}=${c.value}`).join('; ');
