/** Configuration loader */
import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';
import { ConfigError } from './errors.js';
import type { EngineConfig, ProxyEndpoint, ReadinessPolicy, WaitUntil } from './types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.join(__dirname, '../.env') });

export type { EngineConfig, ProxyEndpoint } from './types.js';

const WAIT_UNTIL: readonly WaitUntil[] = ['load', 'domcontentloaded', 'networkidle', 'commit'];
const READINESS_POLICIES: readonly ReadinessPolicy[] = ['retry', 'partial'];

const env = (key: string, def: string) => process.env[key] || def;
const envInt = (key: string, def: number) => parseInt(env(key, String(def)), 10);
const envBool = (key: string, def: boolean) => env(key, String(def)) !== 'false';
const envOpt = (key: string) => process.env[key] || undefined;

const pick = <T extends string>(value: string, allowed: readonly T[], key: string): T => {
  const match = allowed.find(a => a === value);
  if (!match) throw new ConfigError(`${key} must be one of ${allowed.join(', ')}, got "${value}"`);
  return match;
};

export const config: EngineConfig = {
  maxConcurrency: envInt('MAX_CONCURRENCY', 4),
  maxRetries: envInt('MAX_RETRIES', 5),
  maxTasksPerClient: envInt('MAX_TASKS_PER_CLIENT', 20),
  spareProxies: envInt('SPARE_PROXIES', 2),
  navigationTimeoutMs: envInt('NAVIGATION_TIMEOUT_MS', 30000),
  requestTimeoutMs: envInt('REQUEST_TIMEOUT_MS', 30000),
  readinessTimeoutMs: envInt('READINESS_TIMEOUT_MS', 10000),
  waitUntil: pick(env('WAIT_UNTIL', 'domcontentloaded'), WAIT_UNTIL, 'WAIT_UNTIL'),
  readySelector: envOpt('READY_SELECTOR'),
  fallbackReadySelector: envOpt('FALLBACK_READY_SELECTOR'),
  readinessPolicy: pick(env('READINESS_POLICY', 'retry'), READINESS_POLICIES, 'READINESS_POLICY'),
  jitterMinMs: envInt('JITTER_MIN_MS', 200),
  jitterMaxMs: envInt('JITTER_MAX_MS', 500),
  headless: envBool('HEADLESS', true),
  locale: env('LOCALE', 'en-US'),
  timezoneId: env('TIMEZONE_ID', 'UTC'),
  acceptLanguage: env('ACCEPT_LANGUAGE', 'en-US,en;q=0.9'),
  userAgent: envOpt('USER_AGENT'),
  blockImages: envBool('BLOCK_IMAGES', true),
  blockFonts: envBool('BLOCK_FONTS', true),
  cookiesPath: envOpt('COOKIES_PATH'),
  proxiesFile: envOpt('PROXIES_FILE'),
  proxies: envOpt('PROXIES'),
  outputDir: env('OUTPUT_DIR', './output'),
  logLevel: env('LOG_LEVEL', 'info'),
};

export function validateConfig(cfg: EngineConfig): EngineConfig {
  const positive: (keyof EngineConfig)[] = ['maxConcurrency', 'maxTasksPerClient'];
  for (const key of positive) {
    const value = cfg[key];
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
      throw new ConfigError(`${key} must be a positive integer`);
    }
  }
  const nonNegative: (keyof EngineConfig)[] = [
    'maxRetries', 'spareProxies', 'navigationTimeoutMs', 'requestTimeoutMs',
    'readinessTimeoutMs', 'jitterMinMs', 'jitterMaxMs',
  ];
  for (const key of nonNegative) {
    const value = cfg[key];
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new ConfigError(`${key} must be a non-negative number`);
    }
  }
  if (cfg.jitterMinMs > cfg.jitterMaxMs) {
    throw new ConfigError('jitterMinMs must not exceed jitterMaxMs');
  }
  return cfg;
}

export const createConfig = (overrides: Partial<EngineConfig> = {}): EngineConfig =>
  validateConfig({
    ...config,
    ...overrides,
  });

/**
 * Parses `name=host:port[:username:password]` entries separated by commas.
 * The name is optional and defaults to `host:port`.
 */
export const parseProxies = (str: string): ProxyEndpoint[] =>
  str.split(',').map(p => p.trim()).filter(Boolean).map(p => {
    const eq = p.indexOf('=');
    const name = eq > 0 ? p.slice(0, eq) : undefined;
    const spec = eq > 0 ? p.slice(eq + 1) : p;
    const [host, port, username, password] = spec.split(':');
    if (!host || !port) throw new ConfigError(`Invalid proxy entry "${p}"`);
    const endpoint: ProxyEndpoint = {
      name: name ?? `${host}:${port}`,
      server: `http://${host}:${port}`,
      ...(username ? { username } : {}),
      ...(password ? { password } : {}),
    };
    return Object.freeze(endpoint);
  });
