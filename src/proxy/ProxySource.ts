/** Read-only proxy endpoint sources */
import fs from 'fs/promises';
import { z } from 'zod';
import { parseProxies } from '../config.js';
import { ConfigError } from '../errors.js';
import type { EngineConfig, ProxyEndpoint } from '../types.js';

export interface ProxySource {
  /** Snapshot of usable endpoints, taken once per run. */
  listAvailableEndpoints(): Promise<ProxyEndpoint[]>;
}

const ProxyEndpointSchema = z.object({
  name: z.string().min(1),
  server: z.string().url(),
  username: z.string().optional(),
  password: z.string().optional(),
  locale: z.string().optional(),
  timezoneId: z.string().optional(),
  userAgent: z.string().optional(),
  acceptLanguage: z.string().optional(),
});

const ProxyFileSchema = z.array(ProxyEndpointSchema);

export class StaticProxySource implements ProxySource {
  private readonly endpoints: readonly ProxyEndpoint[];

  constructor(endpoints: readonly ProxyEndpoint[]) {
    this.endpoints = endpoints.map(e => Object.freeze({ ...e }));
  }

  async listAvailableEndpoints(): Promise<ProxyEndpoint[]> {
    return [...this.endpoints];
  }
}

/** Loads a JSON array of endpoints, as written by the proxy provisioning tooling. */
export class FileProxySource implements ProxySource {
  constructor(private filePath: string) {}

  async listAvailableEndpoints(): Promise<ProxyEndpoint[]> {
    const raw = await fs.readFile(this.filePath, 'utf-8');
    return parseProxyFile(raw, this.filePath);
  }
}

export function parseProxyFile(raw: string, source = 'proxy file'): ProxyEndpoint[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  const parsed = ProxyFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`${source}: ${issue.path.join('.') || '(root)'} ${issue.message}`);
  }
  return parsed.data.map(e => Object.freeze(e));
}

/** PROXIES_FILE wins over PROXIES; neither means direct connections only. */
export function proxySourceFromConfig(cfg: Pick<EngineConfig, 'proxiesFile' | 'proxies'>): ProxySource {
  if (cfg.proxiesFile) return new FileProxySource(cfg.proxiesFile);
  return new StaticProxySource(cfg.proxies ? parseProxies(cfg.proxies) : []);
}
