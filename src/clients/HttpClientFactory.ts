/** Keep-alive axios sessions, one per worker client */
import http from 'http';
import https from 'https';
import axios, { type AxiosAdapter, type AxiosInstance, type AxiosProxyConfig } from 'axios';
import { ConfigError } from '../errors.js';
import type { EngineConfig, ProxyEndpoint } from '../types.js';
import type { ClientFactory } from './ClientLifecycle.js';
import { cookieHeader } from './cookies.js';
import type { BrowserCookie } from './handles.js';
import { USER_AGENTS, pickRandom } from './fingerprint.js';

export interface HttpSession {
  readonly http: AxiosInstance;
  readonly proxyName: string | null;
  readonly httpAgent: http.Agent;
  readonly httpsAgent: https.Agent;
}

export interface HttpClientFactoryOptions {
  cookies?: readonly BrowserCookie[] | null;
  /** Replaces the network adapter; used by tests */
  adapter?: AxiosAdapter;
}

export function toAxiosProxy(proxy: ProxyEndpoint): AxiosProxyConfig {
  let url: URL;
  try {
    url = new URL(proxy.server);
  } catch {
    throw new ConfigError(`Proxy ${proxy.name} has an invalid server URL "${proxy.server}"`);
  }
  const protocol = url.protocol.replace(':', '');
  if (protocol !== 'http' && protocol !== 'https') {
    throw new ConfigError(`Proxy ${proxy.name}: HTTP sessions support http(s) proxies only, got ${protocol}`);
  }
  const username = proxy.username ?? decodeURIComponent(url.username);
  const password = proxy.password ?? decodeURIComponent(url.password);
  return {
    protocol,
    host: url.hostname,
    port: url.port ? Number(url.port) : protocol === 'https' ? 443 : 80,
    ...(username ? { auth: { username, password } } : {}),
  };
}

export class HttpClientFactory implements ClientFactory<HttpSession> {
  constructor(
    private config: Pick<EngineConfig, 'requestTimeoutMs' | 'acceptLanguage' | 'userAgent'>,
    private options: HttpClientFactoryOptions = {},
  ) {}

  async create(proxy: ProxyEndpoint | null): Promise<HttpSession> {
    const headers: Record<string, string> = {
      'User-Agent': proxy?.userAgent ?? this.config.userAgent ?? pickRandom(USER_AGENTS),
      'Accept-Language': proxy?.acceptLanguage ?? this.config.acceptLanguage,
    };
    if (this.options.cookies?.length) headers.Cookie = cookieHeader(this.options.cookies);

    const httpAgent = new http.Agent({ keepAlive: true });
    const httpsAgent = new https.Agent({ keepAlive: true });
    const instance = axios.create({
      timeout: this.config.requestTimeoutMs,
      headers,
      httpAgent,
      httpsAgent,
      proxy: proxy ? toAxiosProxy(proxy) : false,
      ...(this.options.adapter && { adapter: this.options.adapter }),
    });

    return { http: instance, proxyName: proxy?.name ?? null, httpAgent, httpsAgent };
  }

  async close(session: HttpSession): Promise<void> {
    session.httpAgent.destroy();
    session.httpsAgent.destroy();
  }
}
