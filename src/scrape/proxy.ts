/**
 * Proxy selection and dispatcher construction for relayed fetches
 */

import { Agent, ProxyAgent, type Dispatcher } from 'undici';
import { socksDispatcher } from 'fetch-socks';
import { ScrapeError } from './errors.js';

const DEFAULT_SOCKS_PORT = 1080;

const SOCKS_VERSIONS: Record<string, 4 | 5> = {
  'socks5:': 5,
  'socks5h:': 5,
  'socks4:': 4,
  'socks4a:': 4,
};

const HTTP_PROXY_PROTOCOLS = new Set(['http:', 'https:']);

export interface SocksProxyTarget {
  kind: 'socks';
  version: 4 | 5;
  host: string;
  port: number;
  userId?: string;
  password?: string;
}

export interface HttpProxyTarget {
  kind: 'http';
  uri: string;
}

export type ProxyTarget = SocksProxyTarget | HttpProxyTarget;

/**
 * The deployment-wide override wins over the per-request proxy.
 * Returns undefined when neither is set.
 */
export function resolveProxy(override: string | undefined, requested: string | undefined): string | undefined {
  return override ?? requested;
}

function tryParseUrl(value: string): URL | undefined {
  return URL.canParse(value) ? new URL(value) : undefined;
}

/**
 * Parse a proxy URI into a dispatcher target.
 * A bare `host:port` is taken as an HTTP proxy; note that `proxy.internal:3128`
 * parses as a URL with scheme `proxy.internal:` and no host, so it falls back too.
 *
 * @throws ScrapeError (invalid_proxy) when the URI does not parse, has no host,
 * or uses a scheme other than socks4(a), socks5(h), http or https
 */
export function parseProxyUrl(proxy: string): ProxyTarget {
  let url = tryParseUrl(proxy);
  if ((!url || !url.hostname) && !proxy.includes('://')) {
    url = tryParseUrl(`http://${proxy}`);
  }
  if (!url) {
    throw ScrapeError.invalidProxy(proxy);
  }

  // IPv6 literals come back bracketed
  const host = url.hostname.replace(/^\[(.*)\]$/, '$1');
  if (!host) {
    throw ScrapeError.invalidProxy(proxy);
  }

  const socksVersion = SOCKS_VERSIONS[url.protocol];
  if (socksVersion) {
    return {
      kind: 'socks',
      version: socksVersion,
      host,
      port: url.port ? parseInt(url.port, 10) : DEFAULT_SOCKS_PORT,
      ...(url.username ? { userId: decodeURIComponent(url.username) } : {}),
      ...(url.password ? { password: decodeURIComponent(url.password) } : {}),
    };
  }

  if (HTTP_PROXY_PROTOCOLS.has(url.protocol)) {
    return { kind: 'http', uri: url.toString() };
  }

  throw ScrapeError.invalidProxy(proxy);
}

/**
 * Proxy address safe for logs (credentials dropped)
 */
export function describeProxyTarget(target: ProxyTarget): string {
  if (target.kind === 'socks') {
    return `socks${target.version}://${target.host}:${target.port}`;
  }
  const url = new URL(target.uri);
  return `${url.protocol}//${url.host}`;
}

/**
 * Build a dispatcher used for a single relayed request.
 * Callers own it and must destroy it once the exchange is over.
 */
export function createDispatcher(target?: ProxyTarget): Dispatcher {
  if (!target) {
    return new Agent();
  }
  if (target.kind === 'http') {
    return new ProxyAgent({ uri: target.uri });
  }
  return socksDispatcher({
    type: target.version,
    host: target.host,
    port: target.port,
    userId: target.userId,
    password: target.password,
  });
}
