/**
 * Scrape service
 *
 * Performs one relayed GET per call:
 * 1. Pick the proxy (override first, then the request's own)
 * 2. Build a dispatcher scoped to this call
 * 3. Fetch the target with the request timeout
 * 4. Return the body text, or throw a ScrapeError describing the failure
 */

import { STATUS_CODES } from 'http';
import { fetch, type Dispatcher, type Response } from 'undici';
import { MAX_TIMEOUT_SECONDS, RELAY_DEFAULTS } from '../config/config.js';
import { createLogger, type Logger } from '../logger/index.js';
import type { ScrapeRequest } from '../types/scrape.types.js';
import { ScrapeError } from './errors.js';
import { createDispatcher, describeProxyTarget, parseProxyUrl, resolveProxy, type ProxyTarget } from './proxy.js';

// data:, blob: and file: would be answered by fetch without any GET going out
const FETCHABLE_PROTOCOLS = new Set(['http:', 'https:']);

export interface ScrapeServiceOptions {
  /**
   * Proxy applied to every request, ignoring the request's own proxy field
   */
  proxyOverride?: string;
  defaultTimeoutSeconds?: number;
}

export class ScrapeService {
  private readonly proxyOverride?: string;
  private readonly defaultTimeoutSeconds: number;

  constructor(options: ScrapeServiceOptions = {}) {
    this.proxyOverride = options.proxyOverride;
    this.defaultTimeoutSeconds = options.defaultTimeoutSeconds ?? RELAY_DEFAULTS.timeoutSeconds;
  }

  /**
   * Request timeout, else the default; capped at what a timer can hold
   */
  resolveTimeoutSeconds(request: ScrapeRequest): number {
    return Math.min(request.timeoutSeconds ?? this.defaultTimeoutSeconds, MAX_TIMEOUT_SECONDS);
  }

  /**
   * Fetch the target URL and return its body as text
   *
   * @throws ScrapeError for every failure; its status is the one to answer with
   */
  async scrape(request: ScrapeRequest): Promise<string> {
    const logger = createLogger('ScrapeService', { url: request.url });
    const timeoutSeconds = this.resolveTimeoutSeconds(request);

    const proxy = resolveProxy(this.proxyOverride, request.proxy);
    let target: ProxyTarget | undefined;
    if (proxy !== undefined) {
      try {
        target = parseProxyUrl(proxy);
      } catch (error) {
        // The message holds the raw proxy string, credentials included
        logger.warn({ type: error instanceof ScrapeError ? error.type : 'unknown' }, 'Failed to parse proxy URL');
        throw error;
      }
      logger.info({
        proxyAddress: describeProxyTarget(target),
        source: this.proxyOverride !== undefined ? 'override' : 'request'
      }, 'Using proxy');
    }

    let dispatcher: Dispatcher;
    try {
      dispatcher = createDispatcher(target);
    } catch (error) {
      logger.error({ error }, 'Failed to build HTTP client');
      throw ScrapeError.clientInit(error);
    }

    logger.info({ timeoutSeconds }, 'Attempting to scrape URL');

    try {
      return await this.fetchText(request.url, dispatcher, timeoutSeconds, logger);
    } finally {
      await dispatcher.destroy();
    }
  }

  private async fetchText(url: string, dispatcher: Dispatcher, timeoutSeconds: number, logger: Logger): Promise<string> {
    const protocol = URL.canParse(url) ? new URL(url).protocol : undefined;
    if (protocol && !FETCHABLE_PROTOCOLS.has(protocol)) {
      logger.warn({ protocol }, 'Refusing non-HTTP URL');
      throw ScrapeError.request(new Error(`URL scheme is not allowed: ${protocol}`));
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        dispatcher,
        signal: AbortSignal.timeout(timeoutSeconds * 1000),
      });
    } catch (error) {
      logger.warn({ error }, 'Request failed');
      throw ScrapeError.request(error);
    }

    if (!response.ok) {
      const reason = STATUS_CODES[response.status] ?? 'Unknown Status';
      logger.warn({ status: response.status, reason }, 'Upstream responded with non-success status');
      throw ScrapeError.upstreamStatus(response.status, reason);
    }

    try {
      const text = await response.text();
      logger.info({ status: response.status, bytes: Buffer.byteLength(text) }, 'Successfully scraped URL');
      return text;
    } catch (error) {
      logger.warn({ error }, 'Failed to read response body');
      throw ScrapeError.bodyRead(error);
    }
  }
}
