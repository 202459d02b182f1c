import type { Endpoint, EndpointSelection } from './adapter.js';
import { fetchText, type HttpOptions } from '../shared/http.js';
import { ConfigError, RateLimitError, RelayError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface MirrorPoolOptions extends HttpOptions {
  /** How long a last-known-good endpoint leads the probe order. 0 disables hints. */
  hintTtlMs: number;
  now?: () => number;
}

export interface SelectOptions {
  /**
   * Base URLs already probed during this fetch. They are skipped, and every
   * endpoint probed now is added.
   */
  tried?: Set<string>;
}

const FEED_ACCEPT = 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*';

/**
 * True when a 2xx body looks like a feed rather than an HTML error page.
 */
export function looksLikeFeed(body: string, contentType: string): boolean {
  const head = body.trimStart().slice(0, 256).toLowerCase();
  if (head.length === 0) return false;
  if (head.startsWith('<!doctype html') || head.startsWith('<html')) return false;
  if (/xml|rss|atom/i.test(contentType)) return true;
  return head.startsWith('<?xml') || head.startsWith('<rss') || head.startsWith('<feed');
}

export function toEndpoint(baseUrl: string): Endpoint {
  let parsed: URL;
  try {
    parsed = new URL(baseUrl);
  } catch {
    throw new ConfigError(`Invalid mirror URL: ${baseUrl}`, { baseUrl });
  }
  return {
    baseUrl: `${parsed.protocol}//${parsed.host}${parsed.pathname.replace(/\/+$/, '')}`,
    host: parsed.hostname.toLowerCase(),
  };
}

export class MirrorPool {
  private readonly endpoints: readonly Endpoint[];
  private readonly hints = new Map<string, { baseUrl: string; at: number }>();
  private readonly now: () => number;

  constructor(
    baseUrls: readonly string[],
    private readonly options: MirrorPoolOptions,
  ) {
    if (baseUrls.length === 0) {
      throw new ConfigError('At least one mirror endpoint is required');
    }
    this.endpoints = baseUrls.map(toEndpoint);
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.endpoints.length;
  }

  list(): readonly Endpoint[] {
    return this.endpoints;
  }

  feedUrl(endpoint: Endpoint, account: string): string {
    return `${endpoint.baseUrl}/${encodeURIComponent(account)}/rss`;
  }

  postUrl(endpoint: Endpoint, account: string, id: string): string {
    return `${endpoint.baseUrl}/${encodeURIComponent(account)}/status/${encodeURIComponent(id)}`;
  }

  isMirrorHost(host: string): boolean {
    const h = host.toLowerCase();
    return this.endpoints.some((e) => e.host === h);
  }

  /**
   * Every endpoint exactly once, starting at `from` and wrapping around.
   */
  rotation(from: Endpoint): Endpoint[] {
    const start = this.endpoints.findIndex((e) => e.baseUrl === from.baseUrl);
    if (start < 0) return [...this.endpoints];
    return [...this.endpoints.slice(start), ...this.endpoints.slice(0, start)];
  }

  /**
   * Probe order for an account: a fresh hint first, then priority order.
   */
  order(account: string): Endpoint[] {
    const hint = this.hints.get(account);
    if (!hint || this.options.hintTtlMs <= 0 || this.now() - hint.at > this.options.hintTtlMs) {
      return [...this.endpoints];
    }
    const first = this.endpoints.find((e) => e.baseUrl === hint.baseUrl);
    if (!first) return [...this.endpoints];
    return [first, ...this.endpoints.filter((e) => e !== first)];
  }

  forget(account: string): void {
    this.hints.delete(account);
  }

  /**
   * Probe endpoints in order and return the first that serves a feed for
   * `account`. Resolves to null when none does; never rejects for transport
   * or content failures.
   */
  async select(account: string, opts: SelectOptions = {}): Promise<EndpointSelection | null> {
    for (const endpoint of this.order(account)) {
      if (opts.tried?.has(endpoint.baseUrl)) continue;
      opts.tried?.add(endpoint.baseUrl);

      const url = this.feedUrl(endpoint, account);
      try {
        const res = await fetchText(url, { ...this.options, accept: FEED_ACCEPT });
        if (!looksLikeFeed(res.body, res.contentType)) {
          logger.warn({ account, endpoint: endpoint.baseUrl, contentType: res.contentType }, 'Mirror returned non-feed content');
          continue;
        }
        if (this.options.hintTtlMs > 0) {
          this.hints.set(account, { baseUrl: endpoint.baseUrl, at: this.now() });
        }
        logger.debug({ account, endpoint: endpoint.baseUrl }, 'Mirror selected');
        return { endpoint, body: res.body, contentType: res.contentType };
      } catch (err) {
        if (!(err instanceof RelayError)) throw err;
        if (err instanceof RateLimitError) {
          logger.warn({ account, endpoint: endpoint.baseUrl, retryAfter: err.retryAfter }, 'Mirror rate limited');
        } else {
          logger.warn({ account, endpoint: endpoint.baseUrl, error: err.message }, 'Mirror probe failed');
        }
      }
    }

    this.forget(account);
    return null;
  }
}
