import { JSDOM } from 'jsdom';
import type { Endpoint, Media } from './adapter.js';
import type { MirrorPool } from './mirrors.js';
import { fetchText, probeStatus, type HttpOptions } from '../shared/http.js';
import { RateLimitError, RelayError } from '../shared/errors.js';
import { jitter, sleep } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export interface MediaResolverOptions extends HttpOptions {
  verify: boolean;
  jitterMinMs: number;
  jitterMaxMs: number;
  /** Hosts besides the mirrors themselves whose assets are placeholders. */
  placeholderHosts: readonly string[];
  random?: () => number;
}

export interface MediaTarget {
  account: string;
  id: string;
  /** The mirror that served the feed; secondary fetches start here. */
  endpoint: Endpoint;
}

type MediaStrategy = (markup: string, target: MediaTarget) => Promise<Media | null>;

function parseAbsolute(raw: string | null | undefined): URL | null {
  if (!raw) return null;
  const value = raw.trim();
  if (!/^https?:\/\//i.test(value)) return null;
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

function attrValues(root: ParentNode, selector: string, attr: string): string[] {
  return Array.from(root.querySelectorAll(selector))
    .map((el) => el.getAttribute(attr))
    .filter((v): v is string => typeof v === 'string' && v.length > 0);
}

/**
 * Finds one image or video for a post. Strategies run in order and stop at
 * the first candidate; the candidate is then verified, and a failed
 * verification yields null.
 */
export class MediaResolver {
  private readonly strategies: ReadonlyArray<{ name: string; run: MediaStrategy }>;
  private readonly placeholderHosts: ReadonlySet<string>;

  constructor(
    private readonly pool: MirrorPool,
    private readonly options: MediaResolverOptions,
  ) {
    this.placeholderHosts = new Set(options.placeholderHosts.map((h) => h.toLowerCase()));
    this.strategies = [
      { name: 'embedded', run: async (markup) => this.fromEmbedded(markup) },
      { name: 'markup-og', run: async (markup) => this.fromMarkupOpenGraph(markup) },
      { name: 'post-page', run: async (_markup, target) => this.fromPostPage(target) },
    ];
  }

  async resolve(markup: string, target: MediaTarget): Promise<Media | null> {
    for (const strategy of this.strategies) {
      const candidate = await strategy.run(markup, target);
      if (!candidate) continue;

      logger.debug({ account: target.account, id: target.id, strategy: strategy.name, url: candidate.url }, 'Media candidate found');
      return (await this.verify(candidate)) ? candidate : null;
    }
    return null;
  }

  private isUsable(raw: string | null | undefined): URL | null {
    const url = parseAbsolute(raw);
    if (!url) return null;
    const host = url.hostname.toLowerCase();
    if (this.pool.isMirrorHost(host) || this.placeholderHosts.has(host)) return null;
    return url;
  }

  private fromEmbedded(markup: string): Media | null {
    if (!markup) return null;
    const fragment = JSDOM.fragment(markup);

    for (const src of attrValues(fragment, 'img', 'src')) {
      const url = this.isUsable(src);
      if (url) return { url: url.href, kind: 'image' };
    }

    const videos = [
      ...attrValues(fragment, 'video', 'src'),
      ...attrValues(fragment, 'video source', 'src'),
    ];
    for (const src of videos) {
      const url = this.isUsable(src);
      if (url) return { url: url.href, kind: 'video' };
    }
    return null;
  }

  private fromMarkupOpenGraph(markup: string): Media | null {
    if (!markup) return null;
    const fragment = JSDOM.fragment(markup);
    for (const content of attrValues(fragment, 'meta[property="og:image"]', 'content')) {
      const url = this.isUsable(content);
      if (url) return { url: url.href, kind: 'image' };
    }
    return null;
  }

  private async fromPostPage(target: MediaTarget): Promise<Media | null> {
    for (const endpoint of this.pool.rotation(target.endpoint)) {
      await sleep(jitter(this.options.jitterMinMs, this.options.jitterMaxMs, this.options.random));

      const pageUrl = this.pool.postUrl(endpoint, target.account, target.id);
      try {
        const res = await fetchText(pageUrl, { ...this.options, accept: 'text/html' });
        const doc = new JSDOM(res.body).window.document;
        const content = doc.querySelector('meta[property="og:image"]')?.getAttribute('content');
        const url = parseAbsolute(content);
        return url ? { url: url.href, kind: 'image' } : null;
      } catch (err) {
        if (err instanceof RateLimitError) {
          logger.warn({ account: target.account, id: target.id, endpoint: endpoint.baseUrl }, 'Post page rate limited, trying next mirror');
          continue;
        }
        if (err instanceof RelayError) {
          logger.debug({ account: target.account, id: target.id, error: err.message }, 'Post page fetch failed');
          return null;
        }
        throw err;
      }
    }

    logger.warn({ account: target.account, id: target.id }, 'Every mirror rate limited the post page');
    return null;
  }

  private async verify(media: Media): Promise<boolean> {
    if (!parseAbsolute(media.url)) return false;
    if (!this.options.verify) return true;

    try {
      const status = await probeStatus(media.url, this.options);
      if (status >= 200 && status < 300) return true;
      logger.debug({ url: media.url, status }, 'Media URL not reachable, dropping');
      return false;
    } catch (err) {
      if (!(err instanceof RelayError)) throw err;
      logger.debug({ url: media.url, error: err.message }, 'Media probe failed, dropping');
      return false;
    }
  }
}
