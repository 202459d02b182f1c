import type { Post } from './adapter.js';
import type { MirrorPool } from './mirrors.js';
import type { MediaResolver } from './media.js';
import { extractPosts, parseFeedDocument, type FeedDocument } from './extract.js';
import { RelayError, SourceError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface PostFetcherOptions {
  maxPosts: number;
  canonicalBase: string;
}

/**
 * Ties mirror selection, extraction and media resolution into one call.
 */
export class PostFetcher {
  constructor(
    private readonly pool: MirrorPool,
    private readonly media: MediaResolver,
    private readonly options: PostFetcherOptions,
  ) {}

  /**
   * Newest posts for `account` in source order (newest first). Resolves to an
   * empty list when no mirror serves a usable feed this cycle.
   */
  async fetchLatest(account: string, maxCount: number = this.options.maxPosts): Promise<Post[]> {
    const tried = new Set<string>();

    try {
      while (tried.size < this.pool.size) {
        const selection = await this.pool.select(account, { tried });
        if (!selection) break;

        let doc: FeedDocument;
        try {
          doc = await parseFeedDocument(selection.body);
        } catch (err) {
          if (!(err instanceof SourceError)) throw err;
          logger.warn({ account, endpoint: selection.endpoint.baseUrl, error: err.message }, 'Mirror served an unparseable feed');
          this.pool.forget(account);
          continue;
        }

        const entries = extractPosts(doc, account, {
          maxCount,
          canonicalBase: this.options.canonicalBase,
        });

        const posts: Post[] = [];
        // Sequential on purpose: media lookups hit the same mirrors.
        for (const entry of entries) {
          const media = await this.media.resolve(entry.markup, {
            account,
            id: entry.id,
            endpoint: selection.endpoint,
          });
          posts.push(
            Object.freeze({
              id: entry.id,
              link: entry.link,
              text: entry.text,
              media,
              timestamp: entry.timestamp,
            }),
          );
        }

        logger.debug({ account, endpoint: selection.endpoint.baseUrl, count: posts.length }, 'Posts fetched');
        return posts;
      }
    } catch (err) {
      if (!(err instanceof RelayError)) throw err;
      logger.warn({ account, error: err.message, code: err.code }, 'Fetch failed');
      return [];
    }

    logger.warn({ account }, 'No mirror served a usable feed');
    return [];
  }
}
