import Parser from 'rss-parser';
import type { ExtractedEntry, Post } from './adapter.js';
import { SourceError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/**
 * Unparsed fields of one feed entry.
 */
export interface RawItem {
  link?: string;
  description: string;
  pubDate?: string;
}

export interface FeedDocument {
  title?: string;
  items: RawItem[];
}

export interface ExtractOptions {
  maxCount: number;
  canonicalBase: string;
}

const parser = new Parser({
  customFields: {
    item: [['content:encoded', 'contentEncoded']],
  },
});

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Parse an RSS or Atom document. Anything else, including an HTML page served
 * with a 200, is a SourceError.
 */
export async function parseFeedDocument(raw: string): Promise<FeedDocument> {
  let feed: Awaited<ReturnType<typeof parser.parseString>>;
  try {
    feed = await parser.parseString(raw);
  } catch (err) {
    throw new SourceError(`Feed is not parseable: ${errorMessage(err)}`);
  }

  const items: RawItem[] = (feed.items ?? []).map((entry) => ({
    link: optionalString(entry.link)?.trim(),
    description: optionalString(entry.content) ?? optionalString(entry['contentEncoded']) ?? '',
    pubDate: optionalString(entry.pubDate),
  }));

  return { title: optionalString(feed.title), items };
}

/**
 * Strip HTML tags and decode common entities.
 */
export function stripHtml(html: string): string {
  // Remove script/style blocks
  let text = html.replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '');
  text = text.replace(/<br\s*\/?>/gi, ' ');
  text = text.replace(/<[^>]+>/g, ' ');
  text = text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&#x27;/g, "'")
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&');
  return text.replace(/\s+/g, ' ').trim();
}

const MONTHS: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3, may: 4, jun: 5,
  jul: 6, aug: 7, sep: 8, oct: 9, nov: 10, dec: 11,
};

const ZONES: Record<string, number> = {
  UT: 0, UTC: 0, GMT: 0, Z: 0,
  EST: -300, EDT: -240, CST: -360, CDT: -300,
  MST: -420, MDT: -360, PST: -480, PDT: -420,
};

const MAIL_DATE =
  /^(?:[A-Za-z]{3},\s*)?(\d{1,2})\s+([A-Za-z]{3})\s+(\d{2}|\d{4})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([A-Za-z]{1,3}|[+-]\d{4})?$/;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})$/;

/**
 * Parse an RFC 2822 mail/news date ("Mon, 01 Jan 2024 10:00:00 GMT").
 * Atom's ISO-8601 timestamps are accepted as well. Returns null for anything
 * else.
 */
export function parseMailDate(value: string | undefined): Date | null {
  if (!value) return null;
  const input = value.trim();

  const m = MAIL_DATE.exec(input);
  if (m) {
    const [, day, mon, yr, hh, mm, ss, zone] = m;
    const month = MONTHS[(mon ?? '').toLowerCase()];
    if (month === undefined) return null;

    let year = Number(yr);
    if ((yr ?? '').length === 2) year += year < 50 ? 2000 : 1900;

    let offsetMin = 0;
    if (zone) {
      if (/^[+-]\d{4}$/.test(zone)) {
        const sign = zone.startsWith('-') ? -1 : 1;
        offsetMin = sign * (Number(zone.slice(1, 3)) * 60 + Number(zone.slice(3, 5)));
      } else {
        const known = ZONES[zone.toUpperCase()];
        if (known === undefined) return null;
        offsetMin = known;
      }
    }

    const d = Number(day);
    const h = Number(hh);
    const min = Number(mm);
    const s = Number(ss ?? '0');
    if (d < 1 || d > 31 || h > 23 || min > 59 || s > 60) return null;

    const ms = Date.UTC(year, month, d, h, min, s) - offsetMin * 60_000;
    const date = new Date(ms);
    // Rejects 31 Feb and friends, which Date.UTC silently rolls over.
    if (new Date(Date.UTC(year, month, d)).getUTCDate() !== d) return null;
    return date;
  }

  if (ISO_DATE.test(input)) {
    const date = new Date(input);
    return Number.isNaN(date.getTime()) ? null : date;
  }

  return null;
}

const ID_PATTERN = /^[A-Za-z0-9_.-]+$/;

/**
 * Last non-empty path segment of a post link, or null when there is none.
 */
export function postIdFromLink(link: string | undefined): string | null {
  if (!link) return null;

  let pathname: string;
  try {
    pathname = new URL(link).pathname;
  } catch {
    pathname = link.split(/[?#]/)[0] ?? '';
  }

  const segments = pathname.split('/').filter((s) => s.length > 0);
  const last = segments[segments.length - 1];
  if (!last) return null;

  let id: string;
  try {
    id = decodeURIComponent(last);
  } catch {
    return null;
  }
  return ID_PATTERN.test(id) && id !== '.' && id !== '..' ? id : null;
}

export function canonicalLink(canonicalBase: string, account: string, id: string): string {
  return `${canonicalBase.replace(/\/+$/, '')}/${account}/status/${id}`;
}

/**
 * Normalize the first `maxCount` entries of a parsed feed, in source order.
 * Entries without a derivable id are dropped; one bad entry never affects
 * the others.
 */
export function extractPosts(
  doc: FeedDocument,
  account: string,
  options: ExtractOptions,
): ExtractedEntry[] {
  const entries: ExtractedEntry[] = [];
  const seen = new Set<string>();

  for (const item of doc.items.slice(0, options.maxCount)) {
    try {
      const id = postIdFromLink(item.link);
      if (!id || !item.link) {
        logger.debug({ account, link: item.link }, 'Dropping entry without a post id');
        continue;
      }
      if (seen.has(id)) continue;
      seen.add(id);

      entries.push({
        id,
        link: canonicalLink(options.canonicalBase, account, id),
        sourceLink: item.link,
        text: stripHtml(item.description),
        markup: item.description,
        timestamp: parseMailDate(item.pubDate),
      });
    } catch (err) {
      logger.warn({ account, link: item.link, error: errorMessage(err) }, 'Failed to extract entry');
    }
  }

  return entries;
}

/**
 * Age policy used at the dispatch boundary. A post without a timestamp is
 * never considered old.
 */
export function isOlderThan(post: Pick<Post, 'timestamp'>, days: number, now: Date = new Date()): boolean {
  if (!post.timestamp) return false;
  return now.getTime() - post.timestamp.getTime() > days * 24 * 60 * 60 * 1000;
}
