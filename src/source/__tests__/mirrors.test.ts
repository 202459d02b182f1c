import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MirrorPool, looksLikeFeed, toEndpoint } from '../mirrors.js';
import { ConfigError } from '../../shared/errors.js';

const FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0"><channel><title>acct</title></channel></rss>`;

const MIRRORS = ['https://a.test', 'https://b.test', 'https://c.test'];

function makePool(overrides: { hintTtlMs?: number; now?: () => number } = {}): MirrorPool {
  return new MirrorPool(MIRRORS, {
    timeoutMs: 1000,
    userAgent: 'test-agent',
    hintTtlMs: overrides.hintTtlMs ?? 0,
    now: overrides.now,
  });
}

function feedResponse(): Response {
  return new Response(FEED, { status: 200, headers: { 'Content-Type': 'application/rss+xml' } });
}

function calledUrls(mock: ReturnType<typeof vi.fn>): string[] {
  return mock.mock.calls.map((call) => String(call[0]));
}

describe('looksLikeFeed', () => {
  it('accepts XML content types', () => {
    expect(looksLikeFeed('<rss/>', 'application/rss+xml; charset=utf-8')).toBe(true);
  });

  it('accepts feed bodies without a useful content type', () => {
    expect(looksLikeFeed('  <?xml version="1.0"?><rss/>', 'text/plain')).toBe(true);
    expect(looksLikeFeed('<feed xmlns="http://www.w3.org/2005/Atom"/>', '')).toBe(true);
  });

  it('rejects HTML pages even when the content type claims XML', () => {
    expect(looksLikeFeed('<!DOCTYPE html><html><body>blocked</body></html>', 'text/xml')).toBe(false);
    expect(looksLikeFeed('<html><body>blocked</body></html>', 'text/html')).toBe(false);
  });

  it('rejects empty bodies', () => {
    expect(looksLikeFeed('   ', 'application/xml')).toBe(false);
  });
});

describe('toEndpoint', () => {
  it('strips trailing slashes and lowercases the host', () => {
    expect(toEndpoint('https://Nitter.Example/')).toEqual({
      baseUrl: 'https://nitter.example',
      host: 'nitter.example',
    });
  });

  it('throws ConfigError for invalid URLs', () => {
    expect(() => toEndpoint('not a url')).toThrow(ConfigError);
  });
});

describe('MirrorPool', () => {
  const originalFetch = globalThis.fetch;

  beforeEach(() => {
    vi.restoreAllMocks();
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('requires at least one endpoint', () => {
    expect(() => new MirrorPool([], { timeoutMs: 1000, userAgent: 'x', hintTtlMs: 0 })).toThrow(ConfigError);
  });

  it('falls back past a transport failure and stops at the first good mirror', async () => {
    const mockFetch = vi.fn().mockImplementation(async (url: string) => {
      if (url.startsWith('https://a.test')) throw new TypeError('fetch failed');
      return feedResponse();
    });
    globalThis.fetch = mockFetch;

    const selection = await makePool().select('acct');

    expect(selection?.endpoint.baseUrl).toBe('https://b.test');
    expect(selection?.body).toBe(FEED);
    expect(calledUrls(mockFetch)).toEqual(['https://a.test/acct/rss', 'https://b.test/acct/rss']);
  });

  it('skips mirrors that serve an HTML page with status 200', async () => {
    const mockFetch = vi.fn().mockImplementation(async (url: string) => {
      if (url.startsWith('https://a.test')) {
        return new Response('<html><body>Instance is down</body></html>', {
          status: 200,
          headers: { 'Content-Type': 'text/html' },
        });
      }
      return feedResponse();
    });
    globalThis.fetch = mockFetch;

    const selection = await makePool().select('acct');
    expect(selection?.endpoint.baseUrl).toBe('https://b.test');
  });

  it('moves on from a rate-limited mirror', async () => {
    const mockFetch = vi.fn().mockImplementation(async (url: string) => {
      if (url.startsWith('https://a.test') || url.startsWith('https://b.test')) {
        return new Response('slow down', { status: 429, headers: { 'Retry-After': '60' } });
      }
      return feedResponse();
    });
    globalThis.fetch = mockFetch;

    const selection = await makePool().select('acct');
    expect(selection?.endpoint.baseUrl).toBe('https://c.test');
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it('resolves to null when every mirror fails', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('Server Error', { status: 502 }));

    await expect(makePool().select('acct')).resolves.toBeNull();
  });

  it('skips endpoints already tried', async () => {
    const mockFetch = vi.fn().mockImplementation(async () => feedResponse());
    globalThis.fetch = mockFetch;

    const tried = new Set(['https://a.test']);
    const selection = await makePool().select('acct', { tried });
    expect(selection?.endpoint.baseUrl).toBe('https://b.test');
    expect(calledUrls(mockFetch)).toEqual(['https://b.test/acct/rss']);
    expect([...tried]).toEqual(['https://a.test', 'https://b.test']);
  });

  it('records failed endpoints as tried', async () => {
    globalThis.fetch = vi.fn().mockImplementation(async (url: string) => {
      if (url.startsWith('https://a.test')) throw new TypeError('fetch failed');
      return feedResponse();
    });

    const tried = new Set<string>();
    await makePool().select('acct', { tried });
    expect([...tried]).toEqual(['https://a.test', 'https://b.test']);
  });

  it('probes the last known good mirror first while the hint is fresh', async () => {
    let now = 1_000;
    const pool = makePool({ hintTtlMs: 60_000, now: () => now });

    globalThis.fetch = vi.fn().mockImplementation(async (url: string) => {
      if (url.startsWith('https://a.test')) throw new TypeError('fetch failed');
      return feedResponse();
    });
    await pool.select('acct');

    const second = vi.fn().mockImplementation(async () => feedResponse());
    globalThis.fetch = second;
    const hinted = await pool.select('acct');
    expect(hinted?.endpoint.baseUrl).toBe('https://b.test');
    expect(calledUrls(second)).toEqual(['https://b.test/acct/rss']);

    now += 60_001;
    const third = vi.fn().mockImplementation(async () => feedResponse());
    globalThis.fetch = third;
    const expired = await pool.select('acct');
    expect(expired?.endpoint.baseUrl).toBe('https://a.test');
  });

  it('keeps priority order for other accounts', () => {
    const pool = makePool({ hintTtlMs: 60_000 });
    expect(pool.order('other').map((e) => e.baseUrl)).toEqual(MIRRORS);
  });

  it('builds rotations that visit every endpoint once', () => {
    const pool = makePool();
    const from = pool.list()[1];
    expect(from).toBeDefined();
    if (!from) return;
    expect(pool.rotation(from).map((e) => e.baseUrl)).toEqual([
      'https://b.test',
      'https://c.test',
      'https://a.test',
    ]);
  });

  it('builds feed and post URLs', () => {
    const pool = makePool();
    const endpoint = toEndpoint('https://a.test/');
    expect(pool.feedUrl(endpoint, 'acct')).toBe('https://a.test/acct/rss');
    expect(pool.postUrl(endpoint, 'acct', '123')).toBe('https://a.test/acct/status/123');
    expect(pool.isMirrorHost('A.TEST')).toBe(true);
    expect(pool.isMirrorHost('img.example.com')).toBe(false);
  });
});
