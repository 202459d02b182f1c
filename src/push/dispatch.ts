import type { Destination } from '../shared/config.js';
import type { Post } from '../source/adapter.js';
import type { DedupLedger } from '../ledger/ledger.js';
import type { DeliveryOutcome, Notifier } from './notifier.js';
import { isOlderThan } from '../source/extract.js';
import { LedgerError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface PostSource {
  fetchLatest(account: string): Promise<Post[]>;
}

export interface SweepDeps {
  fetcher: PostSource;
  ledger: DedupLedger;
  notifier: Notifier;
}

export interface SweepOptions {
  /** Skip posts older than this many days. null disables the age policy. */
  maxAgeDays: number | null;
  now?: () => Date;
}

export interface SweepStats {
  accountsProcessed: number;
  accountsFailed: number;
  postsFetched: number;
  postsDelivered: number;
  postsDuplicate: number;
  postsStale: number;
  postsFailed: number;
  errors: Array<{ account: string; error: string }>;
  durationMs: number;
}

function emptyStats(): SweepStats {
  return {
    accountsProcessed: 0,
    accountsFailed: 0,
    postsFetched: 0,
    postsDelivered: 0,
    postsDuplicate: 0,
    postsStale: 0,
    postsFailed: 0,
    errors: [],
    durationMs: 0,
  };
}

/**
 * One pass over every destination and account. A failure for one account
 * never stops the sweep; a ledger write failure does.
 */
export async function runSweep(
  destinations: readonly Destination[],
  deps: SweepDeps,
  options: SweepOptions,
): Promise<SweepStats> {
  const startTime = Date.now();
  const now = options.now ?? (() => new Date());
  const stats = emptyStats();

  for (const destination of destinations) {
    for (const account of destination.accounts) {
      let posts: Post[];
      try {
        await deps.ledger.load(account);
        posts = await deps.fetcher.fetchLatest(account);
      } catch (err) {
        if (err instanceof LedgerError) throw err;
        stats.accountsFailed++;
        stats.errors.push({ account, error: errorMessage(err) });
        logger.error({ account, destination: destination.name, error: errorMessage(err) }, 'Account fetch failed');
        continue;
      }

      stats.accountsProcessed++;
      stats.postsFetched += posts.length;

      // Source order is newest first; deliver oldest first.
      for (const post of [...posts].reverse()) {
        await deliverPost(destination, account, post, deps, options, now(), stats);
      }
    }
  }

  stats.durationMs = Date.now() - startTime;
  logger.info(
    {
      accountsProcessed: stats.accountsProcessed,
      accountsFailed: stats.accountsFailed,
      postsDelivered: stats.postsDelivered,
      postsDuplicate: stats.postsDuplicate,
      durationMs: stats.durationMs,
    },
    'Sweep complete',
  );

  return stats;
}

async function deliverPost(
  destination: Destination,
  account: string,
  post: Post,
  deps: SweepDeps,
  options: SweepOptions,
  now: Date,
  stats: SweepStats,
): Promise<void> {
  if (deps.ledger.has(account, post.id)) {
    stats.postsDuplicate++;
    logger.debug({ account, id: post.id }, 'Skipping already forwarded post');
    return;
  }

  if (options.maxAgeDays !== null && isOlderThan(post, options.maxAgeDays, now)) {
    stats.postsStale++;
    logger.debug({ account, id: post.id, timestamp: post.timestamp }, 'Skipping old post');
    return;
  }

  let outcome: DeliveryOutcome;
  try {
    outcome = await deps.notifier.notify(destination, account, post);
  } catch (err) {
    outcome = { status: 'transient', reason: errorMessage(err) };
  }

  if (outcome.status !== 'delivered') {
    stats.postsFailed++;
    logger.warn(
      { account, id: post.id, destination: destination.name, status: outcome.status, reason: outcome.reason },
      'Post not delivered',
    );
    return;
  }

  deps.ledger.record(account, post.id);
  await deps.ledger.flush(account);
  stats.postsDelivered++;
  logger.info({ account, id: post.id, link: post.link, destination: destination.name }, 'Post forwarded');
}
