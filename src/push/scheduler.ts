/**
 * Sweep scheduling: a fixed-interval loop by default, or node-cron when
 * `poll.cron` is set.
 */

import cron, { type ScheduledTask } from 'node-cron';
import type { Config, Destination } from '../shared/config.js';
import { resolvePath, sleep } from '../shared/utils.js';
import { ConfigError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { MirrorPool } from '../source/mirrors.js';
import { MediaResolver } from '../source/media.js';
import { PostFetcher } from '../source/fetcher.js';
import { DedupLedger } from '../ledger/ledger.js';
import { FileLedgerStore } from '../ledger/store.js';
import { DiscordWebhookNotifier } from './discord.js';
import { runSweep, type SweepDeps, type SweepOptions, type SweepStats } from './dispatch.js';

export interface Pipeline extends SweepDeps {
  pool: MirrorPool;
  media: MediaResolver;
  fetcher: PostFetcher;
  notifier: DiscordWebhookNotifier;
}

export function createPipeline(config: Config): Pipeline {
  const http = { timeoutMs: config.fetch.timeout_ms, userAgent: config.fetch.user_agent };

  const pool = new MirrorPool(config.mirrors.endpoints, {
    ...http,
    hintTtlMs: config.mirrors.hint_ttl_ms,
  });
  const media = new MediaResolver(pool, {
    ...http,
    verify: config.media.verify,
    jitterMinMs: config.media.jitter_min_ms,
    jitterMaxMs: config.media.jitter_max_ms,
    placeholderHosts: config.media.placeholder_hosts,
  });
  const fetcher = new PostFetcher(pool, media, {
    maxPosts: config.fetch.max_posts,
    canonicalBase: config.fetch.canonical_base,
  });
  const ledger = new DedupLedger(
    new FileLedgerStore(resolvePath(config.dedup.ledger_dir)),
    config.dedup.capacity,
  );

  return {
    pool,
    media,
    fetcher,
    ledger,
    notifier: new DiscordWebhookNotifier(config.fetch.timeout_ms),
  };
}

export function sweepOptions(config: Config): SweepOptions {
  return { maxAgeDays: config.dedup.max_age_days };
}

/**
 * Run sweeps back to back with `intervalMs` of idle time between them until
 * `signal` aborts. Resolves with the number of sweeps run.
 */
export async function startPolling(
  destinations: readonly Destination[],
  deps: SweepDeps,
  options: SweepOptions & { intervalMs: number },
  signal: AbortSignal,
): Promise<number> {
  let sweeps = 0;
  logger.info({ destinations: destinations.length, intervalMs: options.intervalMs }, 'Polling started');

  while (!signal.aborted) {
    await runSweep(destinations, deps, options);
    sweeps++;
    await sleep(options.intervalMs, signal);
  }

  logger.info({ sweeps }, 'Polling stopped');
  return sweeps;
}

/**
 * Schedule sweeps on a cron expression. A tick that fires while the previous
 * sweep is still running is skipped. Returns the task so callers can stop it.
 */
export function startCronSchedule(
  expression: string,
  destinations: readonly Destination[],
  deps: SweepDeps,
  options: SweepOptions,
  onFatal: (err: unknown) => void,
): ScheduledTask {
  if (!cron.validate(expression)) {
    throw new ConfigError(`Invalid cron expression: ${expression}`, { expression });
  }

  let running: Promise<SweepStats> | null = null;

  const task = cron.schedule(expression, () => {
    if (running) {
      logger.warn('Previous sweep still running, skipping tick');
      return;
    }
    running = runSweep(destinations, deps, options);
    void running
      .catch((err: unknown) => {
        logger.fatal({ error: errorMessage(err) }, 'Scheduled sweep failed');
        task.stop();
        onFatal(err);
      })
      .finally(() => {
        running = null;
      });
  });

  logger.info({ cron: expression }, 'Scheduler started');
  return task;
}
