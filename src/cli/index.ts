#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, resolveDestinations, writeDefaultConfig, HandleSchema } from '../shared/config.js';
import { getRelayDir } from '../shared/utils.js';
import { ConfigError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { looksLikeFeed } from '../source/mirrors.js';
import { fetchText } from '../shared/http.js';
import { createPipeline, startCronSchedule, startPolling, sweepOptions } from '../push/scheduler.js';
import { runSweep } from '../push/dispatch.js';

const program = new Command();

program
  .name('postrelay')
  .description('Forward new social-media posts from feed mirrors to Discord webhooks')
  .version('0.1.0');

function parseHandle(value: string): string {
  const parsed = HandleSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`Invalid account handle: ${value}`);
  }
  return parsed.data;
}

// === init ===
program
  .command('init')
  .description('Write a default config to ~/.postrelay/config.yaml')
  .action(() => {
    const configPath = path.join(getRelayDir(), 'config.yaml');
    if (fs.existsSync(configPath)) {
      log(`✓ ${configPath} already exists`);
      return;
    }
    writeDefaultConfig(configPath);
    log(`✓ ${configPath} created`);
  });

// === run ===
program
  .command('run')
  .description('Poll every configured account and forward new posts')
  .option('--once', 'Run a single sweep and exit', false)
  .option('--cron <expr>', 'Schedule sweeps with a cron expression instead of the interval loop')
  .action(async (opts: { once: boolean; cron?: string }) => {
    const config = await loadConfig();
    const destinations = resolveDestinations(config);
    if (destinations.length === 0) {
      log('No deliverable destinations configured. Edit ~/.postrelay/config.yaml first.');
      process.exitCode = 1;
      return;
    }

    const pipeline = createPipeline(config);
    const options = sweepOptions(config);

    if (opts.once) {
      const stats = await runSweep(destinations, pipeline, options).finally(() => pipeline.notifier.close());
      log(`✓ ${stats.postsDelivered} delivered, ${stats.postsDuplicate} duplicates, ${stats.postsFailed} failed`);
      return;
    }

    const controller = new AbortController();
    const cronExpr = opts.cron ?? config.poll.cron;

    if (cronExpr) {
      const task = startCronSchedule(cronExpr, destinations, pipeline, options, (err) => {
        logger.fatal({ error: errorMessage(err) }, 'Stopping after fatal error');
        pipeline.notifier.close();
        process.exitCode = 1;
      });
      const stop = (): void => {
        task.stop();
        pipeline.notifier.close();
        logger.info('Scheduler stopped');
      };
      process.once('SIGINT', stop);
      process.once('SIGTERM', stop);
      return;
    }

    process.once('SIGINT', () => controller.abort());
    process.once('SIGTERM', () => controller.abort());
    try {
      await startPolling(
        destinations,
        pipeline,
        { ...options, intervalMs: config.poll.interval_sec * 1000 },
        controller.signal,
      );
    } finally {
      pipeline.notifier.close();
    }
  });

// === fetch ===
program
  .command('fetch <account>')
  .description('Print the newest posts for an account without forwarding them')
  .option('-n, --count <n>', 'Number of posts', '3')
  .action(async (account: string, opts: { count: string }) => {
    const handle = parseHandle(account);
    const config = await loadConfig();
    const { fetcher } = createPipeline(config);

    const posts = await fetcher.fetchLatest(handle, Math.max(1, parseInt(opts.count, 10) || 3));
    if (posts.length === 0) {
      log(`No posts available for @${handle} this cycle.`);
      return;
    }
    for (const post of posts) {
      log(`${post.id}  ${post.timestamp?.toISOString() ?? '(no date)'}  ${post.link}`);
      if (post.text) log(`  ${post.text}`);
      if (post.media) log(`  [${post.media.kind}] ${post.media.url}`);
    }
  });

// === mirrors ===
program
  .command('mirrors <account>')
  .description('Probe every mirror for an account and report which serve a feed')
  .action(async (account: string) => {
    const handle = parseHandle(account);
    const config = await loadConfig();
    const { pool } = createPipeline(config);

    for (const endpoint of pool.list()) {
      const url = pool.feedUrl(endpoint, handle);
      try {
        const res = await fetchText(url, {
          timeoutMs: config.fetch.timeout_ms,
          userAgent: config.fetch.user_agent,
        });
        const ok = looksLikeFeed(res.body, res.contentType);
        log(`${ok ? '✓' : '✗'} ${endpoint.baseUrl.padEnd(36)} ${ok ? 'feed' : `not a feed (${res.contentType || 'no content-type'})`}`);
      } catch (err) {
        log(`✗ ${endpoint.baseUrl.padEnd(36)} ${errorMessage(err)}`);
      }
    }
  });

// === ledger ===
program
  .command('ledger <account>')
  .description('Show post ids already forwarded for an account, oldest first')
  .action(async (account: string) => {
    const handle = parseHandle(account);
    const config = await loadConfig();
    const { ledger } = createPipeline(config);

    const ids = await ledger.load(handle);
    if (ids.size === 0) {
      log(`No forwarded posts recorded for @${handle}.`);
      return;
    }
    for (const id of ids) log(id);
    log(`✓ ${ids.size} ids`);
  });

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  logger.fatal({ error: errorMessage(err) }, 'postrelay failed');
  process.exitCode = 1;
});
