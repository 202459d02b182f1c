/**
 * Discord webhook notifier. One embed per post; images go in the embed
 * image, videos in a field since webhooks cannot embed video.
 */

import {
  DiscordAPIError,
  EmbedBuilder,
  HTTPError,
  RateLimitError as DiscordRateLimitError,
  WebhookClient,
} from 'discord.js';
import type { Post } from '../source/adapter.js';
import type { Destination } from '../shared/config.js';
import type { DeliveryOutcome, Notifier } from './notifier.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const EMBED_COLOR = 1942002;

// Discord rejects embeds over these lengths with a 400.
export const EMBED_LIMITS = {
  title: 256,
  description: 4096,
  fieldValue: 1024,
} as const;

export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.substring(0, maxLength - 3) + '...';
}

export function buildEmbed(account: string, post: Post): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle(truncateText(`New post from @${account}`, EMBED_LIMITS.title))
    .setURL(post.link)
    .setDescription(truncateText(post.text || 'Click the link to view the post!', EMBED_LIMITS.description))
    .setColor(EMBED_COLOR)
    .setFooter({ text: `Follow @${account} for more updates!` });

  if (post.media?.kind === 'image') {
    embed.setImage(post.media.url);
  } else if (post.media?.kind === 'video') {
    embed.addFields({ name: 'Video', value: truncateText(post.media.url, EMBED_LIMITS.fieldValue) });
  }

  if (post.timestamp) {
    embed.setTimestamp(post.timestamp);
  }

  return embed;
}

function outcomeForStatus(status: number): DeliveryOutcome {
  const reason = `Webhook responded ${status}`;
  if (status === 429 || status >= 500) {
    return { status: 'transient', reason };
  }
  return { status: 'rejected', reason };
}

/**
 * Posts through discord.js webhook clients, one per webhook URL. Requests are
 * not retried here; a transient outcome leaves the post for the next sweep.
 */
export class DiscordWebhookNotifier implements Notifier {
  private readonly clients = new Map<string, WebhookClient>();

  constructor(private readonly timeoutMs: number = 15000) {}

  private client(webhookUrl: string): WebhookClient {
    let client = this.clients.get(webhookUrl);
    if (!client) {
      client = new WebhookClient(
        { url: webhookUrl },
        { rest: { timeout: this.timeoutMs, retries: 0, rejectOnRateLimit: () => true } },
      );
      this.clients.set(webhookUrl, client);
    }
    return client;
  }

  async notify(destination: Destination, account: string, post: Post): Promise<DeliveryOutcome> {
    let client: WebhookClient;
    let embed: EmbedBuilder;
    try {
      client = this.client(destination.webhookUrl);
      embed = buildEmbed(account, post);
    } catch (err) {
      return { status: 'rejected', reason: errorMessage(err) };
    }

    try {
      await client.send({ embeds: [embed] });
      return { status: 'delivered' };
    } catch (err) {
      if (err instanceof DiscordRateLimitError) {
        return { status: 'transient', reason: `Webhook rate limited, retry after ${err.retryAfter}ms` };
      }
      if (err instanceof DiscordAPIError || err instanceof HTTPError) {
        return outcomeForStatus(err.status);
      }
      if (err instanceof Error && err.name === 'AbortError') {
        return { status: 'transient', reason: `Webhook timed out after ${this.timeoutMs}ms` };
      }
      logger.debug({ destination: destination.name, error: errorMessage(err) }, 'Webhook request failed');
      return { status: 'transient', reason: errorMessage(err) };
    }
  }

  /** Release every webhook client. */
  close(): void {
    for (const client of this.clients.values()) {
      client.destroy();
    }
    this.clients.clear();
  }
}
