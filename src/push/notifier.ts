import type { Post } from '../source/adapter.js';
import type { Destination } from '../shared/config.js';

export type DeliveryOutcome =
  | { status: 'delivered' }
  | { status: 'rejected'; reason: string }
  | { status: 'transient'; reason: string };

/**
 * Delivers one normalized post to a destination. Only a `delivered` outcome
 * lets the post id into the ledger.
 */
export interface Notifier {
  notify(destination: Destination, account: string, post: Post): Promise<DeliveryOutcome>;
}
