/**
 * A mirror origin serving feeds and post pages for the monitored accounts.
 */
export interface Endpoint {
  baseUrl: string;
  host: string;
}

/**
 * An endpoint accepted by a probe, with the feed body the probe received.
 */
export interface EndpointSelection {
  endpoint: Endpoint;
  body: string;
  contentType: string;
}

export type MediaKind = 'image' | 'video';

export interface Media {
  readonly url: string;
  readonly kind: MediaKind;
}

/**
 * One feed entry after parsing, before media resolution.
 */
export interface ExtractedEntry {
  id: string;
  link: string;
  sourceLink: string;
  text: string;
  markup: string;
  timestamp: Date | null;
}

/**
 * Normalized post. Built once per fetch cycle and never mutated; only `id`
 * outlives the cycle, through the ledger.
 */
export interface Post {
  readonly id: string;
  readonly link: string;
  readonly text: string;
  readonly media: Media | null;
  readonly timestamp: Date | null;
}
