import type { CrawlTarget, ListingItem } from '../types.js';

/**
 * Delivers new listings to a subscriber. Called at most once per target
 * run, never on a seed run, never with an empty list.
 */
export interface Notifier {
  notify(subscriberEmail: string, target: CrawlTarget, newItems: ListingItem[]): Promise<void>;
}
