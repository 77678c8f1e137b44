import { formatPrice } from './templates.js';
import type { Notifier } from './notifier.js';
import type { CrawlTarget, ListingItem } from '../types.js';

export class ConsoleNotifier implements Notifier {
  async notify(subscriberEmail: string, target: CrawlTarget, newItems: ListingItem[]): Promise<void> {
    console.log(`\n✅ ${newItems.length} new listing(s) for ${subscriberEmail} (${target.canonicalUrl}):`);
    for (const item of newItems) {
      console.log(`  • [${item.id}] ${formatPrice(item.price)} | ${item.location || '—'} | ${item.url}`);
    }
  }
}
