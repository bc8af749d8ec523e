import type { RestaurantInput, RestaurantListing, RestaurantRecord } from '../../types';
import { sourceTokenFromUrl } from './url';

/**
 * Merge a JSON-LD listing with its map-card fields.
 *
 * `source` always comes from the page being scraped, never from the listing's
 * own URL, so every record from one page carries the same provenance.
 */
export function buildRestaurantRecord(
  listing: Pick<RestaurantListing, 'name' | 'url'>,
  address: string,
  description: string | null,
  pageUrl: string,
): RestaurantRecord {
  return {
    name: listing.name ?? null,
    description,
    source: sourceTokenFromUrl(pageUrl),
    source_url: listing.url ?? '',
    address,
  };
}

export function recordToRestaurantInput(record: RestaurantRecord): RestaurantInput {
  return {
    name: record.name,
    description: record.description,
    address: record.address,
    source: record.source,
    source_url: record.source_url,
  };
}
