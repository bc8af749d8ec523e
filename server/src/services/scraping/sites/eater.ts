import * as cheerio from 'cheerio';
import { silentLogger } from '../../../logger';
import type { Logger } from '../../../logger';
import type { RestaurantRecord } from '../../../types';
import { BaseAdapter } from '../baseAdapter';
import { countListElements, getRestaurantItems, parseJsonLd } from '../jsonLd';
import { EATER_MAP_CARD_TEMPLATE, extractMapCardInfo } from '../mapCard';
import type { MapCardTemplate } from '../mapCard';
import { buildRestaurantRecord } from '../normalize';

/**
 * Restaurants on one Eater map page, in JSON-LD order.
 * Listings without an address on their map card are dropped.
 */
export function extractRestaurantData(
  html: string,
  pageUrl: string,
  logger: Logger = silentLogger,
  template: MapCardTemplate = EATER_MAP_CARD_TEMPLATE,
): RestaurantRecord[] {
  const log = logger.child({ component: 'eater' });
  const $ = cheerio.load(html);
  const payload = parseJsonLd($, log);
  if (!payload) return [];
  log.info({ items: countListElements(payload) }, 'Parsed JSON-LD data');

  const restaurants: RestaurantRecord[] = [];
  for (const listing of getRestaurantItems(payload)) {
    log.debug({ name: listing.name }, 'Processing restaurant');
    const { address, description } = extractMapCardInfo($, listing, template);
    if (!address) {
      log.warn({ name: listing.name ?? null }, 'Skipping restaurant - no address found');
      continue;
    }
    restaurants.push(buildRestaurantRecord(listing, address, description, pageUrl));
  }
  log.info({ count: restaurants.length }, 'Extracted restaurants from JSON-LD data');
  return restaurants;
}

export class EaterAdapter extends BaseAdapter {
  constructor(private readonly template: MapCardTemplate = EATER_MAP_CARD_TEMPLATE) {
    super();
  }

  getMeta() { return { name: 'Eater' }; }

  parsePage(html: string, pageUrl: string, logger: Logger): RestaurantRecord[] {
    return extractRestaurantData(html, pageUrl, logger, this.template);
  }
}
