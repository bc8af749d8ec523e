import type { CheerioAPI } from 'cheerio';
import { z } from 'zod';
import { errorMessage } from '../../errors';
import { silentLogger } from '../../logger';
import type { Logger } from '../../logger';
import type { RestaurantListing } from '../../types';

export const JSON_LD_SELECTOR = 'script[type="application/ld+json"]';
export const TARGET_ENTITY_TYPE = 'Restaurant';

export type JsonLdPayload = Record<string, unknown>;

const ListingSchema = z
  .object({
    '@type': z.string(),
    name: z.string().nullish(),
    url: z.string().nullish(),
  })
  .passthrough();

const ItemListSchema = z.object({ itemListElement: z.array(z.unknown()) });
const ListElementSchema = z.object({ item: z.unknown() });

/**
 * Parse the first JSON-LD block on the page.
 * A missing, empty or malformed block is logged and yields null.
 */
export function parseJsonLd($: CheerioAPI, logger: Logger = silentLogger): JsonLdPayload | null {
  const script = $(JSON_LD_SELECTOR).first();
  if (!script.length) {
    logger.error('No JSON-LD data found in the page');
    return null;
  }
  const text = script.text().trim();
  if (!text) {
    logger.error('JSON-LD script tag is empty');
    return null;
  }
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    logger.error({ err: errorMessage(err) }, 'Error parsing JSON-LD data');
    return null;
  }
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    logger.error('JSON-LD payload is not an object');
    return null;
  }
  return Object.fromEntries(Object.entries(value));
}

export function countListElements(payload: JsonLdPayload): number {
  const list = ItemListSchema.safeParse(payload);
  return list.success ? list.data.itemListElement.length : 0;
}

/** The `item` of every list element whose @type is Restaurant, in page order. */
export function getRestaurantItems(payload: JsonLdPayload | null): RestaurantListing[] {
  if (!payload) return [];
  const list = ItemListSchema.safeParse(payload);
  if (!list.success) return [];
  const items: RestaurantListing[] = [];
  for (const element of list.data.itemListElement) {
    const el = ListElementSchema.safeParse(element);
    if (!el.success) continue;
    const item = ListingSchema.safeParse(el.data.item);
    if (item.success && item.data['@type'] === TARGET_ENTITY_TYPE) items.push(item.data);
  }
  return items;
}
