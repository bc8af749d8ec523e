import type { CheerioAPI } from 'cheerio';
import type { MapCardFields, RestaurantListing } from '../../types';
import { slugFromListingUrl } from './url';

/** Where a page template renders the fields JSON-LD leaves out. */
export interface MapCardTemplate {
  /** Tag + class of the per-listing container. */
  containerSelector: string;
  /** Attribute on the container holding the listing slug. */
  slugAttribute: string;
  addressSelector: string;
  descriptionSelector: string;
}

export const EATER_MAP_CARD_TEMPLATE: MapCardTemplate = {
  containerSelector: 'div.duet--article--map-card',
  slugAttribute: 'data-slug',
  addressSelector: 'span.hkfm3hg',
  descriptionSelector: 'p.duet--article--dangerously-set-cms-markup',
};

const NO_FIELDS: MapCardFields = { address: null, description: null };

/**
 * Address and description from the map card whose slug matches the listing URL fragment.
 * No card, no address element or an empty one all give null; description is null
 * only when no description paragraph exists.
 */
export function extractMapCardInfo(
  $: CheerioAPI,
  listing: Pick<RestaurantListing, 'url'>,
  template: MapCardTemplate = EATER_MAP_CARD_TEMPLATE,
): MapCardFields {
  const slug = slugFromListingUrl(listing.url);
  // Compare the attribute directly; slugs are not safe to splice into a selector.
  const card = $(template.containerSelector)
    .filter((_, el) => $(el).attr(template.slugAttribute) === slug)
    .first();
  if (!card.length) return { ...NO_FIELDS };

  const address = card.find(template.addressSelector).first().text().trim() || null;

  const paragraphs = card.find(template.descriptionSelector);
  const description = paragraphs.length
    ? paragraphs.map((_, p) => $(p).text().trim()).get().join(' ')
    : null;

  return { address, description };
}
