// HTML builders for map pages shaped like the Eater template.

export interface CardFixture {
  slug: string;
  address?: string;
  paragraphs?: string[];
}

export function jsonLdScript(payload: unknown): string {
  return `<script type="application/ld+json">${JSON.stringify(payload)}</script>`;
}

export function itemList(items: unknown[]): Record<string, unknown> {
  return {
    '@context': 'https://schema.org',
    '@type': 'ItemList',
    itemListElement: items.map((item, i) => ({ '@type': 'ListItem', position: i + 1, item })),
  };
}

export function mapCard({ slug, address, paragraphs = [] }: CardFixture): string {
  const addr = address === undefined ? '' : `<span class="hkfm3hg">${address}</span>`;
  const desc = paragraphs.map((p) => `<p class="duet--article--dangerously-set-cms-markup">${p}</p>`).join('');
  return `<div class="duet--article--map-card" data-slug="${slug}"><h2>card</h2>${addr}${desc}</div>`;
}

export function mapPage(items: unknown[], cards: CardFixture[]): string {
  return `<html><head>${jsonLdScript(itemList(items))}</head><body>${cards.map(mapCard).join('')}</body></html>`;
}

export const TEST_PAGE_URL = 'https://eater.com/test-article';

export const TEST_PAGE_HTML = mapPage(
  [{ '@type': 'Restaurant', name: 'Test Restaurant', url: 'https://eater.com/test-restaurant#test-slug' }],
  [{ slug: 'test-slug', address: '123 Test St, Test City, TC 12345', paragraphs: ['A fantastic test restaurant.'] }],
);
