import { describe, expect, it } from 'vitest';
import { LEVEL, captureLogger } from '../../../__tests__/captureLogger';
import { silentLogger } from '../../../logger';
import { EaterAdapter, extractRestaurantData } from '../sites/eater';
import { TEST_PAGE_HTML, TEST_PAGE_URL, mapPage } from './fixtures';

describe('extractRestaurantData', () => {
  it('builds one record from a listing and its map card', () => {
    expect(extractRestaurantData(TEST_PAGE_HTML, TEST_PAGE_URL)).toEqual([
      {
        name: 'Test Restaurant',
        address: '123 Test St, Test City, TC 12345',
        description: 'A fantastic test restaurant.',
        source: 'eater',
        source_url: 'https://eater.com/test-restaurant#test-slug',
      },
    ]);
  });

  it('drops listings without an address and keeps page order', () => {
    const html = mapPage(
      [
        { '@type': 'Restaurant', name: 'First', url: 'https://eater.com/r#first' },
        { '@type': 'Restaurant', name: 'Ghost Kitchen', url: 'https://eater.com/r#ghost' },
        { '@type': 'Article', name: 'Intro' },
        { '@type': 'Restaurant', name: 'Third', url: 'https://eater.com/r#third' },
      ],
      [
        { slug: 'third', address: '3 Third St' },
        { slug: 'ghost', paragraphs: ['Delivery only.'] },
        { slug: 'first', address: '1 First St', paragraphs: ['Opened 1999.'] },
      ],
    );
    const { logger, entries } = captureLogger();

    const records = extractRestaurantData(html, 'https://sf.eater.com/maps/guide', logger);

    expect(records.map((r) => r.name)).toEqual(['First', 'Third']);
    expect(records[1]).toEqual({
      name: 'Third',
      description: null,
      source: 'eater',
      source_url: 'https://eater.com/r#third',
      address: '3 Third St',
    });
    const skipped = entries.filter((e) => e.msg === 'Skipping restaurant - no address found');
    expect(skipped).toHaveLength(1);
    expect(skipped[0]).toMatchObject({ level: LEVEL.warn, name: 'Ghost Kitchen', component: 'eater' });
    expect(entries.find((e) => e.msg === 'Extracted restaurants from JSON-LD data')).toMatchObject({ count: 2 });
  });

  it('returns an empty list when the page has no structured data', () => {
    expect(extractRestaurantData('<html><body><p>Nothing here</p></body></html>', TEST_PAGE_URL)).toEqual([]);
  });

  it('returns an empty list when no item is a restaurant', () => {
    const html = mapPage([{ '@type': 'Place', name: 'Park', url: 'https://eater.com/p#park' }], [{ slug: 'park', address: '1 Park Ln' }]);
    expect(extractRestaurantData(html, TEST_PAGE_URL)).toEqual([]);
  });
});

describe('EaterAdapter', () => {
  it('parses pages through the Eater template', () => {
    const adapter = new EaterAdapter();
    expect(adapter.getMeta()).toEqual({ name: 'Eater' });
    expect(adapter.parsePage(TEST_PAGE_HTML, TEST_PAGE_URL, silentLogger)).toHaveLength(1);
  });
});
