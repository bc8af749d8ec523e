import * as cheerio from 'cheerio';
import { describe, expect, it } from 'vitest';
import { extractMapCardInfo } from '../mapCard';
import type { MapCardTemplate } from '../mapCard';
import { mapCard } from './fixtures';

describe('extractMapCardInfo', () => {
  it('reads the card whose slug matches the listing URL fragment', () => {
    const $ = cheerio.load(
      mapCard({ slug: 'other', address: '9 Elsewhere Rd' }) +
        mapCard({ slug: 'pho-place', address: '  42 Broth Ave  ', paragraphs: ['Big bowls.'] }),
    );

    expect(extractMapCardInfo($, { url: 'https://eater.com/map#pho-place' })).toEqual({
      address: '42 Broth Ave',
      description: 'Big bowls.',
    });
  });

  it('joins several description paragraphs with a space', () => {
    const $ = cheerio.load(mapCard({ slug: 's', address: '1 Main St', paragraphs: [' First. ', 'Second.'] }));
    expect(extractMapCardInfo($, { url: 'https://eater.com/x#s' }).description).toBe('First. Second.');
  });

  it('gives a null description when the card has no paragraphs', () => {
    const $ = cheerio.load(mapCard({ slug: 's', address: '1 Main St' }));
    expect(extractMapCardInfo($, { url: 'https://eater.com/x#s' })).toEqual({ address: '1 Main St', description: null });
  });

  it('gives a null address when the address element is missing or blank', () => {
    const missing = cheerio.load(mapCard({ slug: 's', paragraphs: ['Only words.'] }));
    expect(extractMapCardInfo(missing, { url: 'https://eater.com/x#s' })).toEqual({
      address: null,
      description: 'Only words.',
    });

    const blank = cheerio.load(mapCard({ slug: 's', address: '   ' }));
    expect(extractMapCardInfo(blank, { url: 'https://eater.com/x#s' }).address).toBeNull();
  });

  it('returns nulls when no card matches', () => {
    const $ = cheerio.load(mapCard({ slug: 'present', address: '1 Main St' }));
    expect(extractMapCardInfo($, { url: 'https://eater.com/x#absent' })).toEqual({ address: null, description: null });
  });

  it('uses an empty slug for a URL without a fragment', () => {
    const $ = cheerio.load(mapCard({ slug: 'present', address: '1 Main St' }));
    expect(extractMapCardInfo($, { url: 'https://eater.com/x' })).toEqual({ address: null, description: null });
    expect(extractMapCardInfo($, {})).toEqual({ address: null, description: null });
  });

  it('matches slugs containing selector metacharacters', () => {
    const $ = cheerio.load(mapCard({ slug: 'cafe.bar:2', address: '7 Dot St' }));
    expect(extractMapCardInfo($, { url: 'https://eater.com/x#cafe.bar:2' }).address).toBe('7 Dot St');
  });

  it('follows a custom template', () => {
    const template: MapCardTemplate = {
      containerSelector: 'section.venue',
      slugAttribute: 'data-id',
      addressSelector: '.addr',
      descriptionSelector: '.blurb',
    };
    const $ = cheerio.load('<section class="venue" data-id="v1"><i class="addr">5 Oak St</i><p class="blurb">Cosy.</p></section>');
    expect(extractMapCardInfo($, { url: 'https://example.com/guide#v1' }, template)).toEqual({
      address: '5 Oak St',
      description: 'Cosy.',
    });
  });
});
