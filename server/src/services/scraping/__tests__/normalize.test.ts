import { describe, expect, it } from 'vitest';
import { buildRestaurantRecord, recordToRestaurantInput } from '../normalize';

describe('buildRestaurantRecord', () => {
  it('takes provenance from the page, not the listing', () => {
    const record = buildRestaurantRecord(
      { name: 'Noodle Bar', url: 'https://noodlebar.example.com/#noodle-bar' },
      '8 Canal St',
      'Hand-pulled noodles.',
      'https://ny.eater.com/maps/best-noodles',
    );

    expect(record).toEqual({
      name: 'Noodle Bar',
      description: 'Hand-pulled noodles.',
      source: 'eater',
      source_url: 'https://noodlebar.example.com/#noodle-bar',
      address: '8 Canal St',
    });
  });

  it('fills absent listing fields with null and an empty URL', () => {
    expect(buildRestaurantRecord({}, '1 Main St', null, 'https://eater.com/x')).toEqual({
      name: null,
      description: null,
      source: 'eater',
      source_url: '',
      address: '1 Main St',
    });
  });

  it('treats null listing fields like absent ones', () => {
    expect(buildRestaurantRecord({ name: null, url: null }, '1 Main St', null, 'https://eater.com/x')).toMatchObject({
      name: null,
      source_url: '',
    });
  });
});

describe('recordToRestaurantInput', () => {
  it('maps every record field onto the store input', () => {
    const record = buildRestaurantRecord({ name: 'A', url: 'https://eater.com/a#a' }, '1 A St', null, 'https://eater.com/x');
    expect(recordToRestaurantInput(record)).toEqual({
      name: 'A',
      description: null,
      address: '1 A St',
      source: 'eater',
      source_url: 'https://eater.com/a#a',
    });
  });
});
