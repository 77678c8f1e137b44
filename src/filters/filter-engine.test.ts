import { applyFilters, buildPredicates, isSold, matchesFilters } from './filter-engine.js';
import { FilterSetSchema } from './schema.js';
import type { ListingItem } from '../types.js';

function listing(overrides: Partial<ListingItem> = {}): ListingItem {
  return {
    id: '1001',
    url: 'https://www.immo-kh.be/fr/bien/1001',
    title: 'Maison 3 chambres',
    price: 250000,
    location: 'Liège',
    bedrooms: 2,
    propertyType: 'house',
    publicationDate: null,
    ...overrides,
  };
}

describe('Filter engine', () => {
  describe('buildPredicates', () => {
    it('should build nothing for an empty filter set', () => {
      expect(buildPredicates({})).toEqual([]);
      expect(buildPredicates({ cities: [], property_types: [] })).toEqual([]);
    });

    it('should add sold exclusion to any non-empty set', () => {
      const names = buildPredicates({ price_max: 300000 }).map(p => p.name);
      expect(names).toEqual(['price_max', 'exclude_sold']);
    });

    it('should not add sold exclusion when include_sold is set', () => {
      const names = buildPredicates({ price_max: 300000, include_sold: true }).map(p => p.name);
      expect(names).toEqual(['price_max']);
    });

    it('should skip a zero bedroom minimum', () => {
      const names = buildPredicates({ bedrooms_min: 0 }).map(p => p.name);
      expect(names).toEqual(['exclude_sold']);
    });
  });

  describe('matchesFilters', () => {
    it('should exclude a listing above the price ceiling', () => {
      expect(matchesFilters(listing(), { price_max: 200000 })).toBe(false);
    });

    it('should include a listing that satisfies every predicate', () => {
      expect(matchesFilters(listing(), { price_max: 300000, bedrooms_min: 2 })).toBe(true);
    });

    it('should fail price predicates when the price is unknown', () => {
      expect(matchesFilters(listing({ price: null }), { price_min: 100000 })).toBe(false);
      expect(matchesFilters(listing({ price: null }), { price_max: 500000 })).toBe(false);
    });

    it('should fail an active bedroom minimum when bedrooms are unknown', () => {
      expect(matchesFilters(listing({ bedrooms: null }), { bedrooms_min: 1 })).toBe(false);
      expect(matchesFilters(listing({ bedrooms: null }), { bedrooms_min: 0 })).toBe(true);
    });

    it('should match property types through their aliases', () => {
      expect(matchesFilters(listing(), { property_types: ['maison'] })).toBe(true);
      expect(matchesFilters(listing(), { property_types: ['appartement'] })).toBe(false);
    });

    it('should classify from the title when the listing has no type', () => {
      const untyped = listing({ propertyType: null, title: 'Appartement lumineux' });
      expect(matchesFilters(untyped, { property_types: ['apartment'] })).toBe(true);

      const unknown = listing({ propertyType: null, title: 'Bien rare' });
      expect(matchesFilters(unknown, { property_types: ['apartment'] })).toBe(false);
    });

    it('should match cities case-insensitively against title and location', () => {
      expect(matchesFilters(listing(), { cities: ['LIÈGE'] })).toBe(true);
      expect(matchesFilters(listing(), { cities: ['namur', 'liège'] })).toBe(true);
      expect(matchesFilters(listing(), { cities: ['namur'] })).toBe(false);
    });

    it('should exclude sold listings unless asked to keep them', () => {
      const sold = listing({ title: 'Maison VENDU' });
      expect(matchesFilters(sold, { cities: ['liège'] })).toBe(false);
      expect(matchesFilters(sold, { cities: ['liège'], include_sold: true })).toBe(true);
      expect(matchesFilters(sold, {})).toBe(true);
    });
  });

  describe('applyFilters', () => {
    it('should keep order and drop failing listings', () => {
      const items = [
        listing({ id: 'a', price: 150000 }),
        listing({ id: 'b', price: 350000 }),
        listing({ id: 'c', price: 190000 }),
      ];
      expect(applyFilters(items, { price_max: 200000 }).map(item => item.id)).toEqual(['a', 'c']);
    });

    it('should return every listing for an empty filter set', () => {
      const items = [listing({ id: 'a' }), listing({ id: 'b', title: 'Sous option' })];
      expect(applyFilters(items, {})).toBe(items);
    });
  });

  it('should detect sold markers', () => {
    expect(isSold(listing({ title: 'Villa sous option' }))).toBe(true);
    expect(isSold(listing({ location: 'Gent - verkocht' }))).toBe(true);
    expect(isSold(listing())).toBe(false);
  });

  it('should validate filter sets', () => {
    expect(FilterSetSchema.safeParse({ price_max: 300000, cities: ['Liège'] }).success).toBe(true);
    expect(FilterSetSchema.safeParse({ bedrooms_min: 1.5 }).success).toBe(false);
    expect(FilterSetSchema.safeParse({ price_min: 'cheap' }).success).toBe(false);
  });
});
