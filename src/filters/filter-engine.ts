import { classifyPropertyType } from '../extractors/base.js';
import type { FilterSet, ListingItem } from '../types.js';

export interface Predicate {
  name: string;
  test(item: ListingItem): boolean;
}

const SOLD_MARKERS = ['vendu', 'sous option', 'option', 'sold', 'under offer', 'verkocht'];

function haystack(item: ListingItem): string {
  return `${item.title} ${item.location}`.toLowerCase();
}

export function isSold(item: ListingItem): boolean {
  const text = haystack(item);
  return SOLD_MARKERS.some(marker => text.includes(marker));
}

function isEmptyFilterSet(filterSet: FilterSet): boolean {
  return Object.values(filterSet).every(value =>
    value === undefined || (Array.isArray(value) && value.length === 0));
}

/**
 * One predicate per configured filter. A field an active predicate needs
 * but the listing lacks makes the listing fail.
 */
export function buildPredicates(filterSet: FilterSet): Predicate[] {
  const predicates: Predicate[] = [];
  if (isEmptyFilterSet(filterSet)) return predicates;

  const { price_min, price_max, bedrooms_min } = filterSet;

  if (price_min !== undefined) {
    predicates.push({
      name: 'price_min',
      test: item => item.price !== null && item.price >= price_min,
    });
  }

  if (price_max !== undefined) {
    predicates.push({
      name: 'price_max',
      test: item => item.price !== null && item.price <= price_max,
    });
  }

  if (bedrooms_min !== undefined && bedrooms_min > 0) {
    predicates.push({
      name: 'bedrooms_min',
      test: item => item.bedrooms !== null && item.bedrooms >= bedrooms_min,
    });
  }

  const types = (filterSet.property_types ?? [])
    .map(type => classifyPropertyType(type) ?? type.trim().toLowerCase())
    .filter(type => type.length > 0);
  if (types.length) {
    predicates.push({
      name: 'property_types',
      test: item => {
        const type = item.propertyType ?? classifyPropertyType(haystack(item));
        return type !== null && types.includes(type);
      },
    });
  }

  const cities = (filterSet.cities ?? []).map(city => city.trim().toLowerCase()).filter(city => city.length > 0);
  if (cities.length) {
    predicates.push({
      name: 'cities',
      test: item => {
        const text = haystack(item);
        return cities.some(city => text.includes(city));
      },
    });
  }

  if (!filterSet.include_sold) {
    predicates.push({ name: 'exclude_sold', test: item => !isSold(item) });
  }

  return predicates;
}

export function matchesFilters(item: ListingItem, filterSet: FilterSet): boolean {
  return buildPredicates(filterSet).every(predicate => predicate.test(item));
}

export function applyFilters(items: ListingItem[], filterSet: FilterSet): ListingItem[] {
  const predicates = buildPredicates(filterSet);
  if (predicates.length === 0) return items;
  return items.filter(item => predicates.every(predicate => predicate.test(item)));
}
