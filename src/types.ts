export type SiteId = 'immoweb' | 'immokh' | 'marjorietome';

export const SITE_IDS: readonly SiteId[] = ['immoweb', 'immokh', 'marjorietome'];

export type PropertyType =
  | 'house'
  | 'apartment'
  | 'penthouse'
  | 'duplex'
  | 'studio'
  | 'land'
  | 'office'
  | 'retail'
  | 'industrial'
  | 'garage';

export interface ListingItem {
  id: string;
  url: string;
  title: string;
  price: number | null;
  location: string;
  bedrooms: number | null;
  propertyType: PropertyType | null;
  publicationDate: Date | null;
}

/**
 * Subscriber-side predicates. Keys are written the way alert definitions
 * store them, since the set is also hashed into the target identity.
 */
export interface FilterSet {
  price_min?: number;
  price_max?: number;
  bedrooms_min?: number;
  property_types?: string[];
  cities?: string[];
  include_sold?: boolean;
}

export type CrawlMode = 'paged' | 'cursor' | 'scroll';

export interface CrawlTarget {
  siteId: SiteId;
  canonicalUrl: string;
  filterSet: FilterSet;
  identityKey: string;
}

export interface CrawlTargetDescriptor {
  site: SiteId;
  url?: string;
  email: string;
  pages: number;
  filters?: FilterSet;
  useInteractiveMode?: boolean;
  label?: string;
}

export type TransportVariant = 'query' | 'body';

export interface PageFetchResult {
  items: ListingItem[];
  transportUsed: TransportVariant | null;
  terminal: boolean;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export interface FetchError {
  kind: 'network' | 'timeout' | 'http';
  status: number | null;
  message: string;
}

// Persisted format, one file per site
export interface AlertRecord {
  created_at_utc: string;
  seen_codes: string[];
  last_run_utc: string;
  email: string;
}

export interface StateFile {
  alerts: Record<string, AlertRecord>;
}
