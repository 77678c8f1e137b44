import { createHash } from 'crypto';
import { InvalidTargetError } from '../errors.js';
import { getSiteAdapter, type SiteProfile } from '../sites/index.js';
import type { CrawlTarget, FilterSet } from '../types.js';

export interface CanonicalTarget {
  identityKey: string;
  canonicalUrl: string;
  target: CrawlTarget;
}

function shortHash(value: string): string {
  return createHash('sha1').update(value).digest('hex').slice(0, 16);
}

/**
 * Drops unset keys, trims and sorts list values so that two filter sets
 * meaning the same thing serialize the same way.
 */
export function normalizeFilterSet(filterSet: FilterSet = {}): FilterSet {
  const normalized: FilterSet = {};

  if (filterSet.price_min !== undefined) normalized.price_min = filterSet.price_min;
  if (filterSet.price_max !== undefined) normalized.price_max = filterSet.price_max;
  if (filterSet.bedrooms_min !== undefined) normalized.bedrooms_min = filterSet.bedrooms_min;
  if (filterSet.include_sold === true) normalized.include_sold = true;

  const types = normalizeList(filterSet.property_types);
  if (types.length) normalized.property_types = types;
  const cities = normalizeList(filterSet.cities);
  if (cities.length) normalized.cities = cities;

  return normalized;
}

function normalizeList(values: string[] | undefined): string[] {
  if (!values) return [];
  const cleaned = values.map(value => value.trim().toLowerCase()).filter(value => value.length > 0);
  return [...new Set(cleaned)].sort();
}

export function stableFilterJson(filterSet: FilterSet): string {
  const normalized = normalizeFilterSet(filterSet);
  const keys = Object.keys(normalized).sort();
  return JSON.stringify(normalized, keys);
}

function parseTargetUrl(rawUrl: string, profile: SiteProfile): URL {
  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch (error) {
    throw new InvalidTargetError(`Unparseable URL for ${profile.label}: ${rawUrl}`, { cause: error });
  }

  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new InvalidTargetError(`Unsupported scheme ${url.protocol} in ${rawUrl}`);
  }
  if (!profile.hosts.includes(url.hostname.toLowerCase())) {
    throw new InvalidTargetError(`${url.hostname} is not a ${profile.label} host (${profile.hosts.join(', ')})`);
  }
  return url;
}

function canonicalPath(pathname: string, profile: SiteProfile): string {
  if (profile.fixedPath) return profile.fixedPath;
  for (const [from, to] of profile.pathAliases) {
    if (pathname.startsWith(from)) return to + pathname.slice(from.length);
  }
  return pathname;
}

function canonicalQuery(url: URL, profile: SiteProfile): string {
  if (profile.fixedPath) return '';

  const dropped = new Set(profile.paginationParams.map(param => param.toLowerCase()));
  const sortParam = profile.sort?.param.toLowerCase();
  const pairs: Array<[string, string]> = [];

  for (const [name, value] of url.searchParams) {
    const lower = name.toLowerCase();
    if (dropped.has(lower) || lower === sortParam) continue;
    pairs.push([name, value]);
  }
  if (profile.sort) pairs.push([profile.sort.param, profile.sort.value]);

  pairs.sort(([nameA, valueA], [nameB, valueB]) => {
    if (nameA !== nameB) return nameA < nameB ? -1 : 1;
    if (valueA !== valueB) return valueA < valueB ? -1 : 1;
    return 0;
  });

  return new URLSearchParams(pairs).toString();
}

/**
 * Maps a raw search definition to its canonical URL and identity key.
 * Pagination markers, parameter order, host casing and the requested sort
 * order do not change the result; applying it twice changes nothing.
 */
export function canonicalize(siteId: string, rawUrl: string | undefined, filterSet: FilterSet = {}): CanonicalTarget {
  const adapter = getSiteAdapter(siteId);
  const { profile } = adapter;

  const input = rawUrl?.trim() || profile.defaultUrl;
  if (!input) {
    throw new InvalidTargetError(`A search URL is required for ${profile.label}`);
  }

  const url = parseTargetUrl(input, profile);
  const query = canonicalQuery(url, profile);
  const canonicalUrl = `https://${profile.hosts[0]}${canonicalPath(url.pathname, profile)}${query ? `?${query}` : ''}`;

  const normalizedFilters = normalizeFilterSet(filterSet);
  const identityKey = `${profile.id}:${shortHash(canonicalUrl)}:${shortHash(stableFilterJson(normalizedFilters))}`;

  return {
    identityKey,
    canonicalUrl,
    target: {
      siteId: profile.id,
      canonicalUrl,
      filterSet: normalizedFilters,
      identityKey,
    },
  };
}
