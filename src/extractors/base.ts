import type { ListingItem, PropertyType, SiteId } from '../types.js';

/**
 * Turns one raw page payload into listings. Implementations are pure:
 * same payload, same items, in document order, deduplicated by id.
 */
export interface Extractor {
  siteId: SiteId;
  /** Substrings whose presence means the payload carries listings. */
  itemMarkers: string[];
  /** Substrings the catalog prints when a search has no results. */
  emptyMarkers: string[];
  extract(payload: string): ListingItem[];
}

export function hasItemMarker(payload: string, extractor: Extractor): boolean {
  const lower = payload.toLowerCase();
  return extractor.itemMarkers.some(marker => lower.includes(marker.toLowerCase()));
}

export function hasEmptyMarker(payload: string, extractor: Extractor): boolean {
  const lower = payload.toLowerCase();
  return extractor.emptyMarkers.some(marker => lower.includes(marker.toLowerCase()));
}

/**
 * Payload is worth extracting: listing markers present, no "no results" page.
 */
export function isListingPayload(payload: string, extractor: Extractor): boolean {
  return hasItemMarker(payload, extractor) && !hasEmptyMarker(payload, extractor);
}

export function parsePrice(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? Math.trunc(value) : null;
  if (typeof value !== 'string') return null;
  const digits = value.replace(/[^\d]/g, '');
  return digits ? parseInt(digits, 10) : null;
}

export function parseBedrooms(text: string): number | null {
  const match = text.match(/(\d+)\s*(?:ch\.?|chambres?|slaapkamers?|kamers?|bedrooms?)(?![a-z])/i);
  return match ? parseInt(match[1], 10) : null;
}

/**
 * Accepts ISO-8601 strings (UTC assumed without an offset) and epoch
 * seconds or milliseconds.
 */
export function parsePublicationDate(value: unknown): Date | null {
  if (value === null || value === undefined || value === '') return null;

  const text = String(value).trim();
  if (/^\d+$/.test(text)) {
    const epoch = parseInt(text, 10);
    const date = new Date(epoch > 10_000_000_000 ? epoch : epoch * 1000);
    return Number.isNaN(date.getTime()) ? null : date;
  }

  if (!/^\d{4}-\d{2}-\d{2}/.test(text)) return null;
  const hasOffset = /(?:Z|[+-]\d{2}:?\d{2})$/i.test(text);
  const withOffset = hasOffset || !text.includes('T') ? text : `${text}Z`;
  const date = new Date(withOffset);
  return Number.isNaN(date.getTime()) ? null : date;
}

// Specific kinds first: "penthouse" contains "house".
const PROPERTY_TYPE_ALIASES: Array<[PropertyType, string[]]> = [
  ['penthouse', ['penthouse']],
  ['duplex', ['duplex', 'triplex']],
  ['studio', ['studio', 'kot']],
  ['land', ['terrain', 'terrain à bâtir', 'terrain a batir', 'grond', 'bouwgrond', 'land']],
  ['office', ['bureau', 'office', 'kantoor']],
  ['retail', ['commerce', 'rez-commercial', 'retail', 'shop', 'handelspand']],
  ['industrial', ['industriel', 'industrie', 'entrepôt', 'entrepot', 'warehouse']],
  ['garage', ['garage', 'parking', 'box']],
  ['house', ['maison', 'villa', 'house', 'woning', 'fermette', 'bungalow']],
  ['apartment', ['appartement', 'apartment', 'flat', 'appart']],
];

function containsWord(text: string, word: string): boolean {
  let from = 0;
  for (;;) {
    const index = text.indexOf(word, from);
    if (index < 0) return false;
    const before = index === 0 ? '' : text[index - 1];
    const after = text[index + word.length] ?? '';
    if (!/[a-zà-ÿ]/.test(before) && !/[a-zà-ÿ]/.test(after)) return true;
    from = index + 1;
  }
}

export function classifyPropertyType(text: string): PropertyType | null {
  const lower = text.toLowerCase();
  for (const [type, aliases] of PROPERTY_TYPE_ALIASES) {
    if (aliases.some(alias => containsWord(lower, alias))) return type;
  }
  return null;
}

export function absoluteUrl(href: string, base: string): string | null {
  try {
    return new URL(href.trim(), base).toString();
  } catch {
    return null;
  }
}

export function normalizeText(value: string | null | undefined): string {
  return value ? value.replace(/\s+/g, ' ').trim() : '';
}

export function emptyListing(id: string, url: string): ListingItem {
  return {
    id,
    url,
    title: '',
    price: null,
    location: '',
    bedrooms: null,
    propertyType: null,
    publicationDate: null,
  };
}
