import { load } from 'cheerio';
import type { ListingItem } from '../types.js';
import {
  absoluteUrl,
  classifyPropertyType,
  normalizeText,
  parseBedrooms,
  parsePrice,
  parsePublicationDate,
  type Extractor,
} from './base.js';

const IMMOWEB_ORIGIN = 'https://www.immoweb.be';
const MAX_JSON_DEPTH = 48;
const CARD_CLIMB_DEPTH = 4;

const ID_KEYS = ['id', 'propertyId', 'code', 'nid'];
const URL_KEYS = ['url', 'detailUrl', 'propertyUrl', 'link'];
const TITLE_KEYS = ['title', 'propertyTitle', 'heading'];
const PRICE_KEYS = ['price', 'priceValue', 'salePrice'];
const LOCATION_KEYS = ['city', 'location', 'propertyLocation'];
const DATE_KEYS = ['publicationDate', 'postedAt', 'creationDate', 'date', 'updateDate'];
const BEDROOM_KEYS = ['bedroomCount', 'bedrooms'];
const TYPE_KEYS = ['type', 'propertyType', 'subtype'];

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstValue(raw: JsonRecord, keys: string[]): unknown {
  for (const key of keys) {
    const value = raw[key];
    if (value !== undefined && value !== null && value !== '' && value !== 0) return value;
  }
  return undefined;
}

function asText(value: unknown): string {
  return typeof value === 'string' ? normalizeText(value) : '';
}

function itemFromRecord(raw: JsonRecord): ListingItem | null {
  const id = firstValue(raw, ID_KEYS);
  const url = firstValue(raw, URL_KEYS);
  if (typeof id !== 'string' && typeof id !== 'number') return null;
  if (typeof url !== 'string' || !url.includes('immoweb.be')) return null;

  const title = asText(firstValue(raw, TITLE_KEYS));
  const bedrooms = firstValue(raw, BEDROOM_KEYS);
  const type = firstValue(raw, TYPE_KEYS);

  return {
    id: String(id),
    url,
    title,
    price: parsePrice(firstValue(raw, PRICE_KEYS)),
    location: asText(firstValue(raw, LOCATION_KEYS)),
    bedrooms: typeof bedrooms === 'number' ? bedrooms : null,
    propertyType: classifyPropertyType(typeof type === 'string' ? type : title),
    publicationDate: parsePublicationDate(firstValue(raw, DATE_KEYS)),
  };
}

/**
 * Depth-first walk over the Next.js page data, registering every object
 * that looks like a listing. Depth is capped.
 */
export function extractFromNextData(nextData: unknown): ListingItem[] {
  const found = new Map<string, ListingItem>();

  const walk = (node: unknown, depth: number): void => {
    if (depth > MAX_JSON_DEPTH) return;
    if (Array.isArray(node)) {
      for (const child of node) walk(child, depth + 1);
      return;
    }
    if (!isRecord(node)) return;

    const item = itemFromRecord(node);
    if (item && !found.has(item.id)) found.set(item.id, item);
    for (const child of Object.values(node)) walk(child, depth + 1);
  };

  walk(nextData, 0);
  return [...found.values()];
}

export function extractFromAnchors(html: string): ListingItem[] {
  const $ = load(html);
  const found = new Map<string, ListingItem>();

  $('a[href]').each((_, element) => {
    const anchor = $(element);
    const url = absoluteUrl(anchor.attr('href') ?? '', IMMOWEB_ORIGIN);
    if (!url || !url.includes('immoweb.be') || !url.includes('/annonce/')) return;

    const idMatch = url.match(/\/(\d{5,})/);
    if (!idMatch || found.has(idMatch[1])) return;

    const parents = anchor.parents();
    const card = parents.length ? parents.eq(Math.min(CARD_CLIMB_DEPTH, parents.length) - 1) : anchor;

    // Leaf nodes only: a wrapper's text runs every figure of the card together.
    let price: number | null = null;
    card.find('span, div').filter((_, node) => $(node).children().length === 0).each((_, node) => {
      const text = normalizeText($(node).text()).toLowerCase();
      if (text.includes('€') || text.includes('eur')) {
        price = parsePrice(text);
        return false;
      }
      return undefined;
    });

    let location = '';
    card.find('span, div').filter((_, node) => $(node).children().length === 0).each((_, node) => {
      const text = normalizeText($(node).text());
      if (/[A-Za-zÀ-ÿ-]+\s*\(\d{4}\)/.test(text) || /\d{4}\s+[A-Za-zÀ-ÿ-]+/.test(text)) {
        location = text;
        return false;
      }
      return undefined;
    });

    const title = normalizeText(anchor.text());
    const cardText = normalizeText(card.text());
    found.set(idMatch[1], {
      id: idMatch[1],
      url,
      title,
      price,
      location,
      bedrooms: parseBedrooms(cardText),
      propertyType: classifyPropertyType(title),
      publicationDate: null,
    });
  });

  return [...found.values()];
}

export function readNextData(html: string): unknown {
  const $ = load(html);
  const node = $('script#__NEXT_DATA__').first();
  if (!node.length) return null;
  try {
    return JSON.parse(node.text().trim());
  } catch {
    return null;
  }
}

export const immowebExtractor: Extractor = {
  siteId: 'immoweb',
  itemMarkers: ['__NEXT_DATA__', '/annonce/'],
  emptyMarkers: [],
  extract(payload: string): ListingItem[] {
    const nextData = readNextData(payload);
    if (nextData !== null) {
      const items = extractFromNextData(nextData);
      if (items.length > 0) return items;
    }
    return extractFromAnchors(payload);
  },
};
