import { createHash } from 'crypto';
import { load } from 'cheerio';
import type { ListingItem } from '../types.js';
import { absoluteUrl, classifyPropertyType, normalizeText, parseBedrooms, parsePrice, type Extractor } from './base.js';

const SITE_HOST = 'immotoma.be';
const SITE_ORIGIN = `https://www.${SITE_HOST}`;
const DETAIL_SEGMENTS = ['/property/', '/biens/', '/bien/'];
const SLUG_PATTERN = /(?:\/property\/|\/biens\/|\/bien\/)([^/?#]+)/i;
const CARD_CLIMB_DEPTH = 4;

/**
 * WordPress listings carry no numeric id: the detail slug is used, or a
 * hash of the URL when the slug is missing.
 */
export function stableIdFromUrl(url: string): string {
  const match = url.match(SLUG_PATTERN);
  if (match) return match[1].toLowerCase();
  return createHash('md5').update(url).digest('hex');
}

export function extractSearchResults(html: string): ListingItem[] {
  const $ = load(html);
  const found = new Map<string, ListingItem>();

  $('a[href]').each((_, element) => {
    const anchor = $(element);
    const url = absoluteUrl(anchor.attr('href') ?? '', SITE_ORIGIN);
    if (!url || !url.includes(SITE_HOST)) return;
    if (!DETAIL_SEGMENTS.some(segment => url.includes(segment))) return;

    const id = stableIdFromUrl(url);
    if (found.has(id)) return;

    const parents = anchor.parents();
    const card = parents.length ? parents.eq(Math.min(CARD_CLIMB_DEPTH, parents.length) - 1) : anchor;

    let title = normalizeText(anchor.text());
    if (!title) {
      title = normalizeText(card.find('h2, h3, h4').first().text());
    }

    let price: number | null = null;
    card.find('span, div').filter((_, node) => $(node).children().length === 0).each((_, node) => {
      const text = normalizeText($(node).text()).toLowerCase();
      if (text.includes('€') || text.includes(' eur') || text.includes('euro')) {
        price = parsePrice(text);
        return false;
      }
      return undefined;
    });

    const cardText = normalizeText(card.text());
    found.set(id, {
      id,
      url,
      title,
      price,
      location: '',
      bedrooms: parseBedrooms(cardText),
      propertyType: classifyPropertyType(title),
      publicationDate: null,
    });
  });

  return [...found.values()];
}

export const marjorietomeExtractor: Extractor = {
  siteId: 'marjorietome',
  itemMarkers: DETAIL_SEGMENTS,
  emptyMarkers: [],
  extract: extractSearchResults,
};
