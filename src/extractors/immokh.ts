import { load } from 'cheerio';
import type { ListingItem } from '../types.js';
import {
  absoluteUrl,
  classifyPropertyType,
  normalizeText,
  parseBedrooms,
  parsePrice,
  type Extractor,
} from './base.js';

export const IMMOKH_ORIGIN = 'https://www.immo-kh.be';

const DETAIL_PATH = '/fr/bien/';
const ID_PATTERN = /\/(\d{5,})(?:$|[/?#])/;
const BAD_HREF_BITS = ['infinitescroll', 'javascript:', 'mailto:', 'tel:', '#'];
const CARD_CLIMB_DEPTH = 5;

function isBadHref(href: string): boolean {
  const lower = href.toLowerCase();
  return BAD_HREF_BITS.some(bit => lower.includes(bit));
}

/**
 * Estate cards from a list page or an InfiniteScroll fragment.
 */
export function extractEstateCards(html: string): ListingItem[] {
  const $ = load(html);
  const strict = $(`a.estate-card[href*="${DETAIL_PATH}"]`);
  const anchors = strict.length ? strict : $(`a[href*="${DETAIL_PATH}"]`);
  const found = new Map<string, ListingItem>();

  anchors.each((_, element) => {
    const anchor = $(element);
    const href = (anchor.attr('href') ?? '').trim();
    if (!href || isBadHref(href)) return;

    const idMatch = href.match(ID_PATTERN);
    if (!idMatch || found.has(idMatch[1])) return;
    const url = absoluteUrl(href, IMMOKH_ORIGIN);
    if (!url) return;

    const parents = anchor.parents();
    const card = anchor.is('.estate-card') || !parents.length
      ? anchor
      : parents.eq(Math.min(CARD_CLIMB_DEPTH, parents.length) - 1);

    let title = normalizeText(anchor.text());
    if (!title) {
      title = normalizeText(card.find('.estate-card__text, .estate-card__text-details, .entry-title, [class*=title]').first().text());
    }

    let price = parsePrice(card.find('span.estate-card__text-details-price').first().text());
    if (price === null) {
      card.find('div, span, p, strong, b').filter((_, node) => $(node).children().length === 0).each((_, node) => {
        const text = normalizeText($(node).text());
        if (text.includes('€') || text.toLowerCase().includes('eur')) {
          price = parsePrice(text);
          if (price !== null) return false;
        }
        return undefined;
      });
    }

    const cardText = normalizeText(card.text());
    found.set(idMatch[1], {
      id: idMatch[1],
      url,
      title,
      price,
      location: normalizeText(card.find('.estate-card__text-details-location').first().text()),
      bedrooms: parseBedrooms(cardText),
      propertyType: classifyPropertyType(`${title} ${cardText}`),
      publicationDate: null,
    });
  });

  return [...found.values()];
}

export const immokhExtractor: Extractor = {
  siteId: 'immokh',
  itemMarkers: [DETAIL_PATH, 'class="estate-card'],
  emptyMarkers: ['search404.png', 'aucune de nos propriétés'],
  extract: extractEstateCards,
};
