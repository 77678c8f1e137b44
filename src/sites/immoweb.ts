import { immowebExtractor } from '../extractors/immoweb.js';
import type { PageVariant, SiteAdapter, SiteProfile } from './types.js';

const SEARCH_PATHS = ['/fr/recherche/', '/fr/recherche-avancee/'];
const SORT_RULE = { param: 'orderBy', value: 'newest', alternates: ['most_recent'] };

export const immowebProfile: SiteProfile = {
  id: 'immoweb',
  label: 'Immoweb',
  hosts: ['www.immoweb.be', 'immoweb.be'],
  pathAliases: [['/fr/recherche-avancee/', '/fr/recherche/']],
  paginationParams: ['page'],
  sort: SORT_RULE,
  defaultMode: 'paged',
};

/**
 * The search answers under two paths and two "newest" sort keys; a page
 * that comes back empty under one combination sometimes renders under another.
 */
function immowebPageVariants(canonicalUrl: string, page: number): PageVariant[] {
  const variants: PageVariant[] = [];
  const sortValues = [SORT_RULE.value, ...SORT_RULE.alternates];

  for (const order of sortValues) {
    for (const searchPath of SEARCH_PATHS) {
      const url = new URL(canonicalUrl);
      const current = SEARCH_PATHS.find(candidate => url.pathname.startsWith(candidate));
      if (current) {
        url.pathname = searchPath + url.pathname.slice(current.length);
      }
      url.searchParams.set(SORT_RULE.param, order);
      const referer = url.toString();
      url.searchParams.set('page', String(page));

      variants.push({
        name: `${order}|${searchPath.replace(/^\/|\/$/g, '')}`,
        url: url.toString(),
        referer,
      });
    }
  }

  return variants;
}

export const immowebAdapter: SiteAdapter = {
  profile: immowebProfile,
  extractor: immowebExtractor,
  pageVariants: immowebPageVariants,
};
