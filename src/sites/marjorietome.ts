import { marjorietomeExtractor } from '../extractors/marjorietome.js';
import type { PageVariant, SiteAdapter, SiteProfile } from './types.js';

export const marjorietomeProfile: SiteProfile = {
  id: 'marjorietome',
  label: 'ImmoToma',
  hosts: ['immotoma.be', 'www.immotoma.be'],
  pathAliases: [],
  paginationParams: ['paged'],
  defaultMode: 'paged',
};

// WordPress pagination: ?paged=N
function marjorietomePageVariants(canonicalUrl: string, page: number): PageVariant[] {
  const url = new URL(canonicalUrl);
  url.searchParams.set('paged', String(Math.max(1, page)));
  return [{ name: 'paged', url: url.toString(), referer: canonicalUrl }];
}

export const marjorietomeAdapter: SiteAdapter = {
  profile: marjorietomeProfile,
  extractor: marjorietomeExtractor,
  pageVariants: marjorietomePageVariants,
};
