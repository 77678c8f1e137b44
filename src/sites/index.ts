import { InvalidTargetError } from '../errors.js';
import { SITE_IDS, type SiteId } from '../types.js';
import { immokhAdapter } from './immokh.js';
import { immowebAdapter } from './immoweb.js';
import { marjorietomeAdapter } from './marjorietome.js';
import type { SiteAdapter } from './types.js';

export * from './types.js';

const ADAPTERS: Record<SiteId, SiteAdapter> = {
  immoweb: immowebAdapter,
  immokh: immokhAdapter,
  marjorietome: marjorietomeAdapter,
};

export function isSiteId(value: string): value is SiteId {
  return SITE_IDS.some(id => id === value);
}

export function getSiteAdapter(siteId: string): SiteAdapter {
  const normalized = siteId.trim().toLowerCase();
  if (!isSiteId(normalized)) {
    throw new InvalidTargetError(`Unsupported site "${siteId}" (known: ${SITE_IDS.join(', ')})`);
  }
  return ADAPTERS[normalized];
}
