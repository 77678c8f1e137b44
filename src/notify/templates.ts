import { getSiteAdapter } from '../sites/index.js';
import type { CrawlTarget, FilterSet, ListingItem } from '../types.js';

export interface AlertEmail {
  subject: string;
  text: string;
  html: string;
}

export function formatPrice(price: number | null): string {
  if (price === null || price <= 0) return '—';
  return `${String(price).replace(/\B(?=(\d{3})+(?!\d))/g, ' ')}€`;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

function describeFilters(filters: FilterSet): string[] {
  const parts: string[] = [];
  if (filters.price_min !== undefined || filters.price_max !== undefined) {
    parts.push(`Prix: ${filters.price_min ?? '—'} → ${filters.price_max ?? '—'}`);
  }
  if (filters.bedrooms_min !== undefined) parts.push(`≥ ${filters.bedrooms_min} ch.`);
  if (filters.property_types?.length) parts.push(`Types: ${filters.property_types.join(', ')}`);
  if (filters.cities?.length) parts.push(`Villes: ${filters.cities.join(', ')}`);
  if (filters.include_sold) parts.push('Vendus inclus');
  return parts;
}

function subjectFor(label: string, count: number, filters: FilterSet): string {
  const tail = [
    filters.cities?.length ? filters.cities.join(',') : '',
    filters.price_max !== undefined ? `≤${filters.price_max}€` : '',
  ].filter(Boolean).join(' · ');
  return `[Alerts][${label}] ${count} nouvelle(s) annonce(s)${tail ? ` — ${tail}` : ''}`;
}

function formatDate(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return `${pad(date.getUTCDate())}/${pad(date.getUTCMonth() + 1)}/${date.getUTCFullYear()} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())} UTC`;
}

const CELL = 'padding:10px 12px;border-bottom:1px solid #eee;color:#111827;font:14px/20px system-ui;';
const HEAD = 'padding:10px 12px;border-bottom:1px solid #e5e7eb;color:#374151;font:600 12px/16px system-ui;';
const BADGE =
  'display:inline-block;background:#eef2ff;color:#1e3a8a;border:1px solid #c7d2fe;border-radius:999px;padding:2px 8px;margin:0 6px 6px 0;font:12px/16px system-ui;';

function renderRow(item: ListingItem): string {
  return `<tr>
  <td style="${CELL}white-space:nowrap;">${escapeHtml(item.id)}</td>
  <td style="${CELL}">${escapeHtml(item.title || '—')}</td>
  <td style="${CELL}white-space:nowrap;">${escapeHtml(formatPrice(item.price))}</td>
  <td style="${CELL}">${escapeHtml(item.location || '—')}</td>
  <td style="${CELL}"><a href="${escapeHtml(item.url)}">Voir l’annonce</a></td>
</tr>`;
}

/**
 * Subject, plain-text and HTML bodies for one alert run.
 */
export function buildAlertEmail(target: CrawlTarget, newItems: ListingItem[], now: Date = new Date()): AlertEmail {
  const { label } = getSiteAdapter(target.siteId).profile;
  const filters = describeFilters(target.filterSet);
  const subject = subjectFor(label, newItems.length, target.filterSet);

  const textLines = [
    `Site : ${label}`,
    `Recherche : ${target.canonicalUrl}`,
    '',
    'Filtres :',
    ...(filters.length ? filters.map(part => `- ${part}`) : ['- aucun']),
    '',
    'Nouvelles annonces :',
  ];
  for (const item of newItems) {
    const title = item.title.trim();
    textLines.push(`- [${item.id}] ${formatPrice(item.price)} · ${item.location.trim() || '—'}${title ? ` · ${title}` : ''}`);
    textLines.push(`  ${item.url}`);
  }
  textLines.push('', `Voir la recherche : ${target.canonicalUrl}`);

  const badges = filters.map(part => `<span style="${BADGE}">${escapeHtml(part)}</span>`).join('');
  const html = `<!doctype html>
<html lang="fr">
<body style="margin:0;padding:0;background:#f8fafc;">
<div style="max-width:720px;margin:0 auto;padding:24px;font:14px/20px system-ui;color:#111827;">
<h1 style="font:600 16px/20px system-ui;">Alerte – ${escapeHtml(label)}</h1>
<p>${newItems.length} nouvelle(s) annonce(s) trouvée(s).</p>
<div>${badges}</div>
<p><a href="${escapeHtml(target.canonicalUrl)}">Voir la recherche</a></p>
<table width="100%" cellspacing="0" cellpadding="0" style="border-collapse:collapse;border:1px solid #e5e7eb;">
<thead><tr style="background:#f3f4f6;">
<th align="left" style="${HEAD}">ID</th><th align="left" style="${HEAD}">Titre</th><th align="left" style="${HEAD}">Prix</th><th align="left" style="${HEAD}">Localisation</th><th align="left" style="${HEAD}">Lien</th>
</tr></thead>
<tbody>
${newItems.map(renderRow).join('\n')}
</tbody>
</table>
<p style="color:#6b7280;font:12px/18px system-ui;">Généré le ${formatDate(now)}</p>
</div>
</body>
</html>`;

  return { subject, text: textLines.join('\n'), html };
}
