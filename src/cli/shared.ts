import { readFileSync } from 'fs';
import type { Config } from '../config.js';
import { CrawlOrchestrator, type TargetOutcome, type TargetStatus } from '../crawler/orchestrator.js';
import { InvalidTargetError } from '../errors.js';
import { FilterSetSchema } from '../filters/schema.js';
import { HttpClient } from '../http/client.js';
import { ConsoleNotifier } from '../notify/console.js';
import { EmailNotifier } from '../notify/email.js';
import type { Notifier } from '../notify/notifier.js';
import { isSiteId } from '../sites/index.js';
import type { FilterSet, SiteId } from '../types.js';

export function parseIntOption(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new Error(`Invalid ${name}: ${value}`);
  }
  return parsed;
}

export function parseSite(value: string): SiteId {
  const site = value.trim().toLowerCase();
  if (!isSiteId(site)) {
    throw new InvalidTargetError(`Unsupported site "${value}"`);
  }
  return site;
}

/**
 * Filters from --filters (inline JSON) or --filters-file; inline wins.
 */
export function readFiltersOption(inline: string | undefined, file: string | undefined): FilterSet {
  const raw = inline ?? (file ? readFileSync(file, 'utf-8') : undefined);
  if (raw === undefined) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Filters are not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return FilterSetSchema.parse(parsed);
}

export function createNotifier(config: Config): Notifier {
  return config.notify.channel === 'console' ? new ConsoleNotifier() : new EmailNotifier();
}

export function createOrchestrator(config: Config): CrawlOrchestrator {
  return new CrawlOrchestrator({
    config,
    http: new HttpClient({ config: config.http }),
    notifier: createNotifier(config),
  });
}

const STATUS_ICONS: Record<TargetStatus, string> = {
  seeded: '🌱',
  notified: '📧',
  unchanged: '✔️ ',
  empty: '∅ ',
  invalid: '⛔',
  failed: '❌',
};

export function printOutcome(outcome: TargetOutcome): void {
  const seconds = (outcome.durationMs / 1000).toFixed(1);
  console.log(`${STATUS_ICONS[outcome.status]} ${outcome.status.padEnd(9)} ${outcome.label}`);
  if (outcome.identityKey) {
    console.log(`   key: ${outcome.identityKey}`);
  }
  if (outcome.mode) {
    console.log(
      `   ${outcome.mode} (${outcome.terminalReason ?? '-'}): collected=${outcome.collected} matched=${outcome.matched} new=${outcome.newItems.length}${outcome.republished ? ` republished=${outcome.republished}` : ''} in ${seconds}s`,
    );
  }
  if (outcome.error) {
    console.log(`   ${outcome.error.code ?? 'ERROR'}: ${outcome.error.message}`);
  }
}
