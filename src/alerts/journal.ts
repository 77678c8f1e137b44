import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { describeError } from '../errors.js';
import { FilterSetSchema } from '../filters/schema.js';
import { createLogger, type Logger } from '../logger.js';
import { canonicalize } from '../targets/canonicalize.js';
import type { CrawlTargetDescriptor } from '../types.js';

const AlertFieldsSchema = z.object({
  site: z.string().optional(),
  url: z.string().optional(),
  email: z.string().optional(),
  pages: z.union([z.number(), z.string()]).optional(),
  filters: FilterSetSchema.optional(),
  label: z.string().optional(),
  useInteractiveMode: z.boolean().optional(),
  interactive: z.boolean().optional(),
});

type AlertFields = z.infer<typeof AlertFieldsSchema>;

const EventRowSchema = z.object({
  ts: z.string().optional(),
  action: z.string(),
  alert: AlertFieldsSchema,
});

const ACTIONS = ['add', 'update', 'delete'] as const;
type JournalAction = (typeof ACTIONS)[number];

function isAction(value: string): value is JournalAction {
  return ACTIONS.some(action => action === value);
}

interface Entry {
  canonicalUrl: string;
  descriptor: CrawlTargetDescriptor;
}

function toPages(raw: AlertFields['pages'], defaultPages: number): number {
  const value = typeof raw === 'string' ? parseInt(raw, 10) : raw;
  return value !== undefined && Number.isFinite(value) && value > 0 ? Math.floor(value) : defaultPages;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Replays journal rows into the alerts currently in force, keyed by
 * identity key; the last add or update for a key wins.
 *
 * Two row shapes are accepted: legacy `{site?, url, email, pages?}` rows,
 * and events `{ts, action, alert}`. A delete with filters removes that exact
 * alert; without filters it removes every alert on the same search.
 */
export function reduceAlertEvents(
  rows: unknown[],
  defaultPages: number,
  logger: Logger = createLogger('Journal'),
): CrawlTargetDescriptor[] {
  const state = new Map<string, Entry>();

  rows.forEach((row, index) => {
    const line = index + 1;
    if (!isRecord(row)) {
      logger.warn(`Line ${line}: not a JSON object, skipped`);
      return;
    }

    let action: JournalAction = 'add';
    let fields: AlertFields;

    if ('action' in row && 'alert' in row) {
      const parsed = EventRowSchema.safeParse(row);
      if (!parsed.success) {
        logger.warn(`Line ${line}: malformed event (${parsed.error.issues[0]?.message ?? 'invalid'}), skipped`);
        return;
      }
      const name = parsed.data.action.trim().toLowerCase();
      if (!isAction(name)) {
        logger.warn(`Line ${line}: unknown action "${parsed.data.action}", skipped`);
        return;
      }
      action = name;
      fields = parsed.data.alert;
    } else {
      const parsed = AlertFieldsSchema.safeParse(row);
      if (!parsed.success) {
        logger.warn(`Line ${line}: malformed alert (${parsed.error.issues[0]?.message ?? 'invalid'}), skipped`);
        return;
      }
      fields = parsed.data;
    }

    const site = fields.site?.trim().toLowerCase() || 'immoweb';
    const url = fields.url?.trim() ?? '';
    const email = fields.email?.trim() ?? '';

    if (!url) {
      logger.warn(`Line ${line}: ${action} without url, skipped`);
      return;
    }
    if (action !== 'delete' && !email) {
      logger.warn(`Line ${line}: ${action} without email, skipped`);
      return;
    }

    let canonical: ReturnType<typeof canonicalize>;
    try {
      canonical = canonicalize(site, url, fields.filters ?? {});
    } catch (error) {
      logger.warn(`Line ${line}: ${describeError(error)}, skipped`);
      return;
    }
    const { target } = canonical;

    if (action === 'delete') {
      if (fields.filters) {
        state.delete(target.identityKey);
        return;
      }
      for (const [key, entry] of state) {
        if (entry.descriptor.site === target.siteId && entry.canonicalUrl === target.canonicalUrl) {
          state.delete(key);
        }
      }
      return;
    }

    const descriptor: CrawlTargetDescriptor = {
      site: target.siteId,
      url: target.canonicalUrl,
      email,
      pages: toPages(fields.pages, defaultPages),
    };
    if (Object.keys(target.filterSet).length) descriptor.filters = target.filterSet;
    if (fields.label) descriptor.label = fields.label;
    if (fields.useInteractiveMode || fields.interactive) descriptor.useInteractiveMode = true;

    state.set(target.identityKey, { canonicalUrl: target.canonicalUrl, descriptor });
  });

  return [...state.values()].map(entry => entry.descriptor);
}

/**
 * Reads a JSONL alert journal. Blank lines are ignored, unparseable lines
 * are logged and skipped.
 */
export function readAlertJournal(
  journalPath: string,
  defaultPages: number,
  logger: Logger = createLogger('Journal'),
): CrawlTargetDescriptor[] {
  if (!existsSync(journalPath)) {
    throw new Error(`Alert journal not found: ${journalPath}`);
  }

  const rows: unknown[] = [];
  readFileSync(journalPath, 'utf-8').split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (!line) return;
    try {
      rows.push(JSON.parse(line));
    } catch (error) {
      logger.error(`Line ${index + 1}: invalid JSON (${error instanceof Error ? error.message : String(error)}), skipped`);
    }
  });

  const descriptors = reduceAlertEvents(rows, defaultPages, logger);
  logger.info(`${rows.length} journal rows read, ${descriptors.length} alerts in force`);
  return descriptors;
}
