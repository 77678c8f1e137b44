import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { StateCorruptionError, describeError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { AlertRecord, ListingItem, StateFile } from '../types.js';

const AlertRecordSchema = z.object({
  created_at_utc: z.string().refine(value => !Number.isNaN(Date.parse(value)), 'not an ISO timestamp'),
  seen_codes: z.array(z.string()),
  last_run_utc: z.string(),
  email: z.string(),
});

const StateFileSchema = z.object({
  alerts: z.record(AlertRecordSchema),
});

export interface DiffResult {
  isSeedEvent: boolean;
  newItems: ListingItem[];
  /** Items in newItems whose id had been seen; they came back through a newer publication date. */
  republished: ListingItem[];
}

export interface AlertStateStoreOptions {
  filePath: string;
  now?: () => Date;
  logger?: Logger;
}

export function stateFilePath(stateDir: string, siteId: string): string {
  return path.join(stateDir, `state-${siteId}.json`);
}

/**
 * Seed-then-diff store over one JSON file. The first observation of an
 * identity key records a baseline and reports nothing; later ones report
 * unseen ids. Assumes a single writer per file.
 */
export class AlertStateStore {
  readonly filePath: string;
  private now: () => Date;
  private logger: Logger;

  constructor(options: AlertStateStoreOptions) {
    this.filePath = options.filePath;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger('State');
  }

  get(identityKey: string): AlertRecord | null {
    return this.read().alerts[identityKey] ?? null;
  }

  list(): Array<[string, AlertRecord]> {
    return Object.entries(this.read().alerts).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  forget(identityKey: string): boolean {
    const state = this.read();
    if (!(identityKey in state.alerts)) return false;
    delete state.alerts[identityKey];
    this.write(state);
    return true;
  }

  recordOrDiff(identityKey: string, subscriberEmail: string, items: ListingItem[]): DiffResult {
    const state = this.read();
    const timestamp = this.now().toISOString();
    const existing = state.alerts[identityKey];

    if (!existing) {
      state.alerts[identityKey] = {
        created_at_utc: timestamp,
        seen_codes: sortedUnique(items.map(item => item.id)),
        last_run_utc: timestamp,
        email: subscriberEmail,
      };
      this.write(state);
      this.logger.info(`Seeded ${identityKey} with ${items.length} listings`);
      return { isSeedEvent: true, newItems: [], republished: [] };
    }

    const seen = new Set(existing.seen_codes);
    const createdAt = Date.parse(existing.created_at_utc);
    const newItems: ListingItem[] = [];
    const republished: ListingItem[] = [];
    const reported = new Set<string>();

    for (const item of items) {
      if (reported.has(item.id)) continue;
      if (!seen.has(item.id)) {
        newItems.push(item);
        reported.add(item.id);
      } else if (item.publicationDate && item.publicationDate.getTime() > createdAt) {
        newItems.push(item);
        republished.push(item);
        reported.add(item.id);
      }
    }

    if (republished.length) {
      this.logger.warn(
        `${identityKey}: ${republished.length} already-seen listings reported again for a newer publication date (${republished.map(item => item.id).join(', ')})`,
      );
    }

    state.alerts[identityKey] = {
      created_at_utc: existing.created_at_utc,
      seen_codes: sortedUnique([...existing.seen_codes, ...items.map(item => item.id)]),
      last_run_utc: timestamp,
      email: subscriberEmail,
    };
    if (existing.email !== subscriberEmail) {
      this.logger.info(`${identityKey}: subscriber changed from ${existing.email} to ${subscriberEmail}`);
    }
    this.write(state);

    return { isSeedEvent: false, newItems, republished };
  }

  private read(): StateFile {
    if (!existsSync(this.filePath)) return { alerts: {} };

    try {
      const parsed = StateFileSchema.safeParse(JSON.parse(readFileSync(this.filePath, 'utf-8')));
      if (!parsed.success) {
        throw new StateCorruptionError(`${this.filePath} does not match the state format: ${parsed.error.message}`);
      }
      return parsed.data;
    } catch (error) {
      const corruption = error instanceof StateCorruptionError
        ? error
        : new StateCorruptionError(`${this.filePath} is not valid JSON`, { cause: error });
      const backup = this.backupPath();
      renameSync(this.filePath, backup);
      this.logger.warn(`${describeError(corruption)}; moved to ${backup}, starting empty`);
      return { alerts: {} };
    }
  }

  // An earlier backup is never overwritten; later ones carry the time.
  private backupPath(): string {
    const backup = `${this.filePath}.bak`;
    if (!existsSync(backup)) return backup;
    return `${backup}.${this.now().toISOString().replace(/[:.]/g, '-')}`;
  }

  private write(state: StateFile): void {
    mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    writeFileSync(tmp, JSON.stringify(state, null, 2) + '\n', 'utf-8');
    renameSync(tmp, this.filePath);
  }
}

function sortedUnique(ids: string[]): string[] {
  return [...new Set(ids)].sort();
}
