import pino from 'pino';
import { z } from 'zod';
import { loadState, saveState } from '../state/atomic-store.js';
import { logError } from '../../utils/errors.js';

const log = pino({ name: 'seen-store' });

const DAY_MS = 24 * 60 * 60 * 1000;
export const SEEN_MAX_AGE_DAYS = 14;
const MAX_SEEN_ENTRIES = 50_000;

const seenEntrySchema = z.object({
  lastPrice: z.number().nonnegative(),
  firstSeenAt: z.string().datetime({ offset: true }),
  lastSeenAt: z.string().datetime({ offset: true }),
  title: z.string().optional(),
});

export const seenFileSchema = z.object({
  version: z.literal(1),
  items: z.record(seenEntrySchema),
});

export type SeenFile = z.infer<typeof seenFileSchema>;

export interface SeenItem {
  itemId: string;
  lastPrice: number;
  firstSeenAt: string;
  lastSeenAt: string;
  title?: string;
}

export interface SeenItemStoreOptions {
  statePath: string;
  maxEntries?: number;
}

/**
 * Last known price per listing, used both to suppress repeat alerts and to
 * spot price drops. The whole map is persisted as one document.
 */
export class SeenItemStore {
  private readonly items = new Map<string, SeenItem>();

  constructor(private readonly options: SeenItemStoreOptions) {}

  static async load(options: SeenItemStoreOptions): Promise<SeenItemStore> {
    const store = new SeenItemStore(options);
    const file = await loadState<SeenFile>(options.statePath, seenFileSchema, () => ({ version: 1 as const, items: {} }));
    for (const [itemId, entry] of Object.entries(file.items)) {
      store.items.set(itemId, { itemId, ...entry });
    }
    log.info({ count: store.items.size }, 'Loaded previously seen items');
    return store;
  }

  get size(): number {
    return this.items.size;
  }

  lookup(itemId: string): SeenItem | undefined {
    const item = this.items.get(itemId);
    return item ? { ...item } : undefined;
  }

  /**
   * Insert or refresh an item. Returns the record as it was before this sighting
   * so the caller can compare prices, or undefined for a first sighting.
   */
  recordSeen(itemId: string, price: number, now: Date, title?: string): SeenItem | undefined {
    const previous = this.items.get(itemId);
    const at = now.toISOString();

    this.items.set(itemId, {
      itemId,
      lastPrice: price,
      firstSeenAt: previous?.firstSeenAt ?? at,
      lastSeenAt: at,
      title: title ?? previous?.title,
    });

    return previous ? { ...previous } : undefined;
  }

  /**
   * Drop items not seen for more than `maxAgeDays`, then cap the map at the
   * newest `maxEntries`. Returns how many entries were removed.
   */
  evictExpired(now: Date, maxAgeDays = SEEN_MAX_AGE_DAYS): number {
    const cutoff = now.getTime() - maxAgeDays * DAY_MS;
    let removed = 0;

    for (const [itemId, item] of this.items) {
      if (Date.parse(item.lastSeenAt) < cutoff) {
        this.items.delete(itemId);
        removed++;
      }
    }

    const maxEntries = this.options.maxEntries ?? MAX_SEEN_ENTRIES;
    if (this.items.size > maxEntries) {
      const oldestFirst = [...this.items.values()].sort(
        (a, b) => Date.parse(a.lastSeenAt) - Date.parse(b.lastSeenAt),
      );
      const excess = oldestFirst.slice(0, this.items.size - maxEntries);
      for (const item of excess) this.items.delete(item.itemId);
      removed += excess.length;
      log.info({ capped: excess.length, maxEntries }, 'Seen items capped');
    }

    if (removed > 0) {
      log.info({ removed, remaining: this.items.size }, 'Evicted expired seen items');
    }
    return removed;
  }

  toFile(): SeenFile {
    const items: SeenFile['items'] = {};
    for (const { itemId, ...entry } of this.items.values()) {
      items[itemId] = entry;
    }
    return { version: 1, items };
  }

  /** Persist the full map. Failures are logged and reported, never thrown. */
  async persist(): Promise<boolean> {
    try {
      await saveState(this.options.statePath, this.toFile());
      return true;
    } catch (error) {
      logError('seen_persist_failed', error, { statePath: this.options.statePath });
      return false;
    }
  }
}
