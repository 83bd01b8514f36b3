import fs from 'node:fs/promises';
import path from 'node:path';
import { beforeEach, describe, expect, it, vi } from 'vitest';

// Suppress pino log noise in tests
vi.mock('pino', () => ({
  default: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn().mockReturnThis() }),
}));

import { SeenItemStore } from '../../services/scanner/seen-store.js';
import { makeTempDir } from '../helpers.js';

const NOW = new Date('2024-07-15T12:00:00Z');
const DAY_MS = 24 * 60 * 60 * 1000;

function daysAgo(days: number): Date {
  return new Date(NOW.getTime() - days * DAY_MS);
}

describe('SeenItemStore', () => {
  let statePath: string;

  beforeEach(async () => {
    statePath = path.join(await makeTempDir(), 'seen.json');
  });

  it('returns nothing for an unseen item', () => {
    const store = new SeenItemStore({ statePath });
    expect(store.lookup('X123')).toBeUndefined();
    expect(store.recordSeen('X123', 50, NOW)).toBeUndefined();
  });

  it('returns the previous record before overwriting it', () => {
    const store = new SeenItemStore({ statePath });
    store.recordSeen('X123', 50, daysAgo(1), 'Steam Deck');

    const previous = store.recordSeen('X123', 40, NOW);

    expect(previous).toMatchObject({ itemId: 'X123', lastPrice: 50, title: 'Steam Deck' });
    expect(store.lookup('X123')).toEqual({
      itemId: 'X123',
      lastPrice: 40,
      firstSeenAt: daysAgo(1).toISOString(),
      lastSeenAt: NOW.toISOString(),
      title: 'Steam Deck',
    });
  });

  it('keeps one entry per item however often it is seen', () => {
    const store = new SeenItemStore({ statePath });
    store.recordSeen('X123', 50, NOW);
    store.recordSeen('X123', 50, NOW);
    expect(store.size).toBe(1);
    expect(store.lookup('X123')?.lastPrice).toBe(50);
  });

  it('evicts items not seen for longer than the max age', () => {
    const store = new SeenItemStore({ statePath });
    store.recordSeen('old', 10, daysAgo(15));
    store.recordSeen('recent', 10, daysAgo(13));

    expect(store.evictExpired(NOW, 14)).toBe(1);
    expect(store.lookup('old')).toBeUndefined();
    expect(store.lookup('recent')).toBeDefined();
  });

  it('keeps an item seen exactly at the max age', () => {
    const store = new SeenItemStore({ statePath });
    store.recordSeen('edge', 10, daysAgo(14));
    expect(store.evictExpired(NOW, 14)).toBe(0);
  });

  it('caps the store at the newest entries', () => {
    const store = new SeenItemStore({ statePath, maxEntries: 2 });
    store.recordSeen('a', 1, daysAgo(3));
    store.recordSeen('b', 1, daysAgo(2));
    store.recordSeen('c', 1, daysAgo(1));

    expect(store.evictExpired(NOW, 14)).toBe(1);
    expect(store.lookup('a')).toBeUndefined();
    expect(store.size).toBe(2);
  });

  it('survives a restart', async () => {
    const store = new SeenItemStore({ statePath });
    store.recordSeen('X123', 50, NOW, 'Steam Deck');
    expect(await store.persist()).toBe(true);

    const reloaded = await SeenItemStore.load({ statePath });
    expect(reloaded.lookup('X123')).toEqual(store.lookup('X123'));
  });

  it('starts empty from a corrupt file', async () => {
    await fs.writeFile(statePath, '{"version": 1, "items": {"X": {"lastPrice": "cheap"}}}', 'utf8');
    const store = await SeenItemStore.load({ statePath });
    expect(store.size).toBe(0);
  });

  it('reports a failed save instead of throwing', async () => {
    await fs.mkdir(statePath);
    const store = new SeenItemStore({ statePath });
    store.recordSeen('X123', 50, NOW);
    expect(await store.persist()).toBe(false);
  });
});
