import fs from 'node:fs/promises';
import path from 'node:path';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';

// Suppress pino log noise in tests
vi.mock('pino', () => ({
  default: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn().mockReturnThis() }),
}));

import type { SearchSpec } from '../../config/searches.js';
import { QuotaTracker, createFreshQuotaState } from '../../services/ebay/budget.js';
import type { QuotaState } from '../../services/ebay/budget.js';
import type { SearchOutcome } from '../../services/ebay/client.js';
import type { ProbeOutcome } from '../../services/ebay/rate-limit-api.js';
import type { ListingResult } from '../../services/ebay/types.js';
import type { Notifier } from '../../services/notifications/types.js';
import { ScannerService } from '../../services/scanner/scanner-service.js';
import { SeenItemStore } from '../../services/scanner/seen-store.js';
import { AuthError, ok, err } from '../../utils/errors.js';
import { makeListing, makeSpec, makeTempDir } from '../helpers.js';

const NOON = new Date('2024-07-01T12:00:00Z');

function found(listings: ListingResult[]): SearchOutcome {
  return ok({ listings, total: listings.length, skipped: {}, calls: 1 });
}

describe('ScannerService', () => {
  let dir: string;
  let now: Date;
  let seen: SeenItemStore;
  let execute: Mock<(spec: SearchSpec) => Promise<SearchOutcome>>;
  let fetchProviderQuota: Mock<() => Promise<ProbeOutcome>>;
  let notifier: {
    sendNewListings: Mock<Notifier['sendNewListings']>;
    sendPriceDrops: Mock<Notifier['sendPriceDrops']>;
    sendSystemAlert: Mock<Notifier['sendSystemAlert']>;
  };

  const specA = makeSpec({ name: 'A', query: 'steam deck' });
  const specB = makeSpec({ name: 'B', query: 'steam deck', maxPrice: 100 });

  beforeEach(async () => {
    dir = await makeTempDir();
    now = NOON;
    seen = new SeenItemStore({ statePath: path.join(dir, 'seen.json') });
    execute = vi.fn<(spec: SearchSpec) => Promise<SearchOutcome>>();
    fetchProviderQuota = vi.fn<() => Promise<ProbeOutcome>>();
    notifier = {
      sendNewListings: vi.fn<Notifier['sendNewListings']>().mockResolvedValue(undefined),
      sendPriceDrops: vi.fn<Notifier['sendPriceDrops']>().mockResolvedValue(undefined),
      sendSystemAlert: vi.fn<Notifier['sendSystemAlert']>().mockResolvedValue(undefined),
    };
  });

  function quota(overrides: Partial<QuotaState> = {}): QuotaTracker {
    return new QuotaTracker(
      { statePath: path.join(dir, 'quota.json'), dailyCallLimit: 4500, anomalyWindowMinutes: 10, syncIntervalMinutes: 30 },
      { ...createFreshQuotaState(now), lastApiCheck: now.toISOString(), ...overrides },
    );
  }

  function scanner(searches: SearchSpec[], tracker = quota()): ScannerService {
    return new ScannerService({
      searches,
      quota: tracker,
      executor: { execute },
      probe: { fetchProviderQuota },
      seen,
      notifier,
      seenMaxAgeDays: 14,
      now: () => now,
    });
  }

  it('keeps running later searches when one fails', async () => {
    const listings = [makeListing('X1', 60), makeListing('X2', 70)];
    execute.mockImplementation(async (spec) =>
      spec.name === 'A' ? err(new AuthError('credentials rejected', { status: 401 })) : found(listings),
    );

    const report = await scanner([specA, specB]).runCycle();

    expect(report).toMatchObject({ searches: 2, executed: 1, failed: 1, newListings: 2, priceDrops: 0 });
    expect(notifier.sendNewListings).toHaveBeenCalledTimes(1);
    expect(notifier.sendNewListings).toHaveBeenCalledWith({ searchName: 'B', listings });
  });

  it('keeps running when a search throws', async () => {
    execute.mockRejectedValueOnce(new Error('boom')).mockResolvedValueOnce(found([makeListing('X1', 60)]));

    const report = await scanner([specA, specB]).runCycle();

    expect(report).toMatchObject({ executed: 1, failed: 1, newListings: 1 });
  });

  it('reports a listing once, then only its price drop', async () => {
    const service = scanner([specB]);

    execute.mockResolvedValueOnce(found([makeListing('X123', 50), makeListing('X9', 20)]));
    await service.runCycle();

    const dropped = makeListing('X123', 40);
    execute.mockResolvedValueOnce(found([dropped, makeListing('X9', 20)]));
    const report = await service.runCycle();

    expect(report).toMatchObject({ newListings: 0, priceDrops: 1 });
    expect(notifier.sendNewListings).toHaveBeenCalledTimes(1);
    expect(notifier.sendPriceDrops).toHaveBeenCalledWith({
      searchName: 'B',
      drops: [{ listing: dropped, previousPrice: 50 }],
    });
  });

  it('carries on when a notification fails', async () => {
    notifier.sendNewListings.mockRejectedValue(new Error('chat not found'));
    execute.mockResolvedValue(found([makeListing('X1', 60)]));

    const report = await scanner([specA]).runCycle();

    expect(report).toMatchObject({ executed: 1, newListings: 1 });
    expect(seen.lookup('X1')?.lastPrice).toBe(60);
  });

  it('skips every search once the budget is spent and alerts once', async () => {
    const report = await scanner([specA, specB], quota({ callsUsed: 4500 })).runCycle();

    expect(execute).not.toHaveBeenCalled();
    expect(report.skippedForBudget).toBe(2);
    expect(notifier.sendSystemAlert).toHaveBeenCalledTimes(1);
    expect(notifier.sendSystemAlert).toHaveBeenCalledWith(
      'warning',
      'Daily call budget reached',
      '4500 calls used on 2024-07-01. Searches resume after the provider reset.',
    );
  });

  it('checks the provider quota when no check has been made', async () => {
    fetchProviderQuota.mockResolvedValueOnce(
      ok({ limit: 5000, remaining: 4000, resetTimeUtc: '2024-07-02T07:00:00.000Z' }),
    );
    execute.mockResolvedValue(found([]));

    const report = await scanner([specA], quota({ lastApiCheck: null })).runCycle();

    expect(fetchProviderQuota).toHaveBeenCalledTimes(1);
    expect(report.callsUsed).toBe(1000);
    expect(report.remaining).toBe(3500);
  });

  it('rechecks an exhausted-looking budget right after the reset and recovers', async () => {
    now = new Date('2024-07-01T07:03:00Z');
    fetchProviderQuota.mockResolvedValueOnce(
      ok({ limit: 5000, remaining: 5000, resetTimeUtc: '2024-07-02T07:00:00.000Z' }),
    );
    execute.mockResolvedValue(found([]));

    const report = await scanner([specA, specB], quota({ callsUsed: 4500, apiRemaining: 0 })).runCycle();

    expect(fetchProviderQuota).toHaveBeenCalledTimes(1);
    expect(execute).toHaveBeenCalledTimes(2);
    expect(report).toMatchObject({ executed: 2, skippedForBudget: 0, syncLag: null });
  });

  it('probes at most once per cycle while the provider lags', async () => {
    now = new Date('2024-07-01T07:03:00Z');
    fetchProviderQuota.mockResolvedValue(ok({ limit: 5000, remaining: 0, resetTimeUtc: '2024-07-01T07:00:00.000Z' }));

    const report = await scanner([specA, specB], quota({ callsUsed: 4500, apiRemaining: 0 })).runCycle();

    expect(fetchProviderQuota).toHaveBeenCalledTimes(1);
    expect(execute).not.toHaveBeenCalled();
    expect(report.skippedForBudget).toBe(2);
    expect(report.syncLag).toBe('provider still reports a past reset 3 min after reset');
  });

  it('runs every search when the cycle-start quota check throws', async () => {
    fetchProviderQuota.mockRejectedValueOnce(new SyntaxError("Unexpected token '<'"));
    execute.mockImplementation(async (spec) => found([makeListing(`${spec.name}-1`, 60)]));

    const report = await scanner([specA, specB], quota({ lastApiCheck: null })).runCycle();

    expect(fetchProviderQuota).toHaveBeenCalledTimes(1);
    expect(report).toMatchObject({ executed: 2, failed: 0, newListings: 2 });
  });

  it('skips disabled searches', async () => {
    execute.mockResolvedValue(found([]));

    const report = await scanner([specA, makeSpec({ name: 'off', enabled: false })]).runCycle();

    expect(report.searches).toBe(1);
    expect(execute).toHaveBeenCalledTimes(1);
  });

  it('persists seen items and evicts stale ones at the end of a cycle', async () => {
    seen.recordSeen('ancient', 10, new Date('2024-06-01T00:00:00Z'));
    execute.mockResolvedValue(found([makeListing('X1', 60)]));

    const report = await scanner([specA]).runCycle();

    expect(report.evicted).toBe(1);
    const saved = JSON.parse(await fs.readFile(path.join(dir, 'seen.json'), 'utf8'));
    expect(Object.keys(saved.items)).toEqual(['X1']);
  });
});
