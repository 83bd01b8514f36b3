import pino from 'pino';
import type { SearchSpec } from '../../config/searches.js';
import { RateLimitError, logError } from '../../utils/errors.js';
import type { QuotaTracker } from '../ebay/budget.js';
import type { SearchOutcome } from '../ebay/client.js';
import type { ProbeOutcome } from '../ebay/rate-limit-api.js';
import type { ListingResult } from '../ebay/types.js';
import { createCycleContext, withSearch } from '../logger/correlation.js';
import type { CycleContext } from '../logger/correlation.js';
import type { Notifier, PriceDrop } from '../notifications/types.js';
import { classifyListing } from './classifier.js';
import type { SeenItemStore } from './seen-store.js';

const log = pino({ name: 'scanner' });

const SLOW_CYCLE_MS = 120_000;

export interface SearchRunner {
  execute(spec: SearchSpec): Promise<SearchOutcome>;
}

export interface QuotaProbe {
  fetchProviderQuota(): Promise<ProbeOutcome>;
}

export type CycleQuota = Pick<
  QuotaTracker,
  | 'rolloverIfNeeded'
  | 'canSpend'
  | 'remaining'
  | 'syncWithProvider'
  | 'detectSyncLag'
  | 'needsProviderSync'
  | 'persist'
  | 'snapshot'
>;

export interface ScannerServiceOptions {
  searches: readonly SearchSpec[];
  quota: CycleQuota;
  executor: SearchRunner;
  probe: QuotaProbe;
  seen: SeenItemStore;
  notifier: Notifier;
  seenMaxAgeDays: number;
  now?: () => Date;
}

export interface CycleReport {
  cycleId: string;
  searches: number;
  executed: number;
  failed: number;
  skippedForBudget: number;
  newListings: number;
  priceDrops: number;
  evicted: number;
  callsUsed: number;
  remaining: number;
  /** Set when the provider's counter looks like it has not caught up with its reset. */
  syncLag: string | null;
  durationMs: number;
}

interface CycleRun {
  ctx: CycleContext;
  report: CycleReport;
  probed: boolean;
}

/**
 * One pass over every enabled search. A search that fails is logged and
 * counted; it never stops the searches after it.
 */
export class ScannerService {
  private readonly now: () => Date;
  private budgetAlertDate: string | null = null;

  constructor(private readonly options: ScannerServiceOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get enabledSearches(): SearchSpec[] {
    return this.options.searches.filter((s) => s.enabled);
  }

  async runCycle(): Promise<CycleReport> {
    const started = this.now();
    const searches = this.enabledSearches;
    const ctx = createCycleContext();
    const run: CycleRun = {
      ctx,
      probed: false,
      report: {
        cycleId: ctx.cycleId,
        searches: searches.length,
        executed: 0,
        failed: 0,
        skippedForBudget: 0,
        newListings: 0,
        priceDrops: 0,
        evicted: 0,
        callsUsed: 0,
        remaining: 0,
        syncLag: null,
        durationMs: 0,
      },
    };
    const { quota, seen } = this.options;

    log.info({ ...run.ctx, searches: searches.length, remaining: quota.remaining() }, 'Scan cycle starting');

    quota.rolloverIfNeeded(started);
    const syncReason = quota.needsProviderSync(started);
    if (syncReason !== null) await this.probeProvider(run, syncReason);

    for (const spec of searches) {
      try {
        await this.runSearch(spec, run);
      } catch (error) {
        run.report.failed++;
        logError('search_failed', error, { ...withSearch(run.ctx, spec.name) });
      }
    }

    const finished = this.now();
    run.report.evicted = seen.evictExpired(finished, this.options.seenMaxAgeDays);
    await this.persist();

    run.report.syncLag = quota.detectSyncLag(finished);
    run.report.callsUsed = quota.snapshot.callsUsed;
    run.report.remaining = quota.remaining();
    run.report.durationMs = finished.getTime() - started.getTime();

    if (run.report.durationMs > SLOW_CYCLE_MS) {
      log.warn({ ...run.ctx, durationMs: run.report.durationMs }, 'Scan cycle ran slow');
    }
    log.info({ ...run.ctx, ...run.report, seenItems: seen.size }, 'Scan cycle complete');
    return run.report;
  }

  /** Flush seen items and quota to disk. */
  async persist(): Promise<void> {
    await this.options.seen.persist();
    await this.options.quota.persist();
  }

  private async runSearch(spec: SearchSpec, run: CycleRun): Promise<void> {
    const { quota, seen } = this.options;
    const ctx = withSearch(run.ctx, spec.name);

    quota.rolloverIfNeeded(this.now());

    if (!quota.canSpend(1)) {
      // A budget that looks spent right after the reset gets one provider check per cycle.
      const lag = quota.detectSyncLag(this.now());
      if (lag !== null && !run.probed) await this.probeProvider(run, lag);
    }

    if (!quota.canSpend(1)) {
      run.report.skippedForBudget++;
      log.warn(
        { ...ctx, callsUsed: quota.snapshot.callsUsed, apiRemaining: quota.snapshot.apiRemaining },
        'Call budget exhausted, skipping search',
      );
      await this.alertBudgetExhausted();
      return;
    }

    const outcome = await this.options.executor.execute(spec);
    if (!outcome.success) {
      if (outcome.error instanceof RateLimitError) run.report.skippedForBudget++;
      else run.report.failed++;
      logError('search_unsuccessful', outcome.error, { ...ctx, kind: outcome.error.name });
      return;
    }
    run.report.executed++;

    const fresh: ListingResult[] = [];
    const drops: PriceDrop[] = [];
    let outOfBand = 0;

    for (const listing of outcome.data.listings) {
      const previous = seen.recordSeen(listing.itemId, listing.price, this.now(), listing.title);
      const verdict = classifyListing(listing.price, previous, spec);
      if (verdict.kind === 'new') fresh.push(listing);
      else if (verdict.kind === 'price-drop') drops.push({ listing, previousPrice: verdict.previousPrice });
      else if (verdict.kind === 'out-of-band') outOfBand++;
    }

    run.report.newListings += fresh.length;
    run.report.priceDrops += drops.length;

    if (fresh.length > 0) {
      await this.dispatch(ctx, 'new_listings', () =>
        this.options.notifier.sendNewListings({ searchName: spec.name, listings: fresh }),
      );
    }
    if (drops.length > 0) {
      await this.dispatch(ctx, 'price_drops', () =>
        this.options.notifier.sendPriceDrops({ searchName: spec.name, drops }),
      );
    }

    log.info(
      { ...ctx, kept: outcome.data.listings.length, new: fresh.length, drops: drops.length, outOfBand },
      'Search processed',
    );
  }

  private async probeProvider(run: CycleRun, reason: string): Promise<void> {
    run.probed = true;
    log.info({ ...run.ctx, reason }, 'Checking provider quota');

    let outcome: ProbeOutcome;
    try {
      outcome = await this.options.probe.fetchProviderQuota();
    } catch (error) {
      logError('quota_probe_failed', error, { ...run.ctx, reason });
      return;
    }
    if (!outcome.success) {
      logError('quota_probe_failed', outcome.error, { ...run.ctx, reason });
      return;
    }

    const result = this.options.quota.syncWithProvider(outcome.data, this.now());
    log.info({ ...run.ctx, result, remaining: outcome.data.remaining }, 'Provider quota checked');
    await this.options.quota.persist();
  }

  private async alertBudgetExhausted(): Promise<void> {
    const { date, callsUsed } = this.options.quota.snapshot;
    if (this.budgetAlertDate === date) return;
    this.budgetAlertDate = date;
    await this.dispatch(createCycleContext('quota'), 'budget_alert', () =>
      this.options.notifier.sendSystemAlert(
        'warning',
        'Daily call budget reached',
        `${callsUsed} calls used on ${date}. Searches resume after the provider reset.`,
      ),
    );
  }

  private async dispatch(ctx: CycleContext, kind: string, send: () => Promise<void>): Promise<void> {
    try {
      await send();
    } catch (error) {
      logError('notify_failed', error, { ...ctx, kind });
    }
  }
}
