import pino from 'pino';
import { z } from 'zod';
import { loadState, saveState } from '../state/atomic-store.js';
import { logError } from '../../utils/errors.js';
import {
  DEFAULT_PROVIDER_TIME_ZONE,
  lastResetAt,
  minutesSinceReset,
  nextResetAt,
  providerDate,
} from './provider-clock.js';
import type { ProviderQuotaSnapshot } from './types.js';

const log = pino({ name: 'quota' });

const PROVIDER_DEFAULT_LIMIT = 5000;
const DRIFT_TOLERANCE = 10;
const LOW_REMAINING_RATIO = 0.5;

export const quotaStateSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  callsUsed: z.number().int().nonnegative(),
  apiLimit: z.number().int().positive(),
  apiRemaining: z.number().int().nonnegative().nullable(),
  resetTimeUtc: z.string().datetime({ offset: true }).nullable(),
  lastApiCheck: z.string().datetime({ offset: true }).nullable(),
  lastUpdate: z.string().datetime({ offset: true }),
});

export type QuotaState = z.infer<typeof quotaStateSchema>;

export interface QuotaTrackerOptions {
  statePath: string;
  /** Local ceiling, kept below the provider's own limit. */
  dailyCallLimit: number;
  timeZone?: string;
  anomalyWindowMinutes: number;
  syncIntervalMinutes: number;
}

export type SyncOutcome = 'applied' | 'stale';

export function createFreshQuotaState(now: Date, timeZone = DEFAULT_PROVIDER_TIME_ZONE): QuotaState {
  return {
    date: providerDate(now, timeZone),
    callsUsed: 0,
    apiLimit: PROVIDER_DEFAULT_LIMIT,
    apiRemaining: null,
    resetTimeUtc: null,
    lastApiCheck: null,
    lastUpdate: now.toISOString(),
  };
}

function addDays(date: string, days: number): string {
  const d = new Date(`${date}T12:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}

/**
 * Tracks today's call budget against the provider's day.
 *
 * The local counter is advisory: whenever the provider reports its own
 * remaining/reset values they overwrite ours, and a drift beyond
 * DRIFT_TOLERANCE calls snaps `callsUsed` back to the provider's implied usage.
 */
export class QuotaTracker {
  private state: QuotaState;
  private readonly timeZone: string;
  private staleSync = false;

  constructor(
    private readonly options: QuotaTrackerOptions,
    state: QuotaState,
  ) {
    this.state = { ...state };
    this.timeZone = options.timeZone ?? DEFAULT_PROVIDER_TIME_ZONE;
  }

  static async load(options: QuotaTrackerOptions, now = new Date()): Promise<QuotaTracker> {
    const state = await loadState(options.statePath, quotaStateSchema, () =>
      createFreshQuotaState(now, options.timeZone),
    );
    log.info(
      { date: state.date, callsUsed: state.callsUsed, apiRemaining: state.apiRemaining, resetTimeUtc: state.resetTimeUtc },
      'Quota state loaded',
    );
    return new QuotaTracker(options, state);
  }

  get snapshot(): Readonly<QuotaState> {
    return { ...this.state };
  }

  /**
   * Reset the counter once per provider day. A known reset time that has passed
   * wins over the calendar check, so clock skew cannot delay the rollover.
   */
  rolloverIfNeeded(now: Date): boolean {
    const today = providerDate(now, this.timeZone);
    let target: string | null = null;
    let reason = '';

    if (this.state.resetTimeUtc !== null) {
      const resetMs = Date.parse(this.state.resetTimeUtc);
      if (resetMs <= now.getTime()) {
        const dayOfReset = providerDate(new Date(resetMs + 60_000), this.timeZone);
        if (dayOfReset > this.state.date) {
          target = dayOfReset > today ? dayOfReset : today;
          reason = 'provider reset time passed';
        } else {
          // Already rolled over for this boundary; the stored time is just stale.
          this.state.resetTimeUtc = null;
        }
      }
    }

    if (target === null && today > this.state.date) {
      target = today;
      reason = 'provider day changed';
    }

    if (target === null) return false;

    if (target <= this.state.date) target = addDays(this.state.date, 1);

    log.info({ from: this.state.date, to: target, callsUsed: this.state.callsUsed, reason }, 'Quota day rollover');
    this.state = {
      ...this.state,
      date: target,
      callsUsed: 0,
      apiRemaining: null,
      resetTimeUtc: null,
      lastUpdate: now.toISOString(),
    };
    this.staleSync = false;
    return true;
  }

  canSpend(n = 1): boolean {
    if (this.state.callsUsed + n > this.options.dailyCallLimit) return false;
    if (this.state.apiRemaining !== null && this.state.apiRemaining < n) return false;
    return true;
  }

  /** Calls still available today: the tighter of the local and provider budgets. */
  remaining(): number {
    const local = this.options.dailyCallLimit - this.state.callsUsed;
    const provider = this.state.apiRemaining ?? Number.POSITIVE_INFINITY;
    return Math.max(0, Math.min(local, provider));
  }

  async recordSpend(n: number, now = new Date()): Promise<void> {
    this.state.callsUsed += n;
    if (this.state.apiRemaining !== null) {
      this.state.apiRemaining = Math.max(0, this.state.apiRemaining - n);
    }
    this.state.lastUpdate = now.toISOString();
    await this.persist();
  }

  /**
   * Overwrite our view with the provider's. A snapshot whose reset time is already
   * in the past predates the provider's own reset: it counts as a boundary signal,
   * but its remaining count is not trusted.
   */
  syncWithProvider(snapshot: ProviderQuotaSnapshot, now = new Date()): SyncOutcome {
    this.rolloverIfNeeded(now);

    if (snapshot.resetTimeUtc !== null && Date.parse(snapshot.resetTimeUtc) <= now.getTime()) {
      this.state.resetTimeUtc = snapshot.resetTimeUtc;
      this.rolloverIfNeeded(now);
      this.state.lastApiCheck = now.toISOString();
      this.staleSync = true;
      log.warn(
        { remaining: snapshot.remaining, resetTimeUtc: snapshot.resetTimeUtc },
        'Provider quota snapshot predates its own reset',
      );
      return 'stale';
    }

    const limit = snapshot.limit ?? this.state.apiLimit;
    const implied = Math.max(0, limit - snapshot.remaining);

    if (Math.abs(this.state.callsUsed - implied) > DRIFT_TOLERANCE) {
      log.info({ local: this.state.callsUsed, provider: implied }, 'Syncing local call count to provider');
      this.state.callsUsed = implied;
    }

    this.state.apiLimit = limit;
    this.state.apiRemaining = snapshot.remaining;
    if (snapshot.resetTimeUtc !== null) this.state.resetTimeUtc = snapshot.resetTimeUtc;
    this.state.lastApiCheck = now.toISOString();
    this.state.lastUpdate = now.toISOString();
    this.staleSync = false;

    log.debug({ remaining: snapshot.remaining, limit, resetTimeUtc: this.state.resetTimeUtc }, 'Quota synced');
    return 'applied';
  }

  /**
   * Shortly after a reset, an exhausted-looking budget is almost always the
   * provider's counter lagging behind its reset, not real usage.
   */
  detectSyncLag(now: Date): string | null {
    const minutes = minutesSinceReset(now, this.timeZone);
    if (minutes >= this.options.anomalyWindowMinutes) return null;

    if (this.staleSync) {
      return `provider still reports a past reset ${minutes.toFixed(0)} min after reset`;
    }
    if (!this.canSpend(1)) {
      return `quota looks exhausted ${minutes.toFixed(0)} min after reset`;
    }
    const { apiRemaining, apiLimit } = this.state;
    if (apiRemaining !== null && apiRemaining < apiLimit * LOW_REMAINING_RATIO) {
      return `only ${apiRemaining}/${apiLimit} remaining ${minutes.toFixed(0)} min after reset`;
    }
    return null;
  }

  /** Why a proactive provider check is due, or null when it is not. */
  needsProviderSync(now: Date): string | null {
    if (this.state.lastApiCheck === null) return 'no previous check';

    const lastCheck = Date.parse(this.state.lastApiCheck);
    if (lastCheck < lastResetAt(now, this.timeZone).getTime()) {
      return 'reset boundary crossed since last check';
    }

    const lag = this.detectSyncLag(now);
    if (lag !== null) return lag;

    if (now.getTime() - lastCheck >= this.options.syncIntervalMinutes * 60_000) {
      return 'sync interval elapsed';
    }
    return null;
  }

  secondsUntilReset(now: Date): number {
    if (this.state.resetTimeUtc !== null) {
      const diff = Date.parse(this.state.resetTimeUtc) - now.getTime();
      if (diff > 0) return Math.ceil(diff / 1000);
    }
    return Math.ceil((nextResetAt(now, this.timeZone).getTime() - now.getTime()) / 1000);
  }

  /** Persist the state. Failures are logged and reported, never thrown. */
  async persist(): Promise<boolean> {
    try {
      await saveState(this.options.statePath, this.state);
      return true;
    } catch (error) {
      logError('quota_persist_failed', error, { statePath: this.options.statePath });
      return false;
    }
  }
}
