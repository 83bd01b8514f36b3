const SAFETY_BUFFER_CALLS = 100;
const MIN_SLEEP_SECONDS = 30;
const MAX_SLEEP_SECONDS = 900;
const JITTER_RATIO = 0.05;
const EXHAUSTED_MIN_SECONDS = 300;
const EXHAUSTED_MAX_SECONDS = 3600;
const RESET_GRACE_SECONDS = 60;

export interface PacingInput {
  searchCount: number;
  remaining: number;
  secondsUntilReset: number;
  syncLag: boolean;
}

export interface PacingSettings {
  adaptive: boolean;
  fixedIntervalSeconds: number;
  anomalyRetrySeconds: number;
  random?: () => number;
}

export interface SleepPlan {
  seconds: number;
  reason: string;
}

/**
 * How long to sleep before the next cycle. Adaptive pacing spreads what is
 * left of today's budget evenly until the reset, keeping a small reserve.
 */
export function computeSleepSeconds(input: PacingInput, settings: PacingSettings): SleepPlan {
  if (input.syncLag) {
    return { seconds: settings.anomalyRetrySeconds, reason: 'provider quota lagging its reset' };
  }
  if (!settings.adaptive || input.searchCount <= 0) {
    return { seconds: settings.fixedIntervalSeconds, reason: 'fixed interval' };
  }

  const usable = input.remaining - SAFETY_BUFFER_CALLS;
  const cycles = usable > 0 ? Math.floor(usable / input.searchCount) : 0;

  if (cycles === 0) {
    const wait = Math.min(
      Math.max(input.secondsUntilReset + RESET_GRACE_SECONDS, EXHAUSTED_MIN_SECONDS),
      EXHAUSTED_MAX_SECONDS,
    );
    return { seconds: wait, reason: 'budget exhausted until reset' };
  }

  const even = input.secondsUntilReset / cycles;
  const bounded = Math.min(Math.max(even, MIN_SLEEP_SECONDS), MAX_SLEEP_SECONDS);
  const random = settings.random ?? Math.random;
  const jitter = bounded * JITTER_RATIO * (random() * 2 - 1);

  return { seconds: Math.round(bounded + jitter), reason: `${cycles} cycles left before reset` };
}

/** Sleep after a cycle that failed outright: doubles per failure, capped. */
export function failureBackoffSeconds(consecutiveFailures: number): number {
  return Math.min(60 * 2 ** Math.max(0, consecutiveFailures - 1), MAX_SLEEP_SECONDS);
}
