import { describe, expect, it } from 'vitest';
import { computeSleepSeconds, failureBackoffSeconds } from '../../services/scanner/pacing.js';
import type { PacingSettings } from '../../services/scanner/pacing.js';

const adaptive: PacingSettings = {
  adaptive: true,
  fixedIntervalSeconds: 300,
  anomalyRetrySeconds: 120,
  random: () => 0.5,
};

describe('computeSleepSeconds', () => {
  it('retries soon while the provider quota lags its reset', () => {
    const plan = computeSleepSeconds({ searchCount: 3, remaining: 0, secondsUntilReset: 80000, syncLag: true }, adaptive);
    expect(plan.seconds).toBe(120);
  });

  it('uses the fixed interval when pacing is off', () => {
    const plan = computeSleepSeconds(
      { searchCount: 3, remaining: 4000, secondsUntilReset: 36000, syncLag: false },
      { ...adaptive, adaptive: false },
    );
    expect(plan).toEqual({ seconds: 300, reason: 'fixed interval' });
  });

  it('spreads the remaining budget until the reset', () => {
    // (1100 - 100) / 10 searches = 100 cycles over 36000s
    const plan = computeSleepSeconds({ searchCount: 10, remaining: 1100, secondsUntilReset: 36000, syncLag: false }, adaptive);
    expect(plan).toEqual({ seconds: 360, reason: '100 cycles left before reset' });
  });

  it('applies at most five percent jitter', () => {
    const input = { searchCount: 10, remaining: 1100, secondsUntilReset: 36000, syncLag: false };
    expect(computeSleepSeconds(input, { ...adaptive, random: () => 1 }).seconds).toBe(378);
    expect(computeSleepSeconds(input, { ...adaptive, random: () => 0 }).seconds).toBe(342);
  });

  it('never sleeps less than 30 seconds or more than 15 minutes', () => {
    expect(
      computeSleepSeconds({ searchCount: 1, remaining: 10100, secondsUntilReset: 3600, syncLag: false }, adaptive).seconds,
    ).toBe(30);
    expect(
      computeSleepSeconds({ searchCount: 1, remaining: 110, secondsUntilReset: 86400, syncLag: false }, adaptive).seconds,
    ).toBe(900);
  });

  it('waits for the reset once the budget is spent', () => {
    const spent = { searchCount: 2, remaining: 50, syncLag: false };
    expect(computeSleepSeconds({ ...spent, secondsUntilReset: 1000 }, adaptive).seconds).toBe(1060);
    expect(computeSleepSeconds({ ...spent, secondsUntilReset: 10000 }, adaptive).seconds).toBe(3600);
    expect(computeSleepSeconds({ ...spent, secondsUntilReset: 10 }, adaptive).seconds).toBe(300);
  });
});

describe('failureBackoffSeconds', () => {
  it('doubles per failure up to 15 minutes', () => {
    expect([1, 2, 3, 4, 5].map(failureBackoffSeconds)).toEqual([60, 120, 240, 480, 900]);
  });
});
