import pino from 'pino';
import { logError } from '../../utils/errors.js';
import type { QuotaTracker } from '../ebay/budget.js';
import type { LivenessReporter } from '../heartbeat/heartbeat.js';
import { computeSleepSeconds, failureBackoffSeconds } from './pacing.js';
import type { PacingSettings } from './pacing.js';
import type { CycleReport } from './scanner-service.js';
import type { ShutdownSignal } from './shutdown.js';

const log = pino({ name: 'scan-loop' });

const FAILURE_ALERT_THRESHOLD = 3;

export type LoopState = 'idle' | 'running' | 'sleeping' | 'shutting-down' | 'stopped';

export interface CycleRunner {
  readonly enabledSearches: readonly unknown[];
  runCycle(): Promise<CycleReport>;
  persist(): Promise<void>;
}

export interface ScanLoopOptions {
  scanner: CycleRunner;
  quota: Pick<QuotaTracker, 'remaining' | 'secondsUntilReset'>;
  shutdown: ShutdownSignal;
  liveness: LivenessReporter;
  pacing: PacingSettings;
  tickSeconds: number;
  onRepeatedFailure?: (failures: number, error: unknown) => Promise<void>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Runs cycles until asked to stop. Sleep is split into ticks so a shutdown
 * request is noticed within one tick; a cycle in progress always completes.
 */
export class ScanLoop {
  private state: LoopState = 'idle';
  private consecutiveFailures = 0;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(private readonly options: ScanLoopOptions) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
  }

  get currentState(): LoopState {
    return this.state;
  }

  async run(): Promise<void> {
    log.info(
      { searches: this.options.scanner.enabledSearches.length, adaptive: this.options.pacing.adaptive },
      'Starting scan loop',
    );

    for (;;) {
      this.transition('running');
      await this.heartbeat('cycle');

      const sleepSeconds = await this.runOnce();

      this.transition('sleeping');
      if (await this.sleepInTicks(sleepSeconds)) break;
    }

    await this.stop();
  }

  /** One cycle; returns how long to sleep afterwards. */
  private async runOnce(): Promise<number> {
    let report: CycleReport;
    try {
      report = await this.options.scanner.runCycle();
    } catch (error) {
      this.consecutiveFailures++;
      logError('cycle_failed', error, { consecutiveFailures: this.consecutiveFailures });
      if (this.consecutiveFailures === FAILURE_ALERT_THRESHOLD && this.options.onRepeatedFailure) {
        await this.options.onRepeatedFailure(this.consecutiveFailures, error).catch((alertError: unknown) =>
          logError('failure_alert_failed', alertError),
        );
      }
      return failureBackoffSeconds(this.consecutiveFailures);
    }

    this.consecutiveFailures = 0;
    const now = this.now();
    const plan = computeSleepSeconds(
      {
        searchCount: this.options.scanner.enabledSearches.length,
        remaining: this.options.quota.remaining(),
        secondsUntilReset: this.options.quota.secondsUntilReset(now),
        syncLag: report.syncLag !== null,
      },
      this.options.pacing,
    );
    log.info({ cycleId: report.cycleId, sleepSeconds: plan.seconds, reason: plan.reason }, 'Sleeping until next cycle');
    return plan.seconds;
  }

  /** Returns true when a shutdown was requested. */
  private async sleepInTicks(totalSeconds: number): Promise<boolean> {
    let left = totalSeconds;
    while (left > 0) {
      if (await this.options.shutdown.isRequested()) return true;
      const tick = Math.min(this.options.tickSeconds, left);
      await this.sleep(tick * 1000);
      left -= tick;
      await this.heartbeat('sleep');
    }
    return this.options.shutdown.isRequested();
  }

  private async stop(): Promise<void> {
    this.transition('shutting-down');
    await this.options.scanner.persist();
    await this.options.shutdown.clear();
    await this.heartbeat('shutdown');
    this.transition('stopped');
    log.info('Scan loop stopped');
  }

  private async heartbeat(source: string): Promise<void> {
    try {
      await this.options.liveness.beat(source, this.state);
    } catch (error) {
      logError('heartbeat_failed', error, { source });
    }
  }

  private transition(next: LoopState): void {
    log.debug({ from: this.state, to: next }, 'Loop state');
    this.state = next;
  }
}
