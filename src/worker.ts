import pino from 'pino';
import { APP_VERSION, loadConfig, statePaths } from './config/index.js';
import { loadSearchSpecs } from './config/searches.js';
import { ProviderQuotaProbe, QuotaTracker, SearchExecutor, TokenManager } from './services/ebay/index.js';
import { FileHeartbeatReporter } from './services/heartbeat/heartbeat.js';
import { createNotifier } from './services/notifications/index.js';
import { FileShutdownSignal, ScanLoop, ScannerService, SeenItemStore } from './services/scanner/index.js';
import { ConfigurationError, getErrorMessage, logError } from './utils/errors.js';

const logger = pino({ name: 'worker' });

// Catch kills/OOM before pino can flush
process.on('uncaughtException', (err) => {
  console.error(`UNCAUGHT EXCEPTION: ${err.message}`);
  console.error(err.stack);
  process.exit(1);
});
process.on('unhandledRejection', (reason) => {
  console.error(`UNHANDLED REJECTION: ${getErrorMessage(reason)}`);
  process.exit(1);
});

async function main(): Promise<void> {
  const config = loadConfig();
  const searches = await loadSearchSpecs(config.SEARCHES_FILE);
  const paths = statePaths(config.DATA_DIR);

  logger.info(
    { version: APP_VERSION, searches: searches.length, dataDir: config.DATA_DIR, marketplace: config.EBAY_MARKETPLACE_ID },
    'Listing watcher starting',
  );

  const shutdown = new FileShutdownSignal(paths.shutdown);
  // A sentinel left over from a previous run must not stop this one.
  await shutdown.clear();

  const quota = await QuotaTracker.load({
    statePath: paths.quota,
    dailyCallLimit: config.DAILY_CALL_LIMIT,
    timeZone: config.PROVIDER_TIME_ZONE,
    anomalyWindowMinutes: config.QUOTA_ANOMALY_WINDOW_MINUTES,
    syncIntervalMinutes: config.QUOTA_SYNC_INTERVAL_MINUTES,
  });

  const tokens = new TokenManager({
    clientId: config.EBAY_CLIENT_ID,
    clientSecret: config.EBAY_CLIENT_SECRET,
    apiBase: config.EBAY_API_BASE,
    statePath: paths.token,
  });

  const executor = new SearchExecutor({
    apiBase: config.EBAY_API_BASE,
    marketplaceId: config.EBAY_MARKETPLACE_ID,
    campaignId: config.EBAY_CAMPAIGN_ID,
    resultsLimit: config.SEARCH_RESULTS_LIMIT,
    priceHeadroom: config.PRICE_HEADROOM_RATIO,
    tokens,
    quota,
  });

  const notifier = createNotifier(config);

  const scanner = new ScannerService({
    searches,
    quota,
    executor,
    probe: new ProviderQuotaProbe({ apiBase: config.EBAY_API_BASE, tokens }),
    seen: await SeenItemStore.load({ statePath: paths.seen }),
    notifier,
    seenMaxAgeDays: config.SEEN_MAX_AGE_DAYS,
  });

  const loop = new ScanLoop({
    scanner,
    quota,
    shutdown,
    liveness: new FileHeartbeatReporter(paths.heartbeat, APP_VERSION),
    pacing: {
      adaptive: config.ADAPTIVE_PACING,
      fixedIntervalSeconds: config.SCAN_INTERVAL_SECONDS,
      anomalyRetrySeconds: config.QUOTA_ANOMALY_RETRY_SECONDS,
    },
    tickSeconds: config.SLEEP_TICK_SECONDS,
    onRepeatedFailure: (failures, error) =>
      notifier.sendSystemAlert('critical', 'Scan cycles failing', `${failures} cycles in a row: ${getErrorMessage(error)}`),
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.info({ signal }, 'Shutdown signal received, stopping after the current step');
      shutdown.trigger();
    });
  }

  await loop.run();
}

main().catch((error: unknown) => {
  logError('worker_failed', error);
  process.exit(error instanceof ConfigurationError ? 2 : 1);
});
