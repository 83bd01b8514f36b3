import { loadConfig, statePaths } from '../config/index.js';
import { ProviderQuotaProbe, QuotaTracker, TokenManager, nextResetAt, providerDate } from '../services/ebay/index.js';

async function main() {
  const config = loadConfig();
  const paths = statePaths(config.DATA_DIR);
  const now = new Date();

  console.log('=== eBay Browse API quota ===\n');

  const tokens = new TokenManager({
    clientId: config.EBAY_CLIENT_ID,
    clientSecret: config.EBAY_CLIENT_SECRET,
    apiBase: config.EBAY_API_BASE,
    statePath: paths.token,
  });
  const probe = new ProviderQuotaProbe({ apiBase: config.EBAY_API_BASE, tokens });

  const outcome = await probe.fetchProviderQuota();
  if (!outcome.success) {
    throw outcome.error;
  }

  const { limit, remaining, resetTimeUtc } = outcome.data;
  console.log(`Provider:  ${remaining}/${limit ?? '?'} remaining`);
  console.log(`Reset:     ${resetTimeUtc ?? nextResetAt(now, config.PROVIDER_TIME_ZONE).toISOString()}`);
  console.log(`Day:       ${providerDate(now, config.PROVIDER_TIME_ZONE)} (${config.PROVIDER_TIME_ZONE})`);

  const quota = await QuotaTracker.load(
    {
      statePath: paths.quota,
      dailyCallLimit: config.DAILY_CALL_LIMIT,
      timeZone: config.PROVIDER_TIME_ZONE,
      anomalyWindowMinutes: config.QUOTA_ANOMALY_WINDOW_MINUTES,
      syncIntervalMinutes: config.QUOTA_SYNC_INTERVAL_MINUTES,
    },
    now,
  );
  quota.rolloverIfNeeded(now);
  const local = quota.snapshot;
  console.log(`\nLocal:     ${local.callsUsed}/${config.DAILY_CALL_LIMIT} used on ${local.date}`);
  console.log(`Drift:     ${Math.abs(local.callsUsed - ((limit ?? local.apiLimit) - remaining))} calls`);
}

main().catch((err) => {
  console.error('Rate limit check failed:', err);
  process.exit(1);
});
