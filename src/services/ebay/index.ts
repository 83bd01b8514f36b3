export { TokenManager, tokenStateSchema } from './auth.js';
export type { TokenSource, TokenState, TokenManagerOptions } from './auth.js';
export { QuotaTracker, createFreshQuotaState, quotaStateSchema } from './budget.js';
export type { QuotaState, QuotaTrackerOptions, SyncOutcome } from './budget.js';
export { SearchExecutor } from './client.js';
export type { SearchExecutorOptions, SearchOutcome, SearchPage, SearchBudget, SkipReason } from './client.js';
export { ProviderQuotaProbe, pickDailyBrowseRate } from './rate-limit-api.js';
export type { ProbeOutcome } from './rate-limit-api.js';
export { createCallScheduler, checkRateLimitHeaders } from './rate-limiter.js';
export type { CallScheduler } from './rate-limiter.js';
export { providerDate, lastResetAt, nextResetAt, minutesSinceReset } from './provider-clock.js';
export type { ListingResult, ProviderQuotaSnapshot } from './types.js';
