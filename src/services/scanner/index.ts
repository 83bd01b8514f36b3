export { ScannerService } from './scanner-service.js';
export type { CycleQuota, CycleReport, QuotaProbe, ScannerServiceOptions, SearchRunner } from './scanner-service.js';
export { ScanLoop } from './scan-loop.js';
export type { CycleRunner, LoopState, ScanLoopOptions } from './scan-loop.js';
export { SeenItemStore, SEEN_MAX_AGE_DAYS } from './seen-store.js';
export type { SeenItem, SeenItemStoreOptions } from './seen-store.js';
export { classifyListing, inPriceBand } from './classifier.js';
export type { ListingClassification } from './classifier.js';
export { FileShutdownSignal } from './shutdown.js';
export type { ShutdownSignal } from './shutdown.js';
export { computeSleepSeconds, failureBackoffSeconds } from './pacing.js';
export type { PacingInput, PacingSettings, SleepPlan } from './pacing.js';
