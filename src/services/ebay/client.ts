import pino from 'pino';
import type { SearchSpec } from '../../config/searches.js';
import {
  AuthError,
  PermanentHttpError,
  RateLimitError,
  TransientHttpError,
  err,
  getErrorMessage,
  ok,
} from '../../utils/errors.js';
import type { Result, SearchError } from '../../utils/errors.js';
import type { TokenSource } from './auth.js';
import type { QuotaTracker } from './budget.js';
import { normalizeListing, rejectReason } from './listing-filter.js';
import type { RejectReason } from './listing-filter.js';
import { DEFAULT_PRICE_HEADROOM, buildSearchParams } from './query-builder.js';
import { checkRateLimitHeaders, createCallScheduler } from './rate-limiter.js';
import type { CallScheduler } from './rate-limiter.js';
import { ebayItemSummarySchema, ebaySearchResponseSchema } from './types.js';
import type { ListingResult } from './types.js';

const logger = pino({ name: 'ebay-client' });

const SEARCH_PATH = '/buy/browse/v1/item_summary/search';
const MAX_RETRIES = 2;
const MAX_RETRY_AFTER_MS = 30_000;

export type SkipReason = RejectReason | 'malformed' | 'no-price';

export interface SearchPage {
  listings: ListingResult[];
  total: number;
  skipped: Partial<Record<SkipReason, number>>;
  /** Attempts billed against the quota: every response, plus timeouts. */
  calls: number;
}

export type SearchOutcome = Result<SearchPage, SearchError>;

/** The part of the quota tracker a search needs. */
export type SearchBudget = Pick<QuotaTracker, 'canSpend' | 'recordSpend' | 'syncWithProvider'>;

export interface SearchExecutorOptions {
  apiBase: string;
  marketplaceId: string;
  campaignId?: string;
  resultsLimit: number;
  /** Fraction above `maxPrice` the server filter still returns. */
  priceHeadroom?: number;
  tokens: TokenSource;
  quota: SearchBudget;
  schedule?: CallScheduler;
  backoffBaseMs?: number;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** A timed-out request may still have been counted by eBay; a refused connection was not. */
function mayHaveReachedProvider(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('name' in error)) return false;
  return error.name === 'TimeoutError' || error.name === 'AbortError';
}

/**
 * Runs one newest-first Browse search per spec and reports the outcome as a
 * closed result instead of throwing.
 *
 * 429, 5xx and network failures share a ceiling of MAX_RETRIES retries. A 401
 * refreshes the token and retries once outside that ceiling.
 */
export class SearchExecutor {
  private readonly fetchImpl: typeof fetch;
  private readonly schedule: CallScheduler;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: SearchExecutorOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.schedule = options.schedule ?? createCallScheduler();
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
  }

  async execute(spec: SearchSpec): Promise<SearchOutcome> {
    const params = buildSearchParams(
      spec,
      this.options.resultsLimit,
      this.options.priceHeadroom ?? DEFAULT_PRICE_HEADROOM,
    );
    const url = `${this.options.apiBase}${SEARCH_PATH}?${params.toString()}`;
    const maxAttempts = MAX_RETRIES + 1;

    let token: string;
    try {
      token = await this.options.tokens.getValidToken();
    } catch (error) {
      if (error instanceof AuthError) return err(error);
      throw error;
    }

    let failures = 0;
    let calls = 0;
    let tokenRefreshed = false;
    let lastStatus: number | undefined;

    logger.info({ search: spec.name, filter: params.get('filter') }, 'Searching eBay');

    for (;;) {
      if (!this.options.quota.canSpend(1)) {
        return err(
          new RateLimitError(`Daily call budget exhausted before searching '${spec.name}'`, 'local', {
            search: spec.name,
          }),
        );
      }

      let res: Response;
      try {
        res = await this.schedule(() =>
          this.fetchImpl(url, {
            headers: this.headers(token),
            signal: AbortSignal.timeout(this.options.timeoutMs ?? 15_000),
          }),
        );
      } catch (error) {
        failures++;
        lastStatus = undefined;
        if (mayHaveReachedProvider(error)) {
          calls++;
          await this.options.quota.recordSpend(1, this.now());
        }
        logger.warn({ search: spec.name, attempt: failures, err: getErrorMessage(error) }, 'eBay search request failed');
        if (failures >= maxAttempts) {
          return err(
            new TransientHttpError(`eBay search '${spec.name}' failed: ${getErrorMessage(error)}`, {
              attempts: failures,
              cause: error,
            }),
          );
        }
        await this.sleep(this.backoffMs(failures, null));
        continue;
      }

      calls++;
      await this.options.quota.recordSpend(1, this.now());

      const snapshot = checkRateLimitHeaders(res.headers, this.now());
      if (snapshot) this.options.quota.syncWithProvider(snapshot, this.now());

      if (res.ok) {
        return this.readPage(spec, res, calls);
      }

      lastStatus = res.status;
      const body = await res.text();

      if (res.status === 401) {
        if (tokenRefreshed) {
          return err(new AuthError(`eBay rejected a freshly issued token for '${spec.name}'`, { status: 401 }));
        }
        tokenRefreshed = true;
        logger.warn({ search: spec.name }, 'Got 401 from eBay, refreshing token and retrying');
        this.options.tokens.invalidate();
        try {
          token = await this.options.tokens.getValidToken();
        } catch (error) {
          if (error instanceof AuthError) return err(error);
          throw error;
        }
        continue;
      }

      if (res.status === 429 || res.status >= 500) {
        failures++;
        logger.warn({ search: spec.name, status: res.status, attempt: failures }, 'eBay search returned a retryable status');
        if (failures >= maxAttempts) {
          return err(
            new TransientHttpError(`eBay search '${spec.name}' kept failing (${res.status})`, {
              status: lastStatus,
              attempts: failures,
            }),
          );
        }
        await this.sleep(this.backoffMs(failures, res.headers.get('Retry-After')));
        continue;
      }

      return err(
        new PermanentHttpError(`eBay search '${spec.name}' rejected (${res.status}): ${body.slice(0, 200)}`, res.status, {
          search: spec.name,
        }),
      );
    }
  }

  private headers(token: string): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      'X-EBAY-C-MARKETPLACE-ID': this.options.marketplaceId,
      'Content-Type': 'application/json',
    };
    if (this.options.campaignId) {
      headers['X-EBAY-C-ENDUSERCTX'] = `affiliateCampaignId=${this.options.campaignId}`;
    }
    return headers;
  }

  private backoffMs(failures: number, retryAfter: string | null): number {
    const exponential = (this.options.backoffBaseMs ?? 1000) * 2 ** (failures - 1);
    const seconds = retryAfter === null ? NaN : Number.parseInt(retryAfter, 10);
    if (Number.isNaN(seconds)) return exponential;
    return Math.min(Math.max(exponential, seconds * 1000), MAX_RETRY_AFTER_MS);
  }

  private async readPage(spec: SearchSpec, res: Response, calls: number): Promise<SearchOutcome> {
    let json: unknown;
    try {
      json = await res.json();
    } catch (error) {
      return err(
        new PermanentHttpError(`eBay search '${spec.name}' returned unreadable JSON: ${getErrorMessage(error)}`, res.status),
      );
    }

    const parsed = ebaySearchResponseSchema.safeParse(json);
    if (!parsed.success) {
      return err(new PermanentHttpError(`eBay search '${spec.name}' returned an unexpected shape`, res.status));
    }

    const now = this.now();
    const listings: ListingResult[] = [];
    const skipped: Partial<Record<SkipReason, number>> = {};
    const skip = (reason: SkipReason) => {
      skipped[reason] = (skipped[reason] ?? 0) + 1;
    };

    for (const raw of parsed.data.itemSummaries) {
      const item = ebayItemSummarySchema.safeParse(raw);
      if (!item.success) {
        skip('malformed');
        continue;
      }
      const listing = normalizeListing(item.data);
      if (!listing) {
        skip('no-price');
        continue;
      }
      const reason = rejectReason(listing, spec, now);
      if (reason) {
        skip(reason);
        continue;
      }
      listings.push(listing);
    }

    logger.info(
      { search: spec.name, returned: parsed.data.itemSummaries.length, kept: listings.length, skipped, calls },
      'eBay search complete',
    );

    return ok({ listings, total: parsed.data.total, skipped, calls });
  }
}
