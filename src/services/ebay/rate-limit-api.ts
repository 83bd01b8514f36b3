import pino from 'pino';
import { AuthError, PermanentHttpError, TransientHttpError, err, getErrorMessage, ok } from '../../utils/errors.js';
import type { Result } from '../../utils/errors.js';
import type { TokenSource } from './auth.js';
import { ebayRateLimitResponseSchema } from './types.js';
import type { EbayRateLimitResponse, ProviderQuotaSnapshot } from './types.js';

const logger = pino({ name: 'ebay-rate-limit-api' });

const RATE_LIMIT_PATH = '/developer/analytics/v1_beta/rate_limit/';
const DAILY_WINDOW_SECONDS = 86_400;
const BROWSE_RESOURCE = 'buy.browse';

type Rate = EbayRateLimitResponse['rateLimits'][number]['resources'][number]['rates'][number];

/**
 * Pick the daily Browse rate, or the first daily rate of any API when the
 * Browse entry is missing.
 */
export function pickDailyBrowseRate(body: EbayRateLimitResponse): ProviderQuotaSnapshot | null {
  let fallback: Rate | undefined;
  let browse: Rate | undefined;

  for (const api of body.rateLimits) {
    for (const resource of api.resources) {
      const daily = resource.rates.find((r) => r.timeWindow === DAILY_WINDOW_SECONDS);
      if (!daily) continue;
      fallback ??= daily;
      if (resource.name === BROWSE_RESOURCE) {
        browse = daily;
        break;
      }
    }
    if (browse) break;
  }

  const rate = browse ?? fallback;
  if (!rate || rate.remaining === undefined) return null;

  return {
    limit: rate.limit,
    remaining: rate.remaining,
    resetTimeUtc: rate.reset ?? null,
  };
}

export interface ProviderQuotaProbeOptions {
  apiBase: string;
  tokens: TokenSource;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export type ProbeOutcome = Result<ProviderQuotaSnapshot, AuthError | TransientHttpError | PermanentHttpError>;

/**
 * Asks the Developer Analytics API how much of today's Browse quota is left.
 * This call is not billed against the Browse quota itself.
 */
export class ProviderQuotaProbe {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: ProviderQuotaProbeOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchProviderQuota(): Promise<ProbeOutcome> {
    let token: string;
    try {
      token = await this.options.tokens.getValidToken();
    } catch (error) {
      if (error instanceof AuthError) return err(error);
      throw error;
    }

    const params = new URLSearchParams({ api_context: 'buy', api_name: 'browse' });
    const url = `${this.options.apiBase}${RATE_LIMIT_PATH}?${params.toString()}`;

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        headers: { Authorization: `Bearer ${token}`, 'Content-Type': 'application/json' },
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 15_000),
      });
    } catch (error) {
      logger.warn({ err: getErrorMessage(error) }, 'Rate limit API request failed');
      return err(new TransientHttpError(`Rate limit API unreachable: ${getErrorMessage(error)}`, { attempts: 1, cause: error }));
    }

    if (!res.ok) {
      logger.warn({ status: res.status }, 'Rate limit API HTTP error');
      if (res.status === 401) this.options.tokens.invalidate();
      if (res.status === 429 || res.status >= 500) {
        return err(new TransientHttpError(`Rate limit API returned ${res.status}`, { status: res.status, attempts: 1 }));
      }
      return err(new PermanentHttpError(`Rate limit API returned ${res.status}`, res.status));
    }

    const parsed = ebayRateLimitResponseSchema.safeParse(await res.json().catch(() => null));
    const snapshot = parsed.success ? pickDailyBrowseRate(parsed.data) : null;
    if (!snapshot) {
      logger.warn('Could not find Browse API rate limits in response');
      return err(new PermanentHttpError('Browse API limits not found in rate limit response', res.status));
    }

    logger.info(snapshot, 'Provider quota fetched');
    return ok(snapshot);
  }
}
