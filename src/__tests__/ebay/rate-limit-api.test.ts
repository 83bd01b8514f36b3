import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';

// Suppress pino log noise in tests
vi.mock('pino', () => ({
  default: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn().mockReturnThis() }),
}));

import { ProviderQuotaProbe, pickDailyBrowseRate } from '../../services/ebay/rate-limit-api.js';
import { ebayRateLimitResponseSchema } from '../../services/ebay/types.js';
import { PermanentHttpError, TransientHttpError } from '../../utils/errors.js';
import { jsonResponse, makeTokens } from '../helpers.js';

const RESET = '2024-07-02T07:00:00.000Z';

const browseBody = {
  rateLimits: [
    {
      apiContext: 'buy',
      apiName: 'Browse',
      resources: [
        { name: 'buy.browse.item.bulk', rates: [{ timeWindow: 86400, limit: 10, remaining: 9, reset: RESET }] },
        {
          name: 'buy.browse',
          rates: [
            { timeWindow: 3600, limit: 500, remaining: 480, reset: RESET },
            { timeWindow: 86400, limit: 5000, remaining: 4321, count: 679, reset: RESET },
          ],
        },
      ],
    },
  ],
};

describe('pickDailyBrowseRate', () => {
  it('prefers the daily rate of the buy.browse resource', () => {
    expect(pickDailyBrowseRate(ebayRateLimitResponseSchema.parse(browseBody))).toEqual({
      limit: 5000,
      remaining: 4321,
      resetTimeUtc: RESET,
    });
  });

  it('falls back to the first daily rate', () => {
    const body = ebayRateLimitResponseSchema.parse({
      rateLimits: [{ resources: [{ name: 'buy.other', rates: [{ timeWindow: 86400, limit: 100, remaining: 50 }] }] }],
    });
    expect(pickDailyBrowseRate(body)).toEqual({ limit: 100, remaining: 50, resetTimeUtc: null });
  });

  it('returns null without a daily rate', () => {
    const body = ebayRateLimitResponseSchema.parse({
      rateLimits: [{ resources: [{ name: 'buy.browse', rates: [{ timeWindow: 3600, remaining: 5 }] }] }],
    });
    expect(pickDailyBrowseRate(body)).toBeNull();
  });
});

describe('ProviderQuotaProbe', () => {
  let fetchImpl: Mock<typeof fetch>;
  let tokens: ReturnType<typeof makeTokens>;

  beforeEach(() => {
    fetchImpl = vi.fn<typeof fetch>();
    tokens = makeTokens();
  });

  function probe(): ProviderQuotaProbe {
    return new ProviderQuotaProbe({ apiBase: 'https://api.example.test', tokens, fetchImpl });
  }

  it('reads the Browse quota from the analytics API', async () => {
    fetchImpl.mockResolvedValueOnce(jsonResponse(browseBody));

    const outcome = await probe().fetchProviderQuota();

    expect(outcome).toEqual({ success: true, data: { limit: 5000, remaining: 4321, resetTimeUtc: RESET } });
    expect(String(fetchImpl.mock.calls[0][0])).toBe(
      'https://api.example.test/developer/analytics/v1_beta/rate_limit/?api_context=buy&api_name=browse',
    );
  });

  it('drops the token on a 401', async () => {
    fetchImpl.mockResolvedValueOnce(new Response('', { status: 401 }));

    const outcome = await probe().fetchProviderQuota();

    expect(tokens.invalidate).toHaveBeenCalledTimes(1);
    expect(outcome.success).toBe(false);
    if (outcome.success) return;
    expect(outcome.error).toBeInstanceOf(PermanentHttpError);
  });

  it('reports a 500 as transient', async () => {
    fetchImpl.mockResolvedValueOnce(new Response('', { status: 500 }));

    const outcome = await probe().fetchProviderQuota();

    expect(outcome.success).toBe(false);
    if (outcome.success) return;
    expect(outcome.error).toBeInstanceOf(TransientHttpError);
  });

  it('reports a response without Browse limits', async () => {
    fetchImpl.mockResolvedValueOnce(jsonResponse({ rateLimits: [] }));

    const outcome = await probe().fetchProviderQuota();

    expect(outcome.success).toBe(false);
  });
});
