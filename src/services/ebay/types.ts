import { z } from 'zod';

// --- Search response (Browse item_summary/search) ---

const amountSchema = z.object({
  value: z.string(),
  currency: z.string(),
});

export const ebayItemSummarySchema = z.object({
  itemId: z.string().min(1),
  title: z.string().default(''),
  price: amountSchema.optional(),
  itemWebUrl: z.string().default(''),
  itemAffiliateWebUrl: z.string().optional(),
  condition: z.string().nullish(),
  itemEndDate: z.string().optional(),
  itemCreationDate: z.string().optional(),
  buyingOptions: z.array(z.string()).default([]),
  estimatedAvailabilities: z
    .array(z.object({ estimatedAvailabilityStatus: z.string().optional() }))
    .optional(),
  itemLocation: z
    .object({
      country: z.string().optional(),
      stateOrProvince: z.string().optional(),
      city: z.string().optional(),
    })
    .optional(),
  shippingOptions: z
    .array(
      z.object({
        shippingCostType: z.string().optional(),
        shippingCost: amountSchema.optional(),
      }),
    )
    .optional(),
  seller: z
    .object({
      username: z.string().optional(),
      feedbackScore: z.number().optional(),
      feedbackPercentage: z.string().optional(),
    })
    .optional(),
  image: z.object({ imageUrl: z.string() }).optional(),
});

export type EbayItemSummary = z.infer<typeof ebayItemSummarySchema>;

/** Items are validated one by one so a single odd listing cannot sink a page. */
export const ebaySearchResponseSchema = z.object({
  href: z.string().optional(),
  total: z.number().default(0),
  next: z.string().optional(),
  limit: z.number().optional(),
  offset: z.number().optional(),
  itemSummaries: z.array(z.unknown()).default([]),
});

// --- Developer Analytics rate_limit response ---

export const ebayRateLimitResponseSchema = z.object({
  rateLimits: z
    .array(
      z.object({
        apiContext: z.string().optional(),
        apiName: z.string().optional(),
        apiVersion: z.string().optional(),
        resources: z
          .array(
            z.object({
              name: z.string().optional(),
              rates: z
                .array(
                  z.object({
                    count: z.number().optional(),
                    limit: z.number().optional(),
                    remaining: z.number().optional(),
                    reset: z.string().optional(),
                    timeWindow: z.number().optional(),
                  }),
                )
                .default([]),
            }),
          )
          .default([]),
      }),
    )
    .default([]),
});

export type EbayRateLimitResponse = z.infer<typeof ebayRateLimitResponseSchema>;

// --- OAuth token response ---

export const ebayTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().default(7200),
  token_type: z.string().optional(),
});

// --- Domain ---

export interface ListingResult {
  itemId: string;
  title: string;
  price: number;
  currency: string;
  url: string;
  affiliateUrl?: string;
  condition: string | null;
  endDate: string | null;
  availabilityStatus: string | null;
  locationCountry: string | null;
  locationRegion: string | null;
  shippingCost: number | null;
  sellerFeedback: { username: string | null; score: number | null; percentage: string | null };
  imageUrl: string | null;
  buyingOptions: string[];
  bestOffer: boolean;
  createdAt: string | null;
}

export interface ProviderQuotaSnapshot {
  limit?: number;
  remaining: number;
  resetTimeUtc: string | null;
}
