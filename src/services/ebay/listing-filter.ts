import type { SearchSpec } from '../../config/searches.js';
import type { EbayItemSummary, ListingResult } from './types.js';

const QUERY_STOPWORDS = new Set([
  'the', 'a', 'an', 'and', 'or', 'in', 'on', 'at', 'to', 'for', 'of', 'with', 'new', 'used',
]);

export type RejectReason =
  | 'expired'
  | 'out-of-stock'
  | 'auction-only'
  | 'excluded-word'
  | 'missing-required-word';

function parseAmount(value: string | undefined): number | null {
  if (value === undefined) return null;
  const n = Number.parseFloat(value);
  return Number.isFinite(n) ? n : null;
}

/**
 * Map a Browse item summary to a listing. Returns null when the price is missing
 * or unparseable, since such a listing can be neither deduplicated by price nor
 * compared against a band.
 */
export function normalizeListing(item: EbayItemSummary): ListingResult | null {
  const price = parseAmount(item.price?.value);
  if (price === null) return null;

  const shipping = item.shippingOptions?.[0]?.shippingCost?.value;

  return {
    itemId: item.itemId,
    title: item.title,
    price,
    currency: item.price?.currency ?? 'USD',
    url: item.itemWebUrl,
    affiliateUrl: item.itemAffiliateWebUrl,
    condition: item.condition ?? null,
    endDate: item.itemEndDate ?? null,
    availabilityStatus: item.estimatedAvailabilities?.[0]?.estimatedAvailabilityStatus ?? null,
    locationCountry: item.itemLocation?.country ?? null,
    locationRegion: item.itemLocation?.stateOrProvince ?? null,
    shippingCost: parseAmount(shipping),
    sellerFeedback: {
      username: item.seller?.username ?? null,
      score: item.seller?.feedbackScore ?? null,
      percentage: item.seller?.feedbackPercentage ?? null,
    },
    imageUrl: item.image?.imageUrl ?? null,
    buyingOptions: item.buyingOptions,
    bestOffer: item.buyingOptions.includes('BEST_OFFER'),
    createdAt: item.itemCreationDate ?? null,
  };
}

/** Words a title must contain: the explicit list, or the significant words of the query. */
export function requiredTerms(spec: SearchSpec): string[] {
  if (spec.requiredWords.length > 0) return [...spec.requiredWords];
  return spec.query
    .toLowerCase()
    .split(/\s+/)
    .filter((w) => (w.length > 1 || /^\d$/.test(w)) && !QUERY_STOPWORDS.has(w));
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function containsToken(title: string, word: string): boolean {
  return new RegExp(`(?<![a-z0-9])${escapeRegExp(word)}(?![a-z0-9])`).test(title);
}

/**
 * Why a listing should not be reported for `spec`, or null when it passes.
 */
export function rejectReason(listing: ListingResult, spec: SearchSpec, now: Date): RejectReason | null {
  if (listing.endDate !== null) {
    const end = Date.parse(listing.endDate);
    if (!Number.isNaN(end) && end < now.getTime()) return 'expired';
  }

  if (listing.availabilityStatus === 'OUT_OF_STOCK') return 'out-of-stock';

  if (
    !spec.includeAuctions &&
    listing.buyingOptions.includes('AUCTION') &&
    !listing.buyingOptions.includes('FIXED_PRICE')
  ) {
    return 'auction-only';
  }

  const title = listing.title.toLowerCase();
  if (spec.excludeWords.some((w) => title.includes(w))) return 'excluded-word';
  if (!requiredTerms(spec).every((w) => containsToken(title, w))) return 'missing-required-word';

  return null;
}
