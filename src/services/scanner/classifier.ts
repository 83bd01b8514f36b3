import type { SearchSpec } from '../../config/searches.js';
import type { SeenItem } from './seen-store.js';

export type ListingClassification =
  | { kind: 'new' }
  | { kind: 'price-drop'; previousPrice: number }
  | { kind: 'out-of-band' }
  | { kind: 'seen' };

export function inPriceBand(price: number, spec: Pick<SearchSpec, 'minPrice' | 'maxPrice'>): boolean {
  if (price < spec.minPrice) return false;
  return spec.maxPrice === undefined || price <= spec.maxPrice;
}

/**
 * First sighting inside the band → new; outside it, recorded silently so a
 * later cut into the band shows up as a price drop. A cheaper re-sighting
 * inside the band → price drop. Anything else was already reported.
 */
export function classifyListing(
  price: number,
  previous: SeenItem | undefined,
  spec: Pick<SearchSpec, 'minPrice' | 'maxPrice'>,
): ListingClassification {
  if (!previous) return inPriceBand(price, spec) ? { kind: 'new' } : { kind: 'out-of-band' };
  if (previous.lastPrice > price && inPriceBand(price, spec)) {
    return { kind: 'price-drop', previousPrice: previous.lastPrice };
  }
  return { kind: 'seen' };
}
