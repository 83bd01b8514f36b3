import { CONDITION_IDS } from '../../config/searches.js';
import type { SearchSpec } from '../../config/searches.js';

/** How far above `maxPrice` the server filter reaches, so later price cuts into the band can be seen. */
export const DEFAULT_PRICE_HEADROOM = 0.15;

function upperBound(maxPrice: number, headroom: number): string {
  return headroom > 0 ? String(Math.ceil(maxPrice * (1 + headroom))) : String(maxPrice);
}

/**
 * Server-side filter string for a search spec, or null when nothing narrows it.
 *
 * Example: `price:[10..52],priceCurrency:USD,conditionIds:{3000|4000},buyingOptions:{FIXED_PRICE|BEST_OFFER}`
 */
export function buildFilter(spec: SearchSpec, priceHeadroom = 0): string | null {
  const filters: string[] = [];

  if (spec.minPrice > 0 || spec.maxPrice !== undefined) {
    const min = spec.minPrice > 0 ? String(spec.minPrice) : '';
    const max = spec.maxPrice !== undefined ? upperBound(spec.maxPrice, priceHeadroom) : '';
    filters.push(`price:[${min}..${max}]`, `priceCurrency:${spec.currency}`);
  }

  if (spec.condition !== 'any') {
    filters.push(`conditionIds:{${CONDITION_IDS[spec.condition].join('|')}}`);
  }

  if (!spec.includeAuctions) {
    filters.push('buyingOptions:{FIXED_PRICE|BEST_OFFER}');
  }

  if (spec.freeShippingOnly) {
    filters.push('maxDeliveryCost:0');
  }

  return filters.length > 0 ? filters.join(',') : null;
}

/**
 * Query parameters for one page of results, newest listings first.
 */
export function buildSearchParams(spec: SearchSpec, limit: number, priceHeadroom = 0): URLSearchParams {
  const params = new URLSearchParams({
    q: spec.query,
    sort: 'newlyListed',
    limit: String(limit),
    offset: '0',
  });

  const filter = buildFilter(spec, priceHeadroom);
  if (filter) params.set('filter', filter);
  if (spec.categoryId) params.set('category_ids', spec.categoryId);

  return params;
}
