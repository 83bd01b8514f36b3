import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';
import { searchSpecSchema } from '../config/searches.js';
import type { SearchSpec } from '../config/searches.js';
import type { TokenSource } from '../services/ebay/auth.js';
import type { ListingResult } from '../services/ebay/types.js';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'listing-watch-'));
}

export function makeSpec(overrides: Record<string, unknown> = {}): SearchSpec {
  return searchSpecSchema.parse({ name: 'Handhelds', query: 'steam deck', ...overrides });
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

export function makeTokens(token = 'test-token') {
  const tokens = {
    getValidToken: vi.fn<TokenSource['getValidToken']>().mockResolvedValue(token),
    invalidate: vi.fn<TokenSource['invalidate']>(),
  };
  return tokens;
}

export function makeListing(itemId: string, price: number, overrides: Partial<ListingResult> = {}): ListingResult {
  return {
    itemId,
    title: `Steam Deck ${itemId}`,
    price,
    currency: 'USD',
    url: `https://www.ebay.com/itm/${itemId}`,
    condition: 'Used',
    endDate: null,
    availabilityStatus: 'IN_STOCK',
    locationCountry: 'US',
    locationRegion: null,
    shippingCost: 0,
    sellerFeedback: { username: 'seller1', score: 120, percentage: '99.8' },
    imageUrl: null,
    buyingOptions: ['FIXED_PRICE'],
    bestOffer: false,
    createdAt: null,
    ...overrides,
  };
}
