import { describe, expect, it } from 'vitest';
import { classifyListing, inPriceBand } from '../../services/scanner/classifier.js';
import type { SeenItem } from '../../services/scanner/seen-store.js';
import { makeSpec } from '../helpers.js';

const seenAt50: SeenItem = {
  itemId: 'X123',
  lastPrice: 50,
  firstSeenAt: '2024-07-01T12:00:00.000Z',
  lastSeenAt: '2024-07-01T12:00:00.000Z',
};

describe('classifyListing', () => {
  const spec = makeSpec({ minPrice: 0, maxPrice: 45 });

  it('calls a first sighting new', () => {
    expect(classifyListing(40, undefined, spec)).toEqual({ kind: 'new' });
  });

  it('records a first sighting above the band without reporting it', () => {
    expect(classifyListing(50, undefined, spec)).toEqual({ kind: 'out-of-band' });
  });

  it('records a first sighting below the minimum without reporting it', () => {
    expect(classifyListing(5, undefined, makeSpec({ minPrice: 10 }))).toEqual({ kind: 'out-of-band' });
  });

  it('reports a drop into the band', () => {
    expect(classifyListing(40, seenAt50, spec)).toEqual({ kind: 'price-drop', previousPrice: 50 });
  });

  it('ignores a price rise', () => {
    expect(classifyListing(55, seenAt50, spec)).toEqual({ kind: 'seen' });
  });

  it('ignores an unchanged price', () => {
    expect(classifyListing(50, seenAt50, makeSpec({ maxPrice: 100 }))).toEqual({ kind: 'seen' });
  });

  it('ignores a drop that stays above the band', () => {
    expect(classifyListing(48, seenAt50, spec)).toEqual({ kind: 'seen' });
  });

  it('ignores a drop below the minimum', () => {
    expect(classifyListing(20, seenAt50, makeSpec({ minPrice: 30, maxPrice: 45 }))).toEqual({ kind: 'seen' });
  });

  it('treats a missing maximum as unbounded', () => {
    expect(classifyListing(49, seenAt50, makeSpec())).toEqual({ kind: 'price-drop', previousPrice: 50 });
  });
});

describe('inPriceBand', () => {
  it('includes both bounds', () => {
    const spec = makeSpec({ minPrice: 10, maxPrice: 45 });
    expect(inPriceBand(10, spec)).toBe(true);
    expect(inPriceBand(45, spec)).toBe(true);
    expect(inPriceBand(45.01, spec)).toBe(false);
  });
});
