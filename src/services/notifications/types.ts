import type { ListingResult } from '../ebay/types.js';

export interface NewListingsBatch {
  searchName: string;
  listings: ListingResult[];
}

export interface PriceDrop {
  listing: ListingResult;
  previousPrice: number;
}

export interface PriceDropBatch {
  searchName: string;
  drops: PriceDrop[];
}

export type AlertSeverity = 'critical' | 'warning';

/** Delivery channel for what a cycle found. */
export interface Notifier {
  sendNewListings(batch: NewListingsBatch): Promise<void>;
  sendPriceDrops(batch: PriceDropBatch): Promise<void>;
  sendSystemAlert(severity: AlertSeverity, title: string, details: string): Promise<void>;
}
