import pino from 'pino';
import type { AppConfig } from '../../config/index.js';
import type { ListingResult } from '../ebay/types.js';
import { TelegramClient } from './telegram.js';
import type { AlertSeverity, NewListingsBatch, Notifier, PriceDropBatch } from './types.js';

const log = pino({ name: 'listing-alerts' });

// Telegram caps a message at 4096 characters; ten listings stay well under.
const LISTINGS_PER_MESSAGE = 10;

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

export function formatPrice(amount: number, currency: string): string {
  return currency === 'USD' ? `$${amount.toFixed(2)}` : `${amount.toFixed(2)} ${currency}`;
}

function chunk<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

function listingLink(listing: ListingResult): string {
  const url = listing.affiliateUrl ?? listing.url;
  return `<a href="${escapeHtml(url)}">${escapeHtml(listing.title || listing.itemId)}</a>`;
}

function listingDetails(listing: ListingResult): string {
  const parts: string[] = [];
  if (listing.condition) parts.push(escapeHtml(listing.condition));
  if (listing.bestOffer) parts.push('Best Offer');
  if (listing.locationCountry) parts.push(escapeHtml(listing.locationCountry));
  return parts.join(' · ');
}

export function formatNewListingsMessages(batch: NewListingsBatch): string[] {
  const pages = chunk(batch.listings, LISTINGS_PER_MESSAGE);
  return pages.map((page, index) => {
    const suffix = pages.length > 1 ? ` (${index + 1}/${pages.length})` : '';
    const header = `🆕 <b>${escapeHtml(batch.searchName)}</b>: ${batch.listings.length} new listing${
      batch.listings.length === 1 ? '' : 's'
    }${suffix}`;
    const lines = page.map((l) => {
      const details = listingDetails(l);
      return `• <b>${formatPrice(l.price, l.currency)}</b> ${listingLink(l)}${details ? `\n  ${details}` : ''}`;
    });
    return [header, ...lines].join('\n');
  });
}

export function formatPriceDropMessages(batch: PriceDropBatch): string[] {
  const pages = chunk(batch.drops, LISTINGS_PER_MESSAGE);
  return pages.map((page, index) => {
    const suffix = pages.length > 1 ? ` (${index + 1}/${pages.length})` : '';
    const header = `📉 <b>${escapeHtml(batch.searchName)}</b>: ${batch.drops.length} price drop${
      batch.drops.length === 1 ? '' : 's'
    }${suffix}`;
    const lines = page.map(({ listing, previousPrice }) => {
      const was = formatPrice(previousPrice, listing.currency);
      const now = formatPrice(listing.price, listing.currency);
      return `• <s>${was}</s> → <b>${now}</b> ${listingLink(listing)}`;
    });
    return [header, ...lines].join('\n');
  });
}

export function formatSystemAlert(severity: AlertSeverity, title: string, details: string): string {
  const emoji = severity === 'critical' ? '🚨' : '⚠️';
  return `${emoji} <b>${escapeHtml(title)}</b>\n${escapeHtml(details)}`;
}

/**
 * Sends each batch as one or more HTML messages. A message Telegram refuses
 * is reported as an error so the caller can log which batch was lost.
 */
export class TelegramNotifier implements Notifier {
  constructor(private readonly client: TelegramClient) {}

  async sendNewListings(batch: NewListingsBatch): Promise<void> {
    await this.sendAll(formatNewListingsMessages(batch), batch.searchName);
    log.info({ search: batch.searchName, count: batch.listings.length }, 'New listing alert sent');
  }

  async sendPriceDrops(batch: PriceDropBatch): Promise<void> {
    await this.sendAll(formatPriceDropMessages(batch), batch.searchName);
    log.info({ search: batch.searchName, count: batch.drops.length }, 'Price drop alert sent');
  }

  async sendSystemAlert(severity: AlertSeverity, title: string, details: string): Promise<void> {
    await this.sendAll([formatSystemAlert(severity, title, details)], 'system');
  }

  private async sendAll(messages: string[], label: string): Promise<void> {
    let failed = 0;
    for (const text of messages) {
      if (!(await this.client.sendMessage(text))) failed++;
    }
    if (failed > 0) {
      throw new Error(`Telegram rejected ${failed}/${messages.length} message(s) for ${label}`);
    }
  }
}

/** Fallback when no chat is configured: alerts only reach the log. */
export class LogNotifier implements Notifier {
  async sendNewListings(batch: NewListingsBatch): Promise<void> {
    for (const l of batch.listings) {
      log.info(
        { search: batch.searchName, itemId: l.itemId, price: l.price, currency: l.currency, url: l.url },
        `New listing: ${l.title}`,
      );
    }
  }

  async sendPriceDrops(batch: PriceDropBatch): Promise<void> {
    for (const { listing, previousPrice } of batch.drops) {
      log.info(
        { search: batch.searchName, itemId: listing.itemId, previousPrice, price: listing.price, url: listing.url },
        `Price drop: ${listing.title}`,
      );
    }
  }

  async sendSystemAlert(severity: AlertSeverity, title: string, details: string): Promise<void> {
    log.warn({ severity, details }, title);
  }
}

export function createNotifier(
  config: Pick<AppConfig, 'TELEGRAM_BOT_TOKEN' | 'TELEGRAM_CHAT_ID'>,
  fetchImpl?: typeof fetch,
): Notifier {
  if (config.TELEGRAM_BOT_TOKEN && config.TELEGRAM_CHAT_ID) {
    log.info('Telegram notifications enabled');
    return new TelegramNotifier(
      new TelegramClient({ botToken: config.TELEGRAM_BOT_TOKEN, chatId: config.TELEGRAM_CHAT_ID, fetchImpl }),
    );
  }
  log.info('Telegram not configured, alerts go to the log only');
  return new LogNotifier();
}
