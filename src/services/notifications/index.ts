export { TelegramClient } from './telegram.js';
export type { TelegramOptions } from './telegram.js';
export {
  LogNotifier,
  TelegramNotifier,
  createNotifier,
  escapeHtml,
  formatNewListingsMessages,
  formatPriceDropMessages,
  formatSystemAlert,
} from './listing-alerts.js';
export type { AlertSeverity, NewListingsBatch, Notifier, PriceDrop, PriceDropBatch } from './types.js';
