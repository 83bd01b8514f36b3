import pino from 'pino';
import { getErrorMessage } from '../../utils/errors.js';

const log = pino({ name: 'telegram' });

const TELEGRAM_API = 'https://api.telegram.org';

export interface TelegramOptions {
  botToken: string;
  chatId: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

/**
 * Thin Bot API client. Returns false instead of throwing so a bad chat id
 * never takes the watcher down.
 */
export class TelegramClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: TelegramOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async sendMessage(text: string, parseMode: 'HTML' | 'Markdown' = 'HTML'): Promise<boolean> {
    try {
      const res = await this.fetchImpl(`${TELEGRAM_API}/bot${this.options.botToken}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: this.options.chatId,
          text,
          parse_mode: parseMode,
          disable_web_page_preview: true,
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 15_000),
      });

      if (!res.ok) {
        const body = await res.text();
        log.warn({ status: res.status, body: body.slice(0, 200) }, 'Telegram send failed');
        return false;
      }

      return true;
    } catch (err) {
      log.error({ err: getErrorMessage(err) }, 'Telegram send error');
      return false;
    }
  }
}
