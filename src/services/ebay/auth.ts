import pino from 'pino';
import { z } from 'zod';
import { loadState, saveState } from '../state/atomic-store.js';
import { AuthError, getErrorMessage, logError } from '../../utils/errors.js';
import { ebayTokenResponseSchema } from './types.js';

const logger = pino({ name: 'ebay-auth' });

const TOKEN_PATH = '/identity/v1/oauth2/token';
const SCOPE = 'https://api.ebay.com/oauth/api_scope';
const REFRESH_BUFFER_MS = 60 * 1000; // never hand out a token within a minute of expiry
const MAX_RETRIES = 2;

export const tokenStateSchema = z.object({
  value: z.string().min(1),
  expiresAt: z.string().datetime({ offset: true }),
});

export type TokenState = z.infer<typeof tokenStateSchema>;

/** What the search client needs from the credential layer. */
export interface TokenSource {
  getValidToken(): Promise<string>;
  invalidate(): void;
}

export interface TokenManagerOptions {
  clientId: string;
  clientSecret: string;
  apiBase: string;
  statePath: string;
  scope?: string;
  refreshBufferMs?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Client-credentials token for the Browse API, cached in memory and on disk.
 */
export class TokenManager implements TokenSource {
  private cachedToken: TokenState | null = null;
  private loaded = false;

  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: TokenManagerOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
  }

  async getValidToken(): Promise<string> {
    if (!this.loaded) {
      this.cachedToken = await loadState(this.options.statePath, tokenStateSchema.nullable(), () => null);
      this.loaded = true;
    }

    if (this.cachedToken && this.isFresh(this.cachedToken)) {
      return this.cachedToken.value;
    }

    logger.info('Fetching new eBay OAuth token');
    const next = await this.requestToken();
    this.cachedToken = next;

    try {
      await saveState(this.options.statePath, next);
    } catch (error) {
      logError('token_persist_failed', error, { statePath: this.options.statePath });
    }

    return next.value;
  }

  /** Forget the current token so the next call exchanges credentials again. */
  invalidate(): void {
    this.cachedToken = null;
    this.loaded = true;
  }

  private isFresh(token: TokenState): boolean {
    const buffer = this.options.refreshBufferMs ?? REFRESH_BUFFER_MS;
    return Date.parse(token.expiresAt) - this.now().getTime() > buffer;
  }

  private async requestToken(): Promise<TokenState> {
    const credentials = Buffer.from(`${this.options.clientId}:${this.options.clientSecret}`).toString('base64');
    const url = `${this.options.apiBase}${TOKEN_PATH}`;
    const scope = this.options.scope ?? SCOPE;
    const attempts = MAX_RETRIES + 1;
    const baseDelay = this.options.retryDelayMs ?? 2000;

    let lastError: unknown;
    let lastStatus: number | undefined;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (attempt > 1) {
        const waitMs = baseDelay * 2 ** (attempt - 2);
        logger.warn({ attempt, waitMs, status: lastStatus }, 'Retrying eBay token request');
        await this.sleep(waitMs);
      }

      let res: Response;
      try {
        res = await this.fetchImpl(url, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
            Authorization: `Basic ${credentials}`,
          },
          body: `grant_type=client_credentials&scope=${encodeURIComponent(scope)}`,
          signal: AbortSignal.timeout(this.options.timeoutMs ?? 15_000),
        });
      } catch (error) {
        lastError = error;
        lastStatus = undefined;
        logger.warn({ attempt, err: getErrorMessage(error) }, 'eBay token request failed');
        continue;
      }

      if (res.ok) {
        let json: unknown;
        try {
          json = await res.json();
        } catch (error) {
          // Proxies and gateways answer 200 with an HTML page; try again.
          lastError = error;
          lastStatus = res.status;
          logger.warn({ attempt, status: res.status, err: getErrorMessage(error) }, 'eBay token response was not JSON');
          continue;
        }
        const parsed = ebayTokenResponseSchema.safeParse(json);
        if (!parsed.success) {
          throw new AuthError('eBay token response was malformed', { status: res.status, attempts: attempt });
        }
        const expiresAt = new Date(this.now().getTime() + parsed.data.expires_in * 1000);
        logger.info({ expiresIn: parsed.data.expires_in }, 'eBay OAuth token obtained');
        return { value: parsed.data.access_token, expiresAt: expiresAt.toISOString() };
      }

      lastStatus = res.status;
      const body = await res.text();

      if (res.status === 429 || res.status >= 500) {
        lastError = new Error(`HTTP ${res.status}`);
        logger.warn({ attempt, status: res.status }, 'eBay token endpoint unavailable');
        continue;
      }

      throw new AuthError(`eBay token request rejected (${res.status}): ${body.slice(0, 200)}`, {
        status: res.status,
        attempts: attempt,
      });
    }

    throw new AuthError(`eBay token request failed after ${attempts} attempts`, {
      status: lastStatus,
      attempts,
      cause: lastError,
    });
  }
}
