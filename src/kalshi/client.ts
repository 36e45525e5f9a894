import { constants, createPrivateKey, sign, type KeyObject } from 'node:crypto';
import { readFileSync } from 'node:fs';
import type { KalshiConfig, MarketCategory } from '../config.js';
import type { MarketSnapshot } from '../types/index.js';
import type { PriceSource } from '../engine/watch.js';
import { errorMessage, SourceUnavailableError } from '../errors.js';
import { moduleLogger } from '../logger.js';
import { clamp01, isRecord, pickNumber, pickString } from '../tools/utils.js';

const log = moduleLogger('kalshi');

export interface MarketSource extends PriceSource {
  listTopMarkets(category: MarketCategory, limit?: number): Promise<MarketSnapshot[]>;
}

interface KalshiMarketResponse {
  ticker: string;
  event_ticker?: string;
  title?: string;
  subtitle?: string;
  status?: string;
  // quotes already converted to 0-1
  yes_bid?: number | null;
  yes_ask?: number | null;
  last_price?: number | null;
  volume?: number | null;
  open_interest?: number | null;
  liquidity?: number | null;
  close_time?: string | null;
}

/**
 * Kalshi sends integer cents (`yes_bid: 1` is 1¢) and, on newer responses,
 * a `*_dollars` string. The dollar field wins when it parses.
 */
export function normalizePrice(cents: unknown, dollars?: unknown): number | null {
  const fromDollars = pickNumber(dollars);
  if (fromDollars != null) return fromDollars;
  const n = pickNumber(cents);
  return n == null ? null : n / 100;
}

function toMarketResponse(raw: unknown): KalshiMarketResponse | null {
  if (!isRecord(raw)) return null;
  const ticker = pickString(raw.ticker).trim();
  if (!ticker) return null;
  return {
    ticker,
    event_ticker: pickString(raw.event_ticker) || undefined,
    title: pickString(raw.title) || undefined,
    subtitle: pickString(raw.subtitle) || undefined,
    status: pickString(raw.status) || undefined,
    yes_bid: normalizePrice(raw.yes_bid, raw.yes_bid_dollars),
    yes_ask: normalizePrice(raw.yes_ask, raw.yes_ask_dollars),
    last_price: normalizePrice(raw.last_price, raw.last_price_dollars),
    volume: pickNumber(raw.volume),
    open_interest: pickNumber(raw.open_interest),
    liquidity: pickNumber(raw.liquidity),
    close_time: pickString(raw.close_time) || null
  };
}

export function quotePrice(lastPrice: number | null, yesBid: number | null, yesAsk: number | null): number {
  if (lastPrice != null && lastPrice > 0) return clamp01(lastPrice);
  if (yesBid != null && yesAsk != null && (yesBid > 0 || yesAsk > 0)) return clamp01((yesBid + yesAsk) / 2);
  return 0;
}

export function parseMarket(raw: KalshiMarketResponse, category: MarketCategory, now: Date): MarketSnapshot {
  const yesBid = raw.yes_bid ?? null;
  const yesAsk = raw.yes_ask ?? null;
  const lastPrice = raw.last_price ?? null;

  return Object.freeze({
    marketId: raw.ticker,
    eventId: raw.event_ticker || raw.ticker,
    title: raw.title || raw.subtitle || raw.ticker,
    price: quotePrice(lastPrice, yesBid, yesAsk),
    timestamp: now.toISOString(),
    category,
    yesBid,
    yesAsk,
    volume: raw.volume ?? 0,
    openInterest: raw.open_interest ?? 0,
    liquidity: raw.liquidity ?? 0,
    closeTime: raw.close_time ?? null,
    history: Object.freeze([])
  });
}

export interface KalshiClientOptions {
  baseUrl: string;
  seriesTicker: string;
  accessKeyId?: string | null;
  privateKey?: KeyObject | null;
  fetchImpl?: typeof fetch;
  now?: () => Date;
  /** hard cap on pages walked by listTopMarkets */
  maxPages?: number;
  timeoutMs?: number;
}

/**
 * Kalshi trade API v2. Market data endpoints are public; when a key id and
 * RSA private key are configured every request is signed as well.
 */
export class KalshiClient implements MarketSource {
  private readonly baseUrl: string;
  private readonly basePath: string;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;

  constructor(private readonly options: KalshiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.basePath = new URL(this.baseUrl).pathname.replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  get authenticated(): boolean {
    return Boolean(this.options.accessKeyId && this.options.privateKey);
  }

  // Signature covers timestamp + METHOD + path (no query string)
  signHeaders(method: string, requestPath: string): Record<string, string> {
    const { accessKeyId, privateKey } = this.options;
    if (!accessKeyId || !privateKey) return {};

    const timestamp = String(this.now().getTime());
    const message = `${timestamp}${method.toUpperCase()}${requestPath}`;
    const signature = sign('sha256', Buffer.from(message, 'utf8'), {
      key: privateKey,
      padding: constants.RSA_PKCS1_PSS_PADDING,
      saltLength: constants.RSA_PSS_SALTLEN_DIGEST
    }).toString('base64');

    return {
      'KALSHI-ACCESS-KEY': accessKeyId,
      'KALSHI-ACCESS-TIMESTAMP': timestamp,
      'KALSHI-ACCESS-SIGNATURE': signature
    };
  }

  private async get(pathAndQuery: string): Promise<unknown> {
    const url = `${this.baseUrl}${pathAndQuery}`;
    const signPath = this.basePath + pathAndQuery.split('?')[0];

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { Accept: 'application/json', ...this.signHeaders('GET', signPath) },
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 10_000)
      });
    } catch (error) {
      throw new SourceUnavailableError(`Kalshi request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new SourceUnavailableError(`Kalshi API error ${response.status}${text ? `: ${text}` : ''}`, {
        status: response.status
      });
    }

    try {
      return await response.json();
    } catch (error) {
      throw new SourceUnavailableError(`Kalshi returned invalid JSON: ${errorMessage(error)}`, { cause: error });
    }
  }

  async listTopMarkets(category: MarketCategory, limit = 10): Promise<MarketSnapshot[]> {
    const maxPages = this.options.maxPages ?? 5;
    const raw: KalshiMarketResponse[] = [];
    let cursor = '';

    for (let page = 0; page < maxPages; page++) {
      const params = new URLSearchParams({ status: 'open', limit: '100', series_ticker: this.options.seriesTicker });
      if (cursor) params.set('cursor', cursor);

      const data = await this.get(`/markets?${params.toString()}`);
      const markets = isRecord(data) && Array.isArray(data.markets) ? data.markets : [];
      for (const m of markets) {
        const parsed = toMarketResponse(m);
        if (parsed) raw.push(parsed);
      }
      log.debug({ page: page + 1, fetched: markets.length }, 'markets page');

      cursor = isRecord(data) ? pickString(data.cursor) : '';
      if (!cursor) break;
    }

    const now = this.now();
    const top = raw
      .map((m) => parseMarket(m, category, now))
      .sort((a, b) => b.volume - a.volume)
      .slice(0, limit);

    log.info({ total: raw.length, kept: top.length, series: this.options.seriesTicker }, 'fetched markets');
    return top;
  }

  async getPrice(marketId: string): Promise<number> {
    const data = await this.get(`/markets/${encodeURIComponent(marketId)}`);
    const parsed = isRecord(data) ? toMarketResponse(data.market) : null;
    if (!parsed) throw new SourceUnavailableError(`Kalshi returned no market for ${marketId}`);
    return quotePrice(parsed.last_price ?? null, parsed.yes_bid ?? null, parsed.yes_ask ?? null);
  }
}

export function loadPrivateKey(keyPath: string): KeyObject {
  return createPrivateKey(readFileSync(keyPath, 'utf8'));
}

export function createKalshiClient(config: KalshiConfig): KalshiClient {
  const privateKey = config.privateKeyPath ? loadPrivateKey(config.privateKeyPath) : null;
  if (!config.accessKeyId || !privateKey) {
    log.warn('Kalshi credentials not configured, using unauthenticated public endpoints');
  }
  return new KalshiClient({
    baseUrl: config.baseUrl,
    seriesTicker: config.seriesTicker,
    accessKeyId: config.accessKeyId,
    privateKey
  });
}
