import type { MarketCategory } from '../config.js';
import type { MarketSnapshot } from '../types/index.js';
import type { MarketSource } from './client.js';
import { SourceUnavailableError } from '../errors.js';
import { clamp01, round } from '../tools/utils.js';

interface StubMarket {
  marketId: string;
  eventId: string;
  title: string;
  price: number;
  yesBid: number;
  yesAsk: number;
  volume: number;
  openInterest: number;
  liquidity: number;
  closeTime: string;
}

const STUB_MARKETS: StubMarket[] = [
  {
    marketId: 'STUB-NBA-LAL-BOS-001',
    eventId: 'STUB-NBA-LAL-BOS',
    title: 'Lakers vs Celtics: Lakers Win',
    price: 0.53,
    yesBid: 0.5,
    yesAsk: 0.55,
    volume: 1000,
    openInterest: 500,
    liquidity: 10000,
    closeTime: '2026-03-01T00:00:00Z'
  },
  {
    marketId: 'STUB-NBA-GSW-DEN-002',
    eventId: 'STUB-NBA-GSW-DEN',
    title: 'Warriors vs Nuggets: Warriors Win',
    price: 0.41,
    yesBid: 0.39,
    yesAsk: 0.43,
    volume: 800,
    openInterest: 350,
    liquidity: 6500,
    closeTime: '2026-03-02T03:00:00Z'
  },
  {
    marketId: 'STUB-NBA-NYK-MIA-003',
    eventId: 'STUB-NBA-NYK-MIA',
    title: 'Knicks vs Heat: Knicks Win',
    price: 0.62,
    yesBid: 0.6,
    yesAsk: 0.64,
    volume: 450,
    openInterest: 220,
    liquidity: 4000,
    closeTime: '2026-03-02T00:30:00Z'
  }
];

/**
 * Offline market source. Each getPrice call drifts the YES price up a
 * cent so the watcher has something to watch.
 */
export class StubMarketSource implements MarketSource {
  private readonly polls = new Map<string, number>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async listTopMarkets(category: MarketCategory, limit = 10): Promise<MarketSnapshot[]> {
    const timestamp = this.now().toISOString();
    return STUB_MARKETS.slice(0, limit).map((m) =>
      Object.freeze({ ...m, timestamp, category, closeTime: m.closeTime, history: Object.freeze([]) })
    );
  }

  async getPrice(marketId: string): Promise<number> {
    const market = STUB_MARKETS.find((m) => m.marketId === marketId);
    if (!market) throw new SourceUnavailableError(`Unknown stub market ${marketId}`);
    const n = (this.polls.get(marketId) ?? 0) + 1;
    this.polls.set(marketId, n);
    return round(clamp01(market.price + 0.01 * n), 6);
  }
}
