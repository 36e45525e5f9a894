import type { AppConfig } from '../config.js';
import { createKalshiClient, type MarketSource } from './client.js';
import { StubMarketSource } from './stub.js';

export function createMarketSource(config: AppConfig): MarketSource {
  if (config.kalshi.offline) {
    console.log('📴 KALSHI_OFFLINE set, using stub markets');
    return new StubMarketSource();
  }
  return createKalshiClient(config.kalshi);
}
