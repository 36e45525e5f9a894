import type { MarketSnapshot, SnapshotRow } from '../src/types/index.js';

export function makeSnapshot(overrides: Partial<MarketSnapshot> = {}): MarketSnapshot {
  return {
    marketId: 'KXNBA-TEST-001',
    eventId: 'KXNBA-TEST',
    title: 'Test Home vs Test Away: Home Win',
    price: 0.5,
    timestamp: '2026-10-18T12:00:00.000Z',
    category: 'basketball',
    yesBid: 0.48,
    yesAsk: 0.52,
    volume: 1000,
    openInterest: 400,
    liquidity: 5000,
    closeTime: null,
    history: [],
    ...overrides
  };
}

export function makeRow(overrides: Partial<SnapshotRow> = {}): SnapshotRow {
  return {
    marketId: 'KXNBA-TEST-001',
    timestamp: '2026-10-18T12:00:00.000Z',
    lastPrice: null,
    yesBid: null,
    yesAsk: null,
    volume: null,
    openInterest: null,
    ...overrides
  };
}
