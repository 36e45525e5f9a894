import { describe, expect, it } from 'vitest';
import { StubMarketSource } from './stub.js';
import { SourceUnavailableError } from '../errors.js';

describe('StubMarketSource', () => {
  const now = () => new Date('2026-10-18T12:00:00.000Z');

  it('lists basketball markets stamped with the current time', async () => {
    const markets = await new StubMarketSource(now).listTopMarkets('basketball', 2);
    expect(markets.map((m) => m.marketId)).toEqual(['STUB-NBA-LAL-BOS-001', 'STUB-NBA-GSW-DEN-002']);
    expect(markets[0]).toMatchObject({ price: 0.53, category: 'basketball', timestamp: '2026-10-18T12:00:00.000Z' });
    expect(markets[0].history).toEqual([]);
  });

  it('drifts the price up one cent per poll', async () => {
    const source = new StubMarketSource(now);
    expect(await source.getPrice('STUB-NBA-GSW-DEN-002')).toBe(0.42);
    expect(await source.getPrice('STUB-NBA-GSW-DEN-002')).toBe(0.43);
    expect(await source.getPrice('STUB-NBA-LAL-BOS-001')).toBe(0.54);
  });

  it('fails for markets it does not know', async () => {
    await expect(new StubMarketSource(now).getPrice('KXNBA-REAL')).rejects.toBeInstanceOf(SourceUnavailableError);
  });
});
