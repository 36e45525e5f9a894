import type { SnapshotRow } from '../types/index.js';
import type { ScoringTool } from './types.js';
import { diffs, extractLiquidity, extractPrices, extractSpreads, JUMP_THRESHOLD } from './history.js';
import { mean, round, stdev } from './utils.js';

const MIN_SAMPLES = 3;

/** [volatility, priceRange, meanSpread, jumpRate, liquidityProxy] */
export function volatilityFeatures(rows: readonly SnapshotRow[]): number[] {
  const prices = extractPrices(rows);
  if (prices.length < MIN_SAMPLES) return [0, 0, 0, 0, 0];

  const steps = diffs(prices);
  const jumps = steps.filter((d) => Math.abs(d) > JUMP_THRESHOLD).length;

  return [
    round(stdev(prices), 8),
    round(Math.max(...prices) - Math.min(...prices), 8),
    round(mean(extractSpreads(rows)), 8),
    round(steps.length ? jumps / steps.length : 0, 8),
    round(mean(extractLiquidity(rows)), 4)
  ];
}

export const snapshotVolatilityTool: ScoringTool = {
  name: 'snapshot_volatility_tool',
  description:
    'Computes volatility, price range, mean spread, jump rate, and liquidity proxy from recent market snapshots. Signal is the mean of that vector.',
  run: (snapshot) => mean(volatilityFeatures(snapshot.history))
};
