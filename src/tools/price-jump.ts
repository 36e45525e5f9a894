import type { SnapshotRow } from '../types/index.js';
import type { ScoringTool } from './types.js';
import { diffs, extractPrices, JUMP_THRESHOLD } from './history.js';
import { mean, round } from './utils.js';

const MIN_SAMPLES = 5;

/** [maxJump, meanJump, jumpCount, jumpDensity] */
export function jumpFeatures(rows: readonly SnapshotRow[]): number[] {
  const prices = extractPrices(rows);
  if (prices.length < MIN_SAMPLES) return [0, 0, 0, 0];

  const moves = diffs(prices).map(Math.abs);
  const count = moves.filter((d) => d > JUMP_THRESHOLD).length;

  return [round(Math.max(...moves), 8), round(mean(moves), 8), count, round(count / moves.length, 8)];
}

export const priceJumpDetectorTool: ScoringTool = {
  name: 'price_jump_detector_tool',
  description:
    'Detects price jumps (>0.05) and computes max jump, mean jump, jump count, and jump density from recent market snapshots. Signal is the mean of that vector.',
  run: (snapshot) => mean(jumpFeatures(snapshot.history))
};
