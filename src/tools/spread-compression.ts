import type { SnapshotRow } from '../types/index.js';
import type { ScoringTool } from './types.js';
import { extractSpreads } from './history.js';
import { mean, round, stdev } from './utils.js';

const MIN_SAMPLES = 3;

/** [meanSpread, spreadStd, spreadTrend, compressionRatio] */
export function spreadFeatures(rows: readonly SnapshotRow[]): number[] {
  const spreads = extractSpreads(rows);
  if (spreads.length < MIN_SAMPLES) return [0, 0, 0, 0];

  const avg = mean(spreads);
  const first = spreads[0];
  const last = spreads[spreads.length - 1];

  return [
    round(avg, 8),
    round(stdev(spreads), 8),
    round(last - first, 8),
    round(avg !== 0 ? last / avg : 0, 8)
  ];
}

export const spreadCompressionTool: ScoringTool = {
  name: 'spread_compression_tool',
  description:
    'Computes mean spread, spread std-dev, spread trend, and compression ratio from recent market snapshots. Signal is the mean of that vector.',
  run: (snapshot) => mean(spreadFeatures(snapshot.history))
};
