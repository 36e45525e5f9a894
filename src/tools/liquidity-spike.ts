import type { SnapshotRow } from '../types/index.js';
import type { ScoringTool } from './types.js';
import { extractLiquidity } from './history.js';
import { mean, round, stdev } from './utils.js';

const MIN_SAMPLES = 5;

/** [meanLiquidity, stdLiquidity, latestVsMean, zscoreLatest] */
export function liquidityFeatures(rows: readonly SnapshotRow[]): number[] {
  const series = extractLiquidity(rows);
  if (series.length < MIN_SAMPLES) return [0, 0, 0, 0];

  const avg = mean(series);
  const std = stdev(series);
  const latest = series[series.length - 1];

  return [
    round(avg, 4),
    round(std, 4),
    round(avg !== 0 ? latest / avg : 0, 8),
    round(std !== 0 ? (latest - avg) / std : 0, 8)
  ];
}

export const liquiditySpikeTool: ScoringTool = {
  name: 'liquidity_spike_tool',
  description:
    'Computes mean liquidity, std liquidity, latest-vs-mean ratio, and z-score of the latest observation (open interest, else volume) from recent market snapshots. Signal is the mean of that vector.',
  run: (snapshot) => mean(liquidityFeatures(snapshot.history))
};
