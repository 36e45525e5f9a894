import type { SnapshotRow } from '../types/index.js';

export const JUMP_THRESHOLD = 0.05;

// last price if positive, else bid/ask midpoint when either side is quoted
export function rowPrice(row: SnapshotRow): number | null {
  if (row.lastPrice != null && row.lastPrice > 0) return row.lastPrice;
  if (row.yesBid != null && row.yesAsk != null && (row.yesBid > 0 || row.yesAsk > 0)) {
    return (row.yesBid + row.yesAsk) / 2;
  }
  return null;
}

export function extractPrices(rows: readonly SnapshotRow[]): number[] {
  const prices: number[] = [];
  for (const row of rows) {
    const p = rowPrice(row);
    if (p != null) prices.push(p);
  }
  return prices;
}

export function extractSpreads(rows: readonly SnapshotRow[]): number[] {
  const spreads: number[] = [];
  for (const row of rows) {
    if (row.yesBid != null && row.yesAsk != null) spreads.push(row.yesAsk - row.yesBid);
  }
  return spreads;
}

// open interest when present, else volume
export function extractLiquidity(rows: readonly SnapshotRow[]): number[] {
  const values: number[] = [];
  for (const row of rows) {
    if (row.openInterest != null) values.push(row.openInterest);
    else if (row.volume != null) values.push(row.volume);
  }
  return values;
}

export function diffs(values: readonly number[]): number[] {
  const out: number[] = [];
  for (let i = 0; i + 1 < values.length; i++) out.push(values[i + 1] - values[i]);
  return out;
}
