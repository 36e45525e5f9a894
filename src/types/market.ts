import type { MarketCategory } from '../config.js';

// One stored observation of a market, used as tool history
export interface SnapshotRow {
  marketId: string;
  timestamp: string;
  lastPrice: number | null;
  yesBid: number | null;
  yesAsk: number | null;
  volume: number | null;
  openInterest: number | null;
}

// Point-in-time read of one Kalshi market. Frozen once built.
export interface MarketSnapshot {
  readonly marketId: string;
  readonly eventId: string;
  readonly title: string;
  readonly price: number;            // YES price, 0-1
  readonly timestamp: string;        // ISO-8601, UTC
  readonly category: MarketCategory;
  readonly yesBid: number | null;
  readonly yesAsk: number | null;
  readonly volume: number;
  readonly openInterest: number;
  readonly liquidity: number;
  readonly closeTime: string | null;
  readonly history: readonly SnapshotRow[];  // oldest first, same market
}

export interface ToolWeight {
  toolName: string;
  weight: number;
}

// What the selector proposes. Untrusted until validated.
export interface ToolSelection {
  entries: ToolWeight[];
  threshold: number;
  rationale: string;
}

export interface ToolContribution {
  readonly toolName: string;
  readonly rawOutput: number;
  readonly weight: number;
  readonly contribution: number;
}

export interface ScoreResult {
  readonly score: number;
  readonly contributions: readonly ToolContribution[];
  readonly threshold: number;
  readonly betTriggered: boolean;
}

export type WatchOutcome =
  | { readonly kind: 'hit'; readonly price: number; readonly tickIndex: number }
  | { readonly kind: 'timed_out'; readonly lastPrice: number | null; readonly ticksElapsed: number };

export type WatchFailure = {
  readonly kind: 'source_unavailable';
  readonly message: string;
  readonly ticksElapsed: number;
};

export type RecordedOutcome = WatchOutcome | WatchFailure;

export type BetSide = 'YES' | 'NO';
export type SelectorSource = 'llm' | 'fallback';

// Durable outcome of one run. Written once, never rewritten.
export interface BetRecord {
  runId: string;
  marketId: string;
  market: Omit<MarketSnapshot, 'history'>;
  spec: {
    entries: ToolWeight[];
    threshold: number;
    rationale: string;
  };
  score: {
    score: number;
    contributions: ToolContribution[];
    threshold: number;
    betTriggered: boolean;
  };
  outcome: RecordedOutcome;
  selectorSource: SelectorSource;
  betPlaced: boolean;
  betSide: BetSide | null;
  betAmount: number;
  recordedAt: string;
}

// Flat one-line summary of a run, for quick analysis beside the full record
export interface RunLogEntry {
  runId: string;
  marketId: string;
  marketTitle: string;
  currentPrice: number;
  toolsUsed: string[];
  weights: number[];
  threshold: number;
  finalScore: number;
  outcome: RecordedOutcome['kind'];
  ticksElapsed: number;
  betPlaced: boolean;
  betSide: BetSide | null;
  betAmount: number;
  recordedAt: string;
}
