import type { MarketSnapshot } from '../types/index.js';

// Tools are pure functions of the snapshot. History arrives on snapshot.history.
export type ScoringFn = (snapshot: MarketSnapshot) => number;

export interface ScoringTool {
  name: string;
  description: string;
  run: ScoringFn;
}

export type ToolSummary = Pick<ScoringTool, 'name' | 'description'>;
