import { randomUUID } from 'node:crypto';
import type {
  BetRecord,
  BetSide,
  MarketSnapshot,
  RecordedOutcome,
  RunLogEntry,
  ScoreResult,
  SelectorSource
} from '../types/index.js';
import type { ValidatedSpec } from './validate.js';

export interface PaperBetInput {
  snapshot: MarketSnapshot;
  spec: ValidatedSpec;
  score: ScoreResult;
  outcome: RecordedOutcome;
  selectorSource: SelectorSource;
  betAmount: number;
  now?: Date;
  runId?: string;
}

export function newRunId(): string {
  return randomUUID().slice(0, 8);
}

/**
 * A paper bet is placed when the score clears the threshold or the watcher
 * saw the price reach it. Side follows the score.
 */
export function buildBetRecord(input: PaperBetInput): BetRecord {
  const { snapshot, spec, score, outcome } = input;
  const betPlaced = score.betTriggered || outcome.kind === 'hit';
  const side: BetSide = score.score >= score.threshold ? 'YES' : 'NO';
  const { history: _history, ...market } = snapshot;

  return {
    runId: input.runId ?? newRunId(),
    marketId: snapshot.marketId,
    market,
    spec: spec.toJSON(),
    score: {
      score: score.score,
      contributions: score.contributions.map((c) => ({ ...c })),
      threshold: score.threshold,
      betTriggered: score.betTriggered
    },
    outcome,
    selectorSource: input.selectorSource,
    betPlaced,
    betSide: betPlaced ? side : null,
    betAmount: betPlaced ? input.betAmount : 0,
    recordedAt: (input.now ?? new Date()).toISOString()
  };
}

export function ticksElapsed(outcome: RecordedOutcome): number {
  return outcome.kind === 'hit' ? outcome.tickIndex + 1 : outcome.ticksElapsed;
}

export function summarizeRun(record: BetRecord): RunLogEntry {
  return {
    runId: record.runId,
    marketId: record.marketId,
    marketTitle: record.market.title,
    currentPrice: record.market.price,
    toolsUsed: record.spec.entries.map((e) => e.toolName),
    weights: record.spec.entries.map((e) => e.weight),
    threshold: record.spec.threshold,
    finalScore: record.score.score,
    outcome: record.outcome.kind,
    ticksElapsed: ticksElapsed(record.outcome),
    betPlaced: record.betPlaced,
    betSide: record.betSide,
    betAmount: record.betAmount,
    recordedAt: record.recordedAt
  };
}
