import type { MarketSnapshot, RecordedOutcome } from '../types/index.js';
import type { RunResult } from '../pipeline.js';
import type { OutputBlock } from './types.js';

export function describeOutcome(outcome: RecordedOutcome): string {
  switch (outcome.kind) {
    case 'hit':
      return `threshold hit at tick ${outcome.tickIndex} (price ${outcome.price.toFixed(4)})`;
    case 'timed_out':
      return outcome.ticksElapsed === 0
        ? 'watcher skipped'
        : `no hit after ${outcome.ticksElapsed} ticks (last price ${outcome.lastPrice == null ? 'n/a' : outcome.lastPrice.toFixed(4)})`;
    case 'source_unavailable':
      return `price source unavailable after ${outcome.ticksElapsed} ticks: ${outcome.message}`;
  }
}

export function marketsTable(markets: MarketSnapshot[]): OutputBlock {
  return {
    kind: 'table',
    title: `Top ${markets.length} markets`,
    columns: ['#', 'market', 'title', 'price', 'volume'],
    rows: markets.map((m, i) => [i, m.marketId, m.title, m.price, m.volume])
  };
}

export function runSummary(result: RunResult): OutputBlock[] {
  const { snapshot, score, record } = result;
  const blocks: OutputBlock[] = [
    {
      kind: 'fields',
      title: `RUN ${record.runId}`,
      fields: [
        ['Market', snapshot.title],
        ['Market ID', snapshot.marketId],
        ['Price', snapshot.price],
        ['Selector', record.selectorSource],
        ['Rationale', record.spec.rationale || null]
      ]
    },
    {
      kind: 'table',
      title: 'Tool contributions',
      columns: ['tool', 'weight', 'output', 'contribution'],
      rows: score.contributions.map((c) => [c.toolName, c.weight, c.rawOutput, c.contribution])
    },
    {
      kind: 'fields',
      fields: [
        ['Final score', score.score],
        ['Threshold', score.threshold],
        ['Score triggered', score.betTriggered],
        ['Watcher', describeOutcome(result.outcome)],
        ['Bet placed', record.betPlaced],
        ['Side', record.betSide],
        ['Amount', record.betAmount]
      ]
    }
  ];

  if (result.logError) blocks.push({ kind: 'error', message: result.logError });
  else if (result.ack) blocks.push({ kind: 'text', text: `Logged to ${result.ack.path} (line ${result.ack.line})` });

  return blocks;
}
