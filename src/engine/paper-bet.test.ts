import { describe, expect, it } from 'vitest';
import { buildBetRecord, newRunId, summarizeRun } from './paper-bet.js';
import { validate } from './validate.js';
import { buildDefaultRegistry } from '../tools/registry.js';
import type { RecordedOutcome, ScoreResult } from '../types/index.js';
import { makeRow, makeSnapshot } from '../../test/fixtures.js';

const spec = validate(
  { entries: [{ toolName: 'mock_price_signal', weight: 1 }], threshold: 0.6, rationale: 'follow price' },
  buildDefaultRegistry()
);

function scoreOf(value: number): ScoreResult {
  return {
    score: value,
    contributions: [{ toolName: 'mock_price_signal', rawOutput: value, weight: 1, contribution: value }],
    threshold: 0.6,
    betTriggered: value >= 0.6
  };
}

const timedOut: RecordedOutcome = { kind: 'timed_out', lastPrice: 0.45, ticksElapsed: 3 };
const hit: RecordedOutcome = { kind: 'hit', price: 0.61, tickIndex: 1 };

function build(value: number, outcome: RecordedOutcome) {
  return buildBetRecord({
    snapshot: makeSnapshot({ history: [makeRow({ lastPrice: 0.4 })] }),
    spec,
    score: scoreOf(value),
    outcome,
    selectorSource: 'llm',
    betAmount: 10,
    now: new Date('2026-10-18T12:05:00.000Z'),
    runId: 'abcd1234'
  });
}

describe('buildBetRecord', () => {
  it('places a YES bet when the score clears the threshold', () => {
    const record = build(0.7, timedOut);
    expect(record.betPlaced).toBe(true);
    expect(record.betSide).toBe('YES');
    expect(record.betAmount).toBe(10);
  });

  it('places a NO bet when only the watcher hit', () => {
    const record = build(0.4, hit);
    expect(record.betPlaced).toBe(true);
    expect(record.betSide).toBe('NO');
    expect(record.outcome).toEqual(hit);
  });

  it('records a declined bet with no side and zero amount', () => {
    const record = build(0.4, timedOut);
    expect(record.betPlaced).toBe(false);
    expect(record.betSide).toBeNull();
    expect(record.betAmount).toBe(0);
  });

  it('keeps everything needed to audit the run', () => {
    const record = build(0.7, timedOut);
    expect(record.runId).toBe('abcd1234');
    expect(record.marketId).toBe('KXNBA-TEST-001');
    expect(record.recordedAt).toBe('2026-10-18T12:05:00.000Z');
    expect(record.selectorSource).toBe('llm');
    expect(record.spec).toEqual({
      entries: [{ toolName: 'mock_price_signal', weight: 1 }],
      threshold: 0.6,
      rationale: 'follow price'
    });
    expect(record.score.contributions).toHaveLength(1);
    expect('history' in record.market).toBe(false);
    expect(record.market.title).toBe('Test Home vs Test Away: Home Win');
  });

  it('round-trips through JSON', () => {
    const record = build(0.7, timedOut);
    expect(JSON.parse(JSON.stringify(record))).toEqual(record);
  });
});

describe('summarizeRun', () => {
  it('flattens a record into one run log line', () => {
    expect(summarizeRun(build(0.7, timedOut))).toEqual({
      runId: 'abcd1234',
      marketId: 'KXNBA-TEST-001',
      marketTitle: 'Test Home vs Test Away: Home Win',
      currentPrice: 0.5,
      toolsUsed: ['mock_price_signal'],
      weights: [1],
      threshold: 0.6,
      finalScore: 0.7,
      outcome: 'timed_out',
      ticksElapsed: 3,
      betPlaced: true,
      betSide: 'YES',
      betAmount: 10,
      recordedAt: '2026-10-18T12:05:00.000Z'
    });
  });

  it('counts the hitting tick', () => {
    const entry = summarizeRun(build(0.4, hit));
    expect(entry.outcome).toBe('hit');
    expect(entry.ticksElapsed).toBe(2);
    expect(entry.betSide).toBe('NO');
  });
});

describe('newRunId', () => {
  it('returns 8 hex characters', () => {
    expect(newRunId()).toMatch(/^[0-9a-f]{8}$/);
  });
});
