import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { JsonlLog } from './bet-log.js';
import { buildBetRecord } from './paper-bet.js';
import { validate } from './validate.js';
import { buildDefaultRegistry } from '../tools/registry.js';
import { LogWriteError } from '../errors.js';
import type { BetRecord } from '../types/index.js';
import { makeSnapshot } from '../../test/fixtures.js';

const spec = validate(
  { entries: [{ toolName: 'mock_price_signal', weight: 1 }], threshold: 0.6, rationale: '' },
  buildDefaultRegistry()
);

function record(runId: string): BetRecord {
  return buildBetRecord({
    snapshot: makeSnapshot(),
    spec,
    score: { score: 0.5, contributions: [], threshold: 0.6, betTriggered: false },
    outcome: { kind: 'timed_out', lastPrice: 0.5, ticksElapsed: 3 },
    selectorSource: 'fallback',
    betAmount: 10,
    now: new Date('2026-10-18T12:00:00.000Z'),
    runId
  });
}

describe('JsonlLog', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'bet-log-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('appends one line per record and acknowledges the line number', async () => {
    const file = path.join(dir, 'nested', 'paper_bets.jsonl');
    const log = new JsonlLog<BetRecord>(file);

    const first = await log.append(record('run00001'));
    const second = await log.append(record('run00002'));

    expect(first).toEqual({ runId: 'run00001', path: file, line: 1 });
    expect(second.line).toBe(2);

    const lines = (await readFile(file, 'utf8')).split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('');
    expect(JSON.parse(lines[0]).runId).toBe('run00001');
  });

  it('keeps concurrent appends whole and in call order', async () => {
    const file = path.join(dir, 'paper_bets.jsonl');
    const log = new JsonlLog<BetRecord>(file);
    const ids = Array.from({ length: 20 }, (_, i) => `run${String(i).padStart(5, '0')}`);

    const acks = await Promise.all(ids.map((id) => log.append(record(id))));
    expect(acks.map((a) => a.line)).toEqual(ids.map((_, i) => i + 1));

    const stored = await log.readAll();
    expect(stored.map((r) => r.runId)).toEqual(ids);
  });

  it('continues numbering after existing lines', async () => {
    const file = path.join(dir, 'paper_bets.jsonl');
    await writeFile(file, JSON.stringify(record('old00001')) + '\n', 'utf8');

    const ack = await new JsonlLog<BetRecord>(file).append(record('new00001'));
    expect(ack.line).toBe(2);
    expect((await new JsonlLog<BetRecord>(file).readAll()).map((r) => r.runId)).toEqual(['old00001', 'new00001']);
  });

  it('reads nothing from a missing file', async () => {
    expect(await new JsonlLog<BetRecord>(path.join(dir, 'missing.jsonl')).readAll()).toEqual([]);
  });

  it('raises LogWriteError when the file cannot be written', async () => {
    const blocker = path.join(dir, 'blocker');
    await writeFile(blocker, 'not a directory', 'utf8');
    const log = new JsonlLog<BetRecord>(path.join(blocker, 'paper_bets.jsonl'));

    await expect(log.append(record('run00001'))).rejects.toBeInstanceOf(LogWriteError);
    // a failed append does not wedge the queue
    await expect(log.append(record('run00002'))).rejects.toBeInstanceOf(LogWriteError);
  });
});
