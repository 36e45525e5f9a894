/**
 * One full run: fetch markets, let the selector propose a tool mix,
 * validate it, score it, watch the live price, and log a paper bet.
 *
 * Validation and scoring errors abort the run before anything is logged.
 * A price source that goes away mid-watch still produces a record.
 * Successful watcher ticks go into the snapshot history.
 */

import type { AppConfig } from './config.js';
import type { BetRecord, MarketSnapshot, RecordedOutcome, ScoreResult } from './types/index.js';
import type { MarketSource } from './kalshi/client.js';
import type { ToolSelector } from './agents/selector.js';
import type { ToolRegistry } from './tools/registry.js';
import type { SnapshotHistory } from './db/index.js';
import type { Ack, BetLog, RunLog } from './engine/bet-log.js';
import { buildBetRecord, summarizeRun } from './engine/paper-bet.js';
import { score } from './engine/score.js';
import { validate, type ValidatedSpec } from './engine/validate.js';
import { comparatorFor, WatchLoop, type TickEvent, type WatchDeps } from './engine/watch.js';
import { errorMessage, LogWriteError, NoMarketsError, PriceSourceUnavailableError } from './errors.js';
import { moduleLogger } from './logger.js';

const log = moduleLogger('pipeline');

export interface PipelineDeps {
  source: MarketSource;
  selector: ToolSelector;
  registry: ToolRegistry;
  betLog: BetLog;
  /** flat one-line summaries beside the full records */
  runLog?: RunLog;
  history?: SnapshotHistory;
  watch?: WatchDeps;
  now?: () => Date;
}

export interface RunOptions {
  marketIndex?: number;
  /** overrides config.watcher.maxTicks; 0 skips the watcher */
  maxTicks?: number;
  signal?: AbortSignal;
  onTick?: (event: TickEvent) => void;
}

export interface RunResult {
  snapshot: MarketSnapshot;
  markets: MarketSnapshot[];
  spec: ValidatedSpec;
  score: ScoreResult;
  outcome: RecordedOutcome;
  record: BetRecord;
  ack: Ack | null;
  logError: string | null;
}

function attachHistory(snapshot: MarketSnapshot, deps: PipelineDeps, config: AppConfig, now: Date): MarketSnapshot {
  if (!deps.history) return snapshot;
  deps.history.record(snapshot);
  const history = deps.history.recent(snapshot.marketId, config.snapshotWindowMinutes, now);
  return Object.freeze({ ...snapshot, history: Object.freeze(history) });
}

export async function runPipeline(deps: PipelineDeps, config: AppConfig, options: RunOptions = {}): Promise<RunResult> {
  const now = deps.now ?? (() => new Date());

  const markets = await deps.source.listTopMarkets(config.category, config.maxMarkets);
  if (markets.length === 0) throw new NoMarketsError(config.category);
  log.info({ count: markets.length }, 'fetched top markets');

  const index = Math.max(0, Math.min(options.marketIndex ?? 0, markets.length - 1));
  const snapshot = attachHistory(markets[index], deps, config, now());
  log.info({ marketId: snapshot.marketId, price: snapshot.price, history: snapshot.history.length }, 'market selected');

  const proposal = await deps.selector.propose(snapshot, deps.registry.listSummaries());
  const spec = validate(proposal.selection, deps.registry);
  const result = score(spec, snapshot, deps.registry);

  const outcome = await watchMarket(deps, config, options, spec, result, snapshot.marketId, now);

  const record = buildBetRecord({
    snapshot,
    spec,
    score: result,
    outcome,
    selectorSource: proposal.source,
    betAmount: config.betAmount,
    now: now()
  });

  const errors: string[] = [];
  let ack: Ack | null = null;
  try {
    ack = await deps.betLog.append(record);
  } catch (error) {
    if (!(error instanceof LogWriteError)) throw error;
    errors.push(error.message);
    log.error({ runId: record.runId, err: error.message }, 'bet record not written');
  }
  if (deps.runLog) {
    try {
      await deps.runLog.append(summarizeRun(record));
    } catch (error) {
      if (!(error instanceof LogWriteError)) throw error;
      errors.push(error.message);
      log.error({ runId: record.runId, err: error.message }, 'run summary not written');
    }
  }
  const logError = errors.length > 0 ? errors.join('; ') : null;

  log.info(
    { runId: record.runId, score: result.score, outcome: outcome.kind, betPlaced: record.betPlaced, side: record.betSide },
    'pipeline complete'
  );

  return { snapshot, markets, spec, score: result, outcome, record, ack, logError };
}

async function watchMarket(
  deps: PipelineDeps,
  config: AppConfig,
  options: RunOptions,
  spec: ValidatedSpec,
  result: ScoreResult,
  marketId: string,
  now: () => Date
): Promise<RecordedOutcome> {
  const loop = new WatchLoop(deps.source, deps.watch);
  const { history } = deps;
  const onTick = (event: TickEvent): void => {
    if (event.ok) history?.recordTick(marketId, event.price, now());
    options.onTick?.(event);
  };
  try {
    return await loop.run({
      marketId,
      threshold: spec.threshold,
      pollIntervalMs: config.watcher.pollIntervalMs,
      maxTicks: options.maxTicks ?? config.watcher.maxTicks,
      timeoutMs: config.watcher.timeoutMs,
      maxConsecutiveFailures: config.watcher.maxConsecutiveFailures,
      hit: comparatorFor(config.watcher.hitDirection, result.score, spec.threshold),
      signal: options.signal,
      onTick
    });
  } catch (error) {
    if (!(error instanceof PriceSourceUnavailableError)) throw error;
    log.error({ marketId, err: errorMessage(error) }, 'watcher gave up');
    return { kind: 'source_unavailable', message: error.message, ticksElapsed: error.ticksElapsed };
  }
}
