/**
 * Snapshot collector: polls the top markets on a fixed interval and
 * stores every snapshot, so the history-based tools have a series to read.
 */

import type { MarketCategory } from './config.js';
import type { MarketSource } from './kalshi/client.js';
import type { SnapshotHistory } from './db/index.js';
import { abortableSleep } from './engine/watch.js';
import { errorMessage, SourceUnavailableError } from './errors.js';
import { moduleLogger } from './logger.js';

const log = moduleLogger('collector');

export const MIN_INTERVAL_MS = 2_000;

export interface CollectOptions {
  category: MarketCategory;
  maxMarkets: number;
  intervalMs: number;
  durationMs: number;
  signal?: AbortSignal;
}

export interface CollectDeps {
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

export interface CollectStats {
  rounds: number;
  stored: number;
  failures: number;
}

export async function collectSnapshots(
  source: Pick<MarketSource, 'listTopMarkets'>,
  history: Pick<SnapshotHistory, 'record'>,
  options: CollectOptions,
  deps: CollectDeps = {}
): Promise<CollectStats> {
  const sleep = deps.sleep ?? abortableSleep;
  const now = deps.now ?? Date.now;
  const intervalMs = Math.max(MIN_INTERVAL_MS, options.intervalMs);
  const { signal } = options;
  const startedAt = now();
  const stats: CollectStats = { rounds: 0, stored: 0, failures: 0 };

  log.info({ intervalMs, durationMs: options.durationMs, maxMarkets: options.maxMarkets }, 'collector started');

  while (!signal?.aborted) {
    const roundStart = now();
    if (roundStart - startedAt >= options.durationMs) {
      log.info('duration reached');
      break;
    }

    try {
      const markets = await source.listTopMarkets(options.category, options.maxMarkets);
      if (markets.length === 0) log.warn('no markets returned');
      for (const snapshot of markets) history.record(snapshot);
      stats.stored += markets.length;
    } catch (error) {
      if (!(error instanceof SourceUnavailableError)) throw error;
      stats.failures++;
      log.warn({ err: errorMessage(error) }, 'fetch failed, retrying next round');
    }

    stats.rounds++;
    log.info({ round: stats.rounds, stored: stats.stored }, 'round complete');

    const remaining = intervalMs - (now() - roundStart);
    if (!signal?.aborted && remaining > 0) await sleep(remaining, signal);
  }

  log.info(stats, 'collector finished');
  return stats;
}
