import type { HitDirection } from '../config.js';
import type { WatchOutcome } from '../types/index.js';
import { errorMessage, PriceSourceUnavailableError } from '../errors.js';
import { moduleLogger } from '../logger.js';

const log = moduleLogger('watcher');

export type WatchState = 'idle' | 'polling' | 'hit' | 'timed_out' | 'failed';

export type HitComparator = (price: number, threshold: number) => boolean;

export interface PriceSource {
  getPrice(marketId: string): Promise<number>;
}

export type TickEvent =
  | { tickIndex: number; ok: true; price: number; hit: boolean }
  | { tickIndex: number; ok: false; error: string; consecutiveFailures: number };

type PollResult = { ok: true; price: number } | { ok: false; error: unknown };

export interface WatchParams {
  marketId: string;
  threshold: number;
  pollIntervalMs: number;
  maxTicks: number;
  hit?: HitComparator;
  maxConsecutiveFailures?: number;
  /** wall-clock budget; 0 or undefined disables it */
  timeoutMs?: number;
  signal?: AbortSignal;
  onTick?: (event: TickEvent) => void;
}

export interface WatchDeps {
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

export const crossesAbove: HitComparator = (price, threshold) => price >= threshold;
export const crossesBelow: HitComparator = (price, threshold) => price <= threshold;

/**
 * `implied` follows the score: a score at or over the threshold means the
 * run leans YES, so the watcher waits for the price to rise to it.
 */
export function comparatorFor(direction: HitDirection, scoreValue: number, threshold: number): HitComparator {
  if (direction === 'below') return crossesBelow;
  if (direction === 'implied') return scoreValue >= threshold ? crossesAbove : crossesBelow;
  return crossesAbove;
}

// Resolves early (never rejects) when the signal aborts
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class WatchLoop {
  private stateValue: WatchState = 'idle';
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => number;

  constructor(
    private readonly source: PriceSource,
    deps: WatchDeps = {}
  ) {
    this.sleep = deps.sleep ?? abortableSleep;
    this.now = deps.now ?? Date.now;
  }

  get state(): WatchState {
    return this.stateValue;
  }

  async run(params: WatchParams): Promise<WatchOutcome> {
    if (this.stateValue !== 'idle') throw new Error(`Watch loop already ${this.stateValue}`);

    const hit = params.hit ?? crossesAbove;
    const failureLimit = params.maxConsecutiveFailures ?? 3;
    const maxTicks = Math.max(0, Math.floor(params.maxTicks));
    const deadline = params.timeoutMs ? this.now() + params.timeoutMs : Infinity;
    const { marketId, threshold, signal } = params;

    if (maxTicks === 0) return this.finishTimedOut(null, 0);

    this.stateValue = 'polling';
    log.info({ marketId, threshold, pollIntervalMs: params.pollIntervalMs, maxTicks }, 'watcher started');

    let tickIndex = 0;
    let lastPrice: number | null = null;
    let consecutiveFailures = 0;

    while (tickIndex < maxTicks) {
      if (signal?.aborted || this.now() >= deadline) break;

      const polled = await this.poll(marketId);
      // an in-flight tick that finishes after abort does not count
      if (signal?.aborted) break;

      if (polled.ok) {
        const { price } = polled;
        consecutiveFailures = 0;
        lastPrice = price;
        const reached = hit(price, threshold);
        params.onTick?.({ tickIndex, ok: true, price, hit: reached });
        log.info({ tick: tickIndex, price, threshold, hit: reached }, 'tick');

        if (reached) {
          this.stateValue = 'hit';
          log.info({ marketId, price, tick: tickIndex }, 'threshold hit');
          const outcome: WatchOutcome = { kind: 'hit', price, tickIndex };
          return Object.freeze(outcome);
        }
      } else {
        consecutiveFailures++;
        params.onTick?.({ tickIndex, ok: false, error: errorMessage(polled.error), consecutiveFailures });
        log.warn({ tick: tickIndex, consecutiveFailures, err: errorMessage(polled.error) }, 'price poll failed');

        if (consecutiveFailures >= failureLimit) {
          this.stateValue = 'failed';
          throw new PriceSourceUnavailableError(marketId, consecutiveFailures, tickIndex + 1, polled.error);
        }
      }

      tickIndex++;
      if (tickIndex >= maxTicks) break;
      if (this.now() + params.pollIntervalMs >= deadline) break;
      await this.sleep(params.pollIntervalMs, signal);
    }

    return this.finishTimedOut(lastPrice, tickIndex);
  }

  private async poll(marketId: string): Promise<PollResult> {
    try {
      return { ok: true, price: await this.source.getPrice(marketId) };
    } catch (error) {
      return { ok: false, error };
    }
  }

  private finishTimedOut(lastPrice: number | null, ticksElapsed: number): WatchOutcome {
    this.stateValue = 'timed_out';
    log.info({ lastPrice, ticksElapsed }, 'watcher stopped without a hit');
    const outcome: WatchOutcome = { kind: 'timed_out', lastPrice, ticksElapsed };
    return Object.freeze(outcome);
  }
}

export function watch(source: PriceSource, params: WatchParams, deps?: WatchDeps): Promise<WatchOutcome> {
  return new WatchLoop(source, deps).run(params);
}
