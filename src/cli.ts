#!/usr/bin/env node
/**
 * Paper-betting run over the top open basketball markets.
 *
 * Usage:
 *   npx tsx src/cli.ts                      # Full run on the top market
 *   npx tsx src/cli.ts --market-index 2     # Pick the third market by volume
 *   npx tsx src/cli.ts --watcher-ticks 5    # Override WATCHER_MAX_TICKS
 *   npx tsx src/cli.ts --skip-watcher       # Score and log without polling
 *   npx tsx src/cli.ts --list               # List top markets and exit
 */

import 'dotenv/config';
import { loadConfig } from './config.js';
import { createMarketSource } from './kalshi/source.js';
import { anthropicCompletion, ClaudeToolSelector, withFallback } from './agents/selector.js';
import { buildDefaultRegistry } from './tools/registry.js';
import { JsonlLog } from './engine/bet-log.js';
import { SnapshotStore } from './db/index.js';
import { runPipeline } from './pipeline.js';
import { renderBlocks } from './ui/render.js';
import { marketsTable, runSummary } from './ui/summary.js';
import { errorMessage } from './errors.js';
import type { TickEvent } from './engine/watch.js';
import { HELP, parseCliArgs } from './cli-args.js';
import type { BetRecord, RunLogEntry } from './types/index.js';

function printTick(event: TickEvent): void {
  if (event.ok) {
    console.log(`   tick ${event.tickIndex}: price ${event.price.toFixed(4)}${event.hit ? '  HIT' : ''}`);
  } else {
    console.log(`   tick ${event.tickIndex}: poll failed (${event.consecutiveFailures} in a row): ${event.error}`);
  }
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(HELP);
    return;
  }

  const config = loadConfig();
  const source = createMarketSource(config);

  if (args.list) {
    console.log(`\n📊 Fetching top ${config.category} markets...\n`);
    const markets = await source.listTopMarkets(config.category, config.maxMarkets);
    console.log(renderBlocks([marketsTable(markets)]));
    return;
  }

  const history = new SnapshotStore(config.snapshotDbPath);
  const controller = new AbortController();
  const onSigint = () => {
    console.log('\n⏹  Interrupted, stopping watcher...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    console.log(`\n🏀 Running on market #${args.marketIndex}...\n`);
    const result = await runPipeline(
      {
        source,
        selector: withFallback(new ClaudeToolSelector(anthropicCompletion(config.model))),
        registry: buildDefaultRegistry(),
        betLog: new JsonlLog<BetRecord>(config.betLogPath),
        runLog: new JsonlLog<RunLogEntry>(config.runLogPath),
        history
      },
      config,
      { marketIndex: args.marketIndex, maxTicks: args.maxTicks, signal: controller.signal, onTick: printTick }
    );

    console.log('\n' + '='.repeat(60) + '\n');
    console.log(renderBlocks(runSummary(result)));
    console.log('\n' + '='.repeat(60));
    if (result.logError) process.exitCode = 1;
  } finally {
    process.off('SIGINT', onSigint);
    history.close();
  }
}

main().catch((error: unknown) => {
  console.error(`Fatal: ${errorMessage(error)}`);
  process.exitCode = 1;
});
