#!/usr/bin/env node
/**
 * Stores snapshots of the top markets on an interval until the duration
 * runs out or the process is stopped.
 *
 * Usage:
 *   npx tsx src/collect.ts                          # 6 minutes, one poll a minute
 *   npx tsx src/collect.ts --interval-seconds 30 --duration-hours 2
 */

import 'dotenv/config';
import { loadConfig } from './config.js';
import { createMarketSource } from './kalshi/source.js';
import { SnapshotStore } from './db/index.js';
import { collectSnapshots } from './collector.js';
import { COLLECT_HELP, parseCollectArgs } from './cli-args.js';
import { errorMessage } from './errors.js';

async function main(): Promise<void> {
  const args = parseCollectArgs(process.argv.slice(2));
  if (args.help) {
    console.log(COLLECT_HELP);
    return;
  }

  const config = loadConfig();
  const source = createMarketSource(config);
  const history = new SnapshotStore(config.snapshotDbPath);
  const controller = new AbortController();
  const onStop = () => {
    console.log('\n⏹  Stop signal received, finishing...');
    controller.abort();
  };
  process.once('SIGINT', onStop);
  process.once('SIGTERM', onStop);

  try {
    console.log(`\n📥 Collecting into ${config.snapshotDbPath}`);
    console.log(`   duration ${args.durationHours}h, interval ${args.intervalSeconds}s, up to ${args.maxMarkets} markets\n`);
    const stats = await collectSnapshots(source, history, {
      category: config.category,
      maxMarkets: args.maxMarkets,
      intervalMs: args.intervalSeconds * 1000,
      durationMs: args.durationHours * 3_600_000,
      signal: controller.signal
    });
    console.log(`\n✅ ${stats.rounds} polls, ${stats.stored} snapshots stored, ${stats.failures} failed polls`);
  } finally {
    process.off('SIGINT', onStop);
    process.off('SIGTERM', onStop);
    history.close();
  }
}

main().catch((error: unknown) => {
  console.error(`Fatal: ${errorMessage(error)}`);
  process.exitCode = 1;
});
