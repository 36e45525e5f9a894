import { parseArgs } from 'node:util';

export const HELP = `hoopline: paper bets on Kalshi basketball markets

Options:
  --list               List the top markets and exit
  --market-index N     Market to run on, by volume rank (default 0)
  --watcher-ticks N    Maximum price polls (default WATCHER_MAX_TICKS)
  --skip-watcher       Do not poll the live price
  -h, --help           Show this help`;

export interface CliArgs {
  list: boolean;
  help: boolean;
  marketIndex: number;
  maxTicks: number | undefined;
}

function nonNegativeInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  return n;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      list: { type: 'boolean', short: 'l', default: false },
      help: { type: 'boolean', short: 'h', default: false },
      'skip-watcher': { type: 'boolean', default: false },
      'watcher-ticks': { type: 'string' },
      'market-index': { type: 'string' }
    },
    strict: true
  });

  const ticks = nonNegativeInt('--watcher-ticks', values['watcher-ticks']);
  return {
    list: values.list ?? false,
    help: values.help ?? false,
    marketIndex: nonNegativeInt('--market-index', values['market-index']) ?? 0,
    maxTicks: values['skip-watcher'] ? 0 : ticks
  };
}

export const COLLECT_HELP = `hoopline collect: store market snapshots for the history tools

Options:
  --interval-seconds N   Seconds between polls (default 60, minimum 2)
  --duration-hours H     How long to run (default 0.1)
  --max-markets N        Markets per poll (default 50)
  -h, --help             Show this help`;

export interface CollectArgs {
  help: boolean;
  intervalSeconds: number;
  durationHours: number;
  maxMarkets: number;
}

function nonNegativeNumber(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n < 0) {
    throw new Error(`${name} must be a non-negative number, got "${value}"`);
  }
  return n;
}

export function parseCollectArgs(argv: string[]): CollectArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      'interval-seconds': { type: 'string' },
      'duration-hours': { type: 'string' },
      'max-markets': { type: 'string' }
    },
    strict: true
  });

  return {
    help: values.help ?? false,
    intervalSeconds: Math.max(2, nonNegativeInt('--interval-seconds', values['interval-seconds']) ?? 60),
    durationHours: nonNegativeNumber('--duration-hours', values['duration-hours']) ?? 0.1,
    maxMarkets: nonNegativeInt('--max-markets', values['max-markets']) ?? 50
  };
}
