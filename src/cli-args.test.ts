import { describe, expect, it } from 'vitest';
import { parseCliArgs, parseCollectArgs } from './cli-args.js';

describe('parseCliArgs', () => {
  it('defaults to the top market and configured ticks', () => {
    expect(parseCliArgs([])).toEqual({ list: false, help: false, marketIndex: 0, maxTicks: undefined });
  });

  it('reads numeric options', () => {
    expect(parseCliArgs(['--market-index', '2', '--watcher-ticks', '5'])).toEqual({
      list: false,
      help: false,
      marketIndex: 2,
      maxTicks: 5
    });
  });

  it('lets --skip-watcher win over --watcher-ticks', () => {
    expect(parseCliArgs(['--watcher-ticks', '5', '--skip-watcher']).maxTicks).toBe(0);
  });

  it('rejects bad values and unknown flags', () => {
    expect(() => parseCliArgs(['--market-index=-1'])).toThrow('--market-index must be a non-negative integer, got "-1"');
    expect(() => parseCliArgs(['--watcher-ticks', '1.5'])).toThrow('--watcher-ticks must be a non-negative integer');
    expect(() => parseCliArgs(['--verbose'])).toThrow();
  });

  it('accepts short flags', () => {
    expect(parseCliArgs(['-l']).list).toBe(true);
    expect(parseCliArgs(['-h']).help).toBe(true);
  });
});

describe('parseCollectArgs', () => {
  it('defaults to a six-minute run polling every minute', () => {
    expect(parseCollectArgs([])).toEqual({ help: false, intervalSeconds: 60, durationHours: 0.1, maxMarkets: 50 });
  });

  it('reads the polling options', () => {
    expect(parseCollectArgs(['--interval-seconds', '30', '--duration-hours', '1.5', '--max-markets', '20'])).toEqual({
      help: false,
      intervalSeconds: 30,
      durationHours: 1.5,
      maxMarkets: 20
    });
  });

  it('raises the interval to two seconds', () => {
    expect(parseCollectArgs(['--interval-seconds', '0']).intervalSeconds).toBe(2);
  });

  it('rejects bad values', () => {
    expect(() => parseCollectArgs(['--duration-hours', 'soon'])).toThrow(
      '--duration-hours must be a non-negative number, got "soon"'
    );
    expect(() => parseCollectArgs(['--interval-seconds', '1.5'])).toThrow('--interval-seconds must be a non-negative integer');
    expect(() => parseCollectArgs(['--list'])).toThrow();
  });
});
