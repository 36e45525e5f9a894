import { createHash } from 'node:crypto';
import type { ScoringTool } from './types.js';
import { round } from './utils.js';

export function seedFromId(id: string): number {
  return createHash('sha256').update(id, 'utf8').digest().readUInt32BE(0);
}

// mulberry32: first draw in [0, 1) for a 32-bit seed
export function firstDraw(seed: number): number {
  let t = (seed + 0x6d2b79f5) >>> 0;
  t = Math.imul(t ^ (t >>> 15), t | 1);
  t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
  return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
}

export const mockRandomContextTool: ScoringTool = {
  name: 'mock_random_context',
  description:
    'Returns a deterministic pseudo-random [0,1] value seeded by event id. Simulates an external context signal (placeholder for real data).',
  run: (snapshot) => round(firstDraw(seedFromId(snapshot.eventId)), 6)
};
