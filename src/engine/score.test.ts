import { describe, expect, it } from 'vitest';
import { score } from './score.js';
import { validate } from './validate.js';
import { ToolRegistry } from '../tools/registry.js';
import { ToolExecutionError } from '../errors.js';
import { makeSnapshot } from '../../test/fixtures.js';

function registryWith(outputs: Record<string, () => number>): ToolRegistry {
  const registry = new ToolRegistry();
  for (const [name, run] of Object.entries(outputs)) registry.register({ name, description: name, run });
  return registry;
}

describe('score', () => {
  const registry = registryWith({ a: () => 0.2, b: () => 0.5 });

  it('sums weighted outputs in declared order', () => {
    const spec = validate(
      {
        entries: [
          { toolName: 'a', weight: 1 },
          { toolName: 'b', weight: 2 }
        ],
        threshold: 1,
        rationale: ''
      },
      registry
    );
    const result = score(spec, makeSnapshot(), registry);

    expect(result.score).toBeCloseTo(1.2, 12);
    expect(result.contributions.map((c) => c.toolName)).toEqual(['a', 'b']);
    expect(result.contributions[1]).toEqual({ toolName: 'b', rawOutput: 0.5, weight: 2, contribution: 1 });
    expect(result.threshold).toBe(1);
    expect(result.betTriggered).toBe(true);
  });

  it('triggers at exactly the threshold', () => {
    const spec = validate({ entries: [{ toolName: 'b', weight: 1 }], threshold: 0.5, rationale: '' }, registry);
    expect(score(spec, makeSnapshot(), registry).betTriggered).toBe(true);

    const higher = validate({ entries: [{ toolName: 'b', weight: 1 }], threshold: 0.51, rationale: '' }, registry);
    expect(score(higher, makeSnapshot(), registry).betTriggered).toBe(false);
  });

  it('gives identical results on repeated runs', () => {
    const spec = validate(
      {
        entries: [
          { toolName: 'a', weight: 0.1 },
          { toolName: 'b', weight: 0.7 },
          { toolName: 'a', weight: 0.3 }
        ],
        threshold: 0.5,
        rationale: ''
      },
      registry
    );
    const first = score(spec, makeSnapshot(), registry);
    const second = score(spec, makeSnapshot(), registry);
    expect(second).toEqual(first);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('stops at the first failing tool', () => {
    let calledAfter = false;
    const failing = registryWith({
      ok: () => 0.4,
      broken: () => {
        throw new Error('feed down');
      },
      later: () => {
        calledAfter = true;
        return 1;
      }
    });
    const spec = validate(
      {
        entries: [
          { toolName: 'ok', weight: 1 },
          { toolName: 'broken', weight: 1 },
          { toolName: 'later', weight: 1 }
        ],
        threshold: 0.5,
        rationale: ''
      },
      failing
    );

    expect(() => score(spec, makeSnapshot(), failing)).toThrow('Tool broken failed: feed down');
    expect(calledAfter).toBe(false);
  });

  it('treats a non-finite output as a tool failure', () => {
    const nan = registryWith({ nan: () => Number.NaN });
    const spec = validate({ entries: [{ toolName: 'nan', weight: 1 }], threshold: 0.5, rationale: '' }, nan);
    expect(() => score(spec, makeSnapshot(), nan)).toThrow(ToolExecutionError);
  });
});
