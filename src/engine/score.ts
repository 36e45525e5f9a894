import type { MarketSnapshot, ScoreResult, ToolContribution } from '../types/index.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ValidatedSpec } from './validate.js';
import { ToolExecutionError } from '../errors.js';
import { moduleLogger } from '../logger.js';

const log = moduleLogger('scorer');

/**
 * Weighted sum over the validated tools, evaluated and summed in declared
 * order so repeated runs give bit-identical floats. Stops at the first
 * failing tool; there is no partial score.
 */
export function score(spec: ValidatedSpec, snapshot: MarketSnapshot, registry: Pick<ToolRegistry, 'lookup'>): ScoreResult {
  const contributions: ToolContribution[] = [];
  let total = 0;

  for (const { toolName, weight } of spec.entries) {
    const run = registry.lookup(toolName);

    let rawOutput: number;
    try {
      rawOutput = run(snapshot);
    } catch (error) {
      throw new ToolExecutionError(toolName, error);
    }
    if (typeof rawOutput !== 'number' || !Number.isFinite(rawOutput)) {
      throw new ToolExecutionError(toolName, new Error(`non-finite output ${String(rawOutput)}`));
    }

    const contribution = rawOutput * weight;
    total += contribution;
    contributions.push(Object.freeze({ toolName, rawOutput, weight, contribution }));
    log.debug({ tool: toolName, rawOutput, weight, contribution }, 'tool evaluated');
  }

  const result: ScoreResult = Object.freeze({
    score: total,
    contributions: Object.freeze(contributions),
    threshold: spec.threshold,
    betTriggered: total >= spec.threshold
  });

  log.info({ score: result.score, threshold: result.threshold, betTriggered: result.betTriggered }, 'score computed');
  return result;
}
