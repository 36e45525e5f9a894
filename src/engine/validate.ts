import type { ToolSelection, ToolWeight } from '../types/index.js';
import type { ToolRegistry } from '../tools/registry.js';
import { EmptySelectionError, InvalidThresholdError, InvalidWeightError, UnknownToolError } from '../errors.js';

const issued = Symbol('validated-spec');

/**
 * A selection that passed the registry and range checks. Only
 * `validate` can build one, so the scorer never sees raw selector output.
 */
export class ValidatedSpec {
  readonly entries: readonly Readonly<ToolWeight>[];
  readonly threshold: number;
  readonly rationale: string;

  constructor(token: typeof issued, selection: ToolSelection) {
    if (token !== issued) throw new TypeError('ValidatedSpec can only be created by validate()');
    this.entries = Object.freeze(selection.entries.map((e) => Object.freeze({ toolName: e.toolName, weight: e.weight })));
    this.threshold = selection.threshold;
    this.rationale = selection.rationale;
    Object.freeze(this);
  }

  toJSON(): ToolSelection {
    return {
      entries: this.entries.map((e) => ({ toolName: e.toolName, weight: e.weight })),
      threshold: this.threshold,
      rationale: this.rationale
    };
  }
}

export function validate(selection: ToolSelection, registry: Pick<ToolRegistry, 'listNames'>): ValidatedSpec {
  if (selection.entries.length === 0) throw new EmptySelectionError();

  const known = registry.listNames();
  const names = new Set(known);
  for (const entry of selection.entries) {
    if (!names.has(entry.toolName)) throw new UnknownToolError(entry.toolName, known);
  }

  for (const entry of selection.entries) {
    if (!Number.isFinite(entry.weight) || entry.weight < 0) {
      throw new InvalidWeightError(entry.toolName, entry.weight);
    }
  }

  const { threshold } = selection;
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new InvalidThresholdError(threshold);
  }

  return new ValidatedSpec(issued, selection);
}
