import type { ScoringFn, ScoringTool, ToolSummary } from './types.js';
import { DuplicateToolError, UnknownToolError } from '../errors.js';
import { moduleLogger } from '../logger.js';

import { liquiditySpikeTool } from './liquidity-spike.js';
import { mockPriceSignalTool } from './mock-price.js';
import { mockRandomContextTool } from './mock-context.js';
import { priceJumpDetectorTool } from './price-jump.js';
import { snapshotVolatilityTool } from './snapshot-volatility.js';
import { spreadCompressionTool } from './spread-compression.js';

const log = moduleLogger('registry');

/**
 * The only tools a selector may choose from. The set is fixed once the
 * process has built it; nothing is discovered at run time.
 */
export class ToolRegistry {
  private readonly toolsByName = new Map<string, ScoringTool>();

  register(tool: ScoringTool): void {
    const name = tool.name.trim();
    if (!name) throw new Error('Tool name is required');
    if (this.toolsByName.has(name)) throw new DuplicateToolError(name);
    this.toolsByName.set(name, tool);
    log.debug({ tool: name }, 'registered tool');
  }

  lookup(name: string): ScoringFn {
    const tool = this.toolsByName.get(name);
    if (!tool) throw new UnknownToolError(name, this.listNames());
    return tool.run;
  }

  has(name: string): boolean {
    return this.toolsByName.has(name);
  }

  listNames(): string[] {
    return [...this.toolsByName.keys()];
  }

  listSummaries(): ToolSummary[] {
    return [...this.toolsByName.values()].map((t) => ({ name: t.name, description: t.description }));
  }

  get size(): number {
    return this.toolsByName.size;
  }
}

export const DEFAULT_TOOLS: readonly ScoringTool[] = [
  mockPriceSignalTool,
  mockRandomContextTool,
  snapshotVolatilityTool,
  spreadCompressionTool,
  priceJumpDetectorTool,
  liquiditySpikeTool
];

export function buildDefaultRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  for (const tool of DEFAULT_TOOLS) registry.register(tool);
  return registry;
}
