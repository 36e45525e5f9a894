import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import type { MarketSnapshot, SelectorSource, ToolSelection } from '../types/index.js';
import type { ToolSummary } from '../tools/types.js';
import { errorMessage, SelectorError } from '../errors.js';
import { moduleLogger } from '../logger.js';
import { buildSelectorPrompt, SELECTOR_SYSTEM_PROMPT } from './prompts.js';

const log = moduleLogger('selector');

export interface Proposal {
  selection: ToolSelection;
  source: SelectorSource;
}

/**
 * Anything that proposes a tool mix for a market. Output is untrusted:
 * the validator decides whether it can be scored.
 */
export interface ToolSelector {
  propose(snapshot: MarketSnapshot, tools: ToolSummary[]): Promise<Proposal>;
}

// Shape only. Registry membership and ranges are the validator's job.
const selectionSchema = z.object({
  selections: z.array(
    z.object({
      tool_name: z.string(),
      weight: z.number()
    })
  ),
  threshold: z.number(),
  rationale: z.string().default('')
});

export function stripFences(text: string): string {
  let raw = text.trim();
  if (raw.startsWith('```')) {
    const firstNewline = raw.indexOf('\n');
    raw = firstNewline === -1 ? '' : raw.slice(firstNewline + 1);
    const closing = raw.lastIndexOf('```');
    if (closing !== -1) raw = raw.slice(0, closing);
  }
  return raw.trim();
}

export function parseSelection(text: string): ToolSelection {
  const jsonMatch = stripFences(text).match(/\{[\s\S]*\}/);
  if (!jsonMatch) throw new SelectorError('Could not find JSON in selector response: ' + text.slice(0, 200));

  let raw: unknown;
  try {
    raw = JSON.parse(jsonMatch[0]);
  } catch (error) {
    throw new SelectorError(`Selector returned malformed JSON: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = selectionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SelectorError(`Selector JSON has the wrong shape: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }

  return {
    entries: parsed.data.selections.map((s) => ({ toolName: s.tool_name, weight: s.weight })),
    threshold: parsed.data.threshold,
    rationale: parsed.data.rationale
  };
}

export type Completion = (system: string, user: string) => Promise<string>;

export function anthropicCompletion(model: string, provided?: Anthropic): Completion {
  let client = provided;
  return async (system, user) => {
    client ??= new Anthropic();
    const response = await client.messages.create({
      model,
      max_tokens: 1024,
      temperature: 0,
      system,
      messages: [{ role: 'user', content: user }]
    });

    const textBlock = response.content.find((block) => block.type === 'text');
    if (!textBlock || textBlock.type !== 'text') {
      throw new SelectorError('No text response from Claude');
    }
    return textBlock.text;
  };
}

export class ClaudeToolSelector implements ToolSelector {
  constructor(private readonly complete: Completion) {}

  async propose(snapshot: MarketSnapshot, tools: ToolSummary[]): Promise<Proposal> {
    const text = await this.complete(SELECTOR_SYSTEM_PROMPT, buildSelectorPrompt(snapshot, tools));
    const selection = parseSelection(text);
    log.info({ tools: selection.entries.map((e) => e.toolName), threshold: selection.threshold }, 'selector proposal');
    return { selection, source: 'llm' };
  }
}

export const FALLBACK_SELECTION: ToolSelection = Object.freeze({
  entries: [
    { toolName: 'mock_price_signal', weight: 0.5 },
    { toolName: 'mock_random_context', weight: 0.5 }
  ],
  threshold: 0.6,
  rationale: 'Deterministic fallback: equal-weight both mock tools, threshold 0.6.'
});

export class FixedSelector implements ToolSelector {
  constructor(private readonly selection: ToolSelection = FALLBACK_SELECTION) {}

  async propose(): Promise<Proposal> {
    return {
      selection: {
        entries: this.selection.entries.map((e) => ({ ...e })),
        threshold: this.selection.threshold,
        rationale: this.selection.rationale
      },
      source: 'fallback'
    };
  }
}

/**
 * Falls back when the selector itself fails (network, unparseable output).
 * A proposal that parses but is invalid still goes to the validator.
 */
export function withFallback(primary: ToolSelector, fallback: ToolSelector = new FixedSelector()): ToolSelector {
  return {
    async propose(snapshot, tools) {
      try {
        return await primary.propose(snapshot, tools);
      } catch (error) {
        log.warn({ err: errorMessage(error) }, 'selector failed, using deterministic fallback');
        return fallback.propose(snapshot, tools);
      }
    }
  };
}
