import { describe, expect, it, vi } from 'vitest';
import {
  ClaudeToolSelector,
  FALLBACK_SELECTION,
  FixedSelector,
  parseSelection,
  stripFences,
  withFallback,
  type ToolSelector
} from './selector.js';
import { buildSelectorPrompt, SELECTOR_SYSTEM_PROMPT } from './prompts.js';
import { SelectorError } from '../errors.js';
import { buildDefaultRegistry } from '../tools/registry.js';
import { makeSnapshot } from '../../test/fixtures.js';

const RESPONSE = JSON.stringify({
  selections: [
    { tool_name: 'mock_price_signal', weight: 0.7 },
    { tool_name: 'liquidity_spike_tool', weight: 0.3 }
  ],
  threshold: 0.55,
  rationale: 'price with a liquidity check'
});

const tools = buildDefaultRegistry().listSummaries();

describe('parseSelection', () => {
  it('maps the JSON answer to a selection', () => {
    expect(parseSelection(RESPONSE)).toEqual({
      entries: [
        { toolName: 'mock_price_signal', weight: 0.7 },
        { toolName: 'liquidity_spike_tool', weight: 0.3 }
      ],
      threshold: 0.55,
      rationale: 'price with a liquidity check'
    });
  });

  it('accepts fenced and chatty answers', () => {
    expect(parseSelection('```json\n' + RESPONSE + '\n```').threshold).toBe(0.55);
    expect(parseSelection('Here you go: ' + RESPONSE).entries).toHaveLength(2);
  });

  it('defaults a missing rationale to empty', () => {
    expect(parseSelection('{"selections":[],"threshold":0.5}').rationale).toBe('');
  });

  it('passes unknown tools and odd ranges through for the validator', () => {
    const parsed = parseSelection('{"selections":[{"tool_name":"crystal_ball","weight":-2}],"threshold":4}');
    expect(parsed.entries).toEqual([{ toolName: 'crystal_ball', weight: -2 }]);
    expect(parsed.threshold).toBe(4);
  });

  it('rejects answers without usable JSON', () => {
    expect(() => parseSelection('no idea')).toThrow(SelectorError);
    expect(() => parseSelection('{not json}')).toThrow(/^Selector returned malformed JSON/);
    expect(() => parseSelection('{"selections":"all","threshold":0.5}')).toThrow(/^Selector JSON has the wrong shape/);
  });
});

describe('stripFences', () => {
  it('removes a surrounding code fence', () => {
    expect(stripFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
    expect(stripFences('  {"a":1}  ')).toBe('{"a":1}');
  });
});

describe('buildSelectorPrompt', () => {
  it('lists the market and every tool', () => {
    const prompt = buildSelectorPrompt(makeSnapshot({ price: 0.61 }), tools);
    expect(prompt).toContain('- Market ID: KXNBA-TEST-001');
    expect(prompt).toContain('- Current YES Price: 0.61');
    expect(prompt).toContain('6. **liquidity_spike_tool**: ');
  });
});

describe('ClaudeToolSelector', () => {
  it('sends the system and market prompts and tags the proposal', async () => {
    const complete = vi.fn(async (_system: string, _user: string) => RESPONSE);
    const proposal = await new ClaudeToolSelector(complete).propose(makeSnapshot(), tools);

    expect(proposal.source).toBe('llm');
    expect(proposal.selection.entries[0]).toEqual({ toolName: 'mock_price_signal', weight: 0.7 });
    expect(complete).toHaveBeenCalledWith(SELECTOR_SYSTEM_PROMPT, buildSelectorPrompt(makeSnapshot(), tools));
  });
});

describe('withFallback', () => {
  it('uses the deterministic selection when the primary selector fails', async () => {
    const failing: ToolSelector = {
      propose: async () => {
        throw new Error('rate limited');
      }
    };
    const proposal = await withFallback(failing).propose(makeSnapshot(), tools);
    expect(proposal).toEqual({ selection: FALLBACK_SELECTION, source: 'fallback' });
  });

  it('keeps the primary proposal when it succeeds', async () => {
    const proposal = await withFallback(new ClaudeToolSelector(async () => RESPONSE)).propose(makeSnapshot(), tools);
    expect(proposal.source).toBe('llm');
  });

  it('hands out copies of the fixed selection', async () => {
    const selector = new FixedSelector();
    const first = await selector.propose();
    first.selection.entries.push({ toolName: 'x', weight: 1 });
    const second = await selector.propose();
    expect(second.selection.entries).toHaveLength(2);
  });
});
