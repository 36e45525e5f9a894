import type { MarketSnapshot } from '../types/index.js';
import type { ToolSummary } from '../tools/types.js';

// The selector picks tools, weights and a threshold. It never computes a score.
export const SELECTOR_SYSTEM_PROMPT = `You are a prediction tool selector for basketball markets.

Your ONLY job is to:
1. Review the available tools and the market event.
2. Select which tools to use (at least one).
3. Assign a non-negative weight to each selected tool (weights should sum to 1.0).
4. Choose a threshold (0.0 to 1.0). If the weighted score reaches it, a paper bet triggers.
5. Provide a brief rationale.

STRICT RULES:
- You can ONLY select tools from the available tools list provided.
- You CANNOT invent new tools.
- You CANNOT compute scores. The engine does that.
- Threshold must be between 0.0 and 1.0.

Respond with ONLY valid JSON. No markdown, no explanation outside the JSON.`;

export function formatTools(tools: ToolSummary[]): string {
  return tools.map((t, i) => `${i + 1}. **${t.name}**: ${t.description}`).join('\n');
}

export function buildSelectorPrompt(snapshot: MarketSnapshot, tools: ToolSummary[]): string {
  return `## Market Event
- Event ID: ${snapshot.eventId}
- Market ID: ${snapshot.marketId}
- Title: ${snapshot.title}
- Current YES Price: ${snapshot.price}
- Timestamp: ${snapshot.timestamp}

## Available Tools
${formatTools(tools)}

## Instructions
Select tools, assign weights, set a threshold, and provide rationale.

Respond with JSON matching this exact schema:
{
  "selections": [
    { "tool_name": "<name from available tools>", "weight": <float 0-1> }
  ],
  "threshold": <float 0-1>,
  "rationale": "<brief explanation>"
}`;
}
