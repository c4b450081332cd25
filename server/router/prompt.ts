import type { InterpreterMessage } from '../llm/interpreter-client';
import type { ToolSchema } from '../tools/registry';
import type { HistoryTurn } from './types';

export const MAX_PROMPT_CATEGORIES = 200;

const ROUTER_SYSTEM = `You are a routing function for a product review analytics app.

Read the user's message and the recent conversation, then choose ONE tool from the tool catalog.
Output ONLY a JSON object of this shape, with no markdown:

{"tool": "<tool name or null>", "parameters": {...}, "confidence": <0..1>, "rationale": "<short>", "ambiguous": <true|false>}

Rules:
- Use only tool names and parameter names from the catalog.
- Category parameters must be chosen from the allowed categories list.
- Questions about reasons, complaints or issues -> sentiment_summary.
- Top / best / worst / NPS / average rating rankings -> metrics_top_categories.
- Distribution or histogram of ratings -> rating_distribution.
- Comparing two categories -> compare_categories.
- Counts, lists or overall statistics -> general_query.
- If the request is unclear, set "tool" to null and "ambiguous" to true.`;

function describeTool(schema: ToolSchema): Record<string, unknown> {
  const parameters: Record<string, string> = {};
  for (const [name, spec] of Object.entries(schema.parameters)) {
    switch (spec.kind) {
      case 'integer':
        parameters[name] = `integer ${spec.min}-${spec.max} (default ${spec.default}). ${spec.description}`;
        break;
      case 'enum':
        parameters[name] = `one of ${spec.values.join(', ')} (default ${spec.default}). ${spec.description}`;
        break;
      case 'category':
        parameters[name] = `${spec.required ? 'required' : 'optional'} category name. ${spec.description}`;
        break;
      case 'category_list':
        parameters[name] = `optional list of category names. ${spec.description}`;
        break;
    }
  }
  return { name: schema.name, description: schema.description, parameters };
}

export function buildRouterMessages(input: {
  utterance: string;
  history: HistoryTurn[];
  catalog: ToolSchema[];
  categories: string[];
}): InterpreterMessage[] {
  const payload = {
    tool_catalog: input.catalog.map(describeTool),
    allowed_categories: input.categories.slice(0, MAX_PROMPT_CATEGORIES),
    recent_turns: input.history.map((turn) => ({
      user: turn.utterance,
      tool: turn.tool,
      assistant: turn.reply,
    })),
    user_message: input.utterance,
  };

  return [
    { role: 'system', content: ROUTER_SYSTEM },
    { role: 'user', content: JSON.stringify(payload) },
  ];
}
