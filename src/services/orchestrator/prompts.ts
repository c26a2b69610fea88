// Prompts for the reasoning step

import type { ToolDescriptor } from '../tools/types.js';

/** Pseudo tool name under which unreadable replies are recorded as observations */
export const RESPONSE_FORMAT_CHECK = 'response_format';

const RESPONSE_PROTOCOL = `Reply with ONLY one raw JSON object - no markdown, no text around it.

To use a tool:
{"thought":"<what you know and what you need next>","action":{"tool":"<tool name>","args":{...}}}

To answer the user:
{"thought":"<why the gathered data answers the question>","final_answer":"<your answer>"}

Use exactly one of "action" or "final_answer".`;

function describeTools(tools: ToolDescriptor[]): string {
  return tools
    .map(tool => {
      const params = tool.parameters
        .map(p => `    - ${p.name} (${p.type}${p.required ? ', required' : ''}): ${p.description}`)
        .join('\n');
      return `- ${tool.name}: ${tool.description}\n  args:\n${params}`;
    })
    .join('\n');
}

export function buildSystemPrompt(tools: ToolDescriptor[]): string {
  return `You are an assistant that looks up movie data with the tools below.

Tools:
${describeTools(tools)}

How to work:
- Use structured_query for exact matches, numbers, ranges, rankings, directors and cast.
- Use semantic_search for plots, themes and descriptive questions.
- Questions may need both. When part of the question can be answered by structured_query, do that first
  and use what you find to sharpen the semantic_search query. Refine results logically; do not just stack
  them.
- A person may be a director or a cast member. If they appear as neither, say they are not in the data.
- Numeric values of null mean the data is not available.
- Shorthands like 500M mean 500 million.
- Answer only from tool results. If something is unclear, ask the user instead of guessing.
- Never reveal how the data stores are built or structured.
- Before answering, check that every part of the question has been covered.

${RESPONSE_PROTOCOL}`;
}

export const FORMAT_REMINDER = `Your previous reply could not be read. ${RESPONSE_PROTOCOL}`;
