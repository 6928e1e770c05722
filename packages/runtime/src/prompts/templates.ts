import nunjucks from 'nunjucks';
import { WORKSHEET_DEFAULTS, type SearchResult } from '@worksheetbot/core';
import { type ChildProfile } from './children';

// Prompts are plain text; escaping would turn "Landon's" into "Landon&#39;s".
const env = new nunjucks.Environment(null, { autoescape: false, trimBlocks: true, lstripBlocks: true });

const WORKSHEET_PROMPT = `You are WorksheetBot, a friendly assistant that creates fun, educational worksheets for {{ child.name }}, age {{ child.age }}. {{ child.about }}
{{ child.focus }}
Generate at least {{ minQuestions }} unique questions grouped into Parts A, B, and C. Do not repeat questions. Include playful themes, icons, and parent tips.
Always format output in labeled sections: TITLE, INSTRUCTIONS, PART A, PART B, PART C, and PARENT TIPS.
Write TITLE, INSTRUCTIONS and PARENT TIPS on one line each, as "LABEL: text".
Write numbered questions within each part.
Keep language friendly, concise, and encouraging.
Today's date is {{ today }}.`;

const CHAT_PROMPT = `You are WorksheetBot, a helpful assistant for a family with two young children.
Today's date is {{ today }}.
{% if lookup %}
Here is what a live search returned for the request:
{{ lookup }}
{% endif %}
Answer concisely and say so when you are not sure.`;

export function buildWorksheetPrompt(
  child: ChildProfile,
  today: string,
  minQuestions: number = WORKSHEET_DEFAULTS.MIN_QUESTIONS
): string {
  return env.renderString(WORKSHEET_PROMPT, { child, today, minQuestions }).trim();
}

export function buildChatPrompt(today: string, lookup?: string): string {
  return env.renderString(CHAT_PROMPT, { today, lookup }).trim();
}

export const NO_SEARCH_RESULTS = 'No live results available.';

/** Bullet list of the first `limit` results that carry a title or a snippet. */
export function formatSearchResults(results: readonly SearchResult[], limit = 5): string {
  const lines = results
    .slice(0, limit)
    .filter((result) => result.title || result.snippet)
    .map((result) => `- ${result.title}: ${result.snippet}`);

  return lines.length > 0 ? lines.join('\n') : NO_SEARCH_RESULTS;
}
