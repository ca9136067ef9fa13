export const MAX_TITLE_CHARS = 200;
export const MAX_CONTENT_CHARS = 1500;
export const SUMMARY_SNIPPET_CHARS = 300;

export interface ScoringInput {
  keywords: readonly string[];
  detail: string;
  title: string;
  content: string;
}

export interface SummaryItem {
  source: string;
  title: string;
  content: string;
}

export interface SummaryContext {
  keywords: readonly string[];
  detail: string;
}

export const SCORING_SYSTEM_PROMPT =
  'You rate how relevant a search result is to what a user is looking for. Always respond with valid JSON.';

export const SUMMARY_SYSTEM_PROMPT =
  'You write short digests of search results for a busy reader. Respond with plain text only.';

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export function buildScoringPrompt(input: ScoringInput): string {
  const detail = input.detail.trim();

  return `Score the following search result from 0 to 10 for relevance to the user's keywords and preferences.

USER KEYWORDS: ${input.keywords.join(', ')}
USER PREFERENCES: ${detail ? `"${detail}"` : '(none, judge by keywords only)'}

RESULT:
Title: ${truncate(input.title, MAX_TITLE_CHARS)}
Content: ${truncate(input.content, MAX_CONTENT_CHARS) || '(no content)'}

SCORING GUIDE:
- 8-10: highly relevant to the keywords and matches the preferences
- 5-7: relevant to the keywords but does not fully match the preferences
- 0-4: not relevant, or contradicts the preferences

Respond with JSON only, in this format:
{"score": <integer 0-10>, "reason": "<one short sentence>"}`;
}

export function buildSummaryPrompt(items: readonly SummaryItem[], context: SummaryContext): string {
  const sources = new Set(items.map(item => item.source));
  const listing = items
    .map((item, index) =>
      `${index + 1}. [${item.source}] ${truncate(item.title, MAX_TITLE_CHARS)}\n   ${truncate(item.content, SUMMARY_SNIPPET_CHARS)}`)
    .join('\n');
  const detail = context.detail.trim();

  return `Summarize these search results.

USER KEYWORDS: ${context.keywords.join(', ')}
USER PREFERENCES: ${detail ? `"${detail}"` : '(none)'}

${items.length} relevant results across ${sources.size} source(s):
${listing}

Write a concise 2-3 sentence summary that highlights the most relevant findings,
mentions which sources had the best results and relates them to the user's preferences when given.
Return only the summary text.`;
}
