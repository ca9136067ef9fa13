import { LlmCallError } from '../../models/errors';
import { ScoringInput, SummaryContext, SummaryItem } from './prompts';

export interface RelevanceVerdict {
  score: number;
  reason: string;
}

/**
 * One LLM provider. Failures are thrown as LlmCallError, flagged transient when a retry may help.
 */
export interface RelevanceBackend {
  readonly name: string;
  score(input: ScoringInput): Promise<RelevanceVerdict>;
  summarize(items: readonly SummaryItem[], context: SummaryContext): Promise<string>;
}

/**
 * Parse the `{score, reason}` object a backend returned
 */
export function parseVerdict(backend: string, text: string | null | undefined): RelevanceVerdict {
  if (!text) {
    throw new LlmCallError(backend, 'Empty response', false);
  }

  let parsed: unknown;
  try {
    // Some models wrap JSON in a code fence
    parsed = JSON.parse(text.replace(/^\s*```(?:json)?\s*|\s*```\s*$/g, ''));
  } catch {
    throw new LlmCallError(backend, `Response is not valid JSON: ${text.slice(0, 100)}`, false);
  }

  if (typeof parsed !== 'object' || parsed === null || !('score' in parsed)) {
    throw new LlmCallError(backend, 'Response has no score', false);
  }

  const score = Number(parsed.score);
  if (!Number.isFinite(score)) {
    throw new LlmCallError(backend, `Score is not a number: ${String(parsed.score)}`, false);
  }
  const reason = 'reason' in parsed && typeof parsed.reason === 'string' ? parsed.reason : '';

  return { score, reason };
}

// 408, 429 and 5xx are worth retrying
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

const CONNECTION_FAILURE = /ECONNRESET|ECONNREFUSED|ETIMEDOUT|EAI_AGAIN|socket hang up|fetch failed|network|timed? ?out/i;

/**
 * Wrap an SDK error, deciding from its status (or lack of one) whether it is transient
 */
export function toLlmCallError(backend: string, error: unknown): LlmCallError {
  if (error instanceof LlmCallError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const status = typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
    ? error.status
    : undefined;

  if (status !== undefined) {
    return new LlmCallError(backend, message, isTransientStatus(status), status);
  }

  const name = error instanceof Error ? error.name : '';
  const transient = /Connection|Timeout/.test(name) || CONNECTION_FAILURE.test(message);
  return new LlmCallError(backend, message, transient);
}
