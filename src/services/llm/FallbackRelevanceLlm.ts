import { Settings } from '../../config/settings';
import { LlmCallError, ScoringUnavailableError, SummarizationUnavailableError } from '../../models/errors';
import { sleep } from '../../utils/retry';
import { RelevanceBackend, RelevanceVerdict, toLlmCallError } from './RelevanceBackend';
import { OpenAIRelevanceBackend } from './OpenAIRelevanceBackend';
import { GeminiRelevanceBackend } from './GeminiRelevanceBackend';
import { ScoringInput, SummaryContext, SummaryItem } from './prompts';

/**
 * What the filter pipeline needs from the LLM layer
 */
export interface RelevanceScorer {
  isAvailable(): boolean;
  /** @throws ScoringUnavailableError once every backend has failed */
  score(input: ScoringInput): Promise<RelevanceVerdict>;
  /** @throws SummarizationUnavailableError once every backend has failed */
  summarize(items: readonly SummaryItem[], context: SummaryContext): Promise<string>;
}

export interface FallbackOptions {
  maxAttempts: number;
  retryDelayMs: number;
}

/**
 * Tries each backend in order. Transient failures are retried on the same backend
 * with a linearly growing delay; a permanent failure moves on to the next one.
 */
export class FallbackRelevanceLlm implements RelevanceScorer {
  constructor(
    private backends: RelevanceBackend[],
    private options: FallbackOptions = { maxAttempts: 2, retryDelayMs: 1000 }
  ) {}

  isAvailable(): boolean {
    return this.backends.length > 0;
  }

  async score(input: ScoringInput): Promise<RelevanceVerdict> {
    const failures: string[] = [];
    const verdict = await this.firstSuccess(backend => backend.score(input), failures);
    if (!verdict) {
      throw new ScoringUnavailableError(`Relevance scoring failed: ${failures.join('; ') || 'no LLM backend configured'}`);
    }
    return verdict;
  }

  async summarize(items: readonly SummaryItem[], context: SummaryContext): Promise<string> {
    const failures: string[] = [];
    const summary = await this.firstSuccess(backend => backend.summarize(items, context), failures);
    if (summary === undefined) {
      throw new SummarizationUnavailableError(`Summarization failed: ${failures.join('; ') || 'no LLM backend configured'}`);
    }
    return summary;
  }

  private async firstSuccess<T>(call: (backend: RelevanceBackend) => Promise<T>, failures: string[]): Promise<T | undefined> {
    for (const backend of this.backends) {
      for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
        let failure: LlmCallError;
        try {
          return await call(backend);
        } catch (error) {
          failure = toLlmCallError(backend.name, error);
        }

        const retry = failure.transient && attempt < this.options.maxAttempts;
        console.warn(`[LLM] ${backend.name} attempt ${attempt} failed: ${failure.message}${retry ? ' (retrying)' : ''}`);
        if (!retry) {
          failures.push(`${backend.name}: ${failure.message}`);
          break;
        }
        await sleep(this.options.retryDelayMs * attempt);
      }
    }
    return undefined;
  }
}

/**
 * Configured backends, primary first. Backends without an API key are left out.
 */
export function createRelevanceLlm(llm: Settings['llm']): FallbackRelevanceLlm {
  const available: Record<Settings['llm']['primary'], RelevanceBackend | undefined> = {
    gemini: llm.geminiApiKey ? new GeminiRelevanceBackend({ apiKey: llm.geminiApiKey, model: llm.geminiModel }) : undefined,
    openai: llm.openaiApiKey
      ? new OpenAIRelevanceBackend({ apiKey: llm.openaiApiKey, model: llm.openaiModel, baseUrl: llm.openaiBaseUrl })
      : undefined
  };
  const secondary = llm.primary === 'gemini' ? 'openai' : 'gemini';
  const backends = [available[llm.primary], available[secondary]].filter(
    (backend): backend is RelevanceBackend => backend !== undefined
  );

  if (backends.length === 0) {
    console.warn('[LLM] No LLM backend configured; relevance scoring and summaries are disabled');
  } else {
    console.log(`[LLM] Backends: ${backends.map(backend => backend.name).join(' -> ')}`);
  }
  return new FallbackRelevanceLlm(backends, { maxAttempts: llm.maxAttempts, retryDelayMs: llm.retryDelayMs });
}
