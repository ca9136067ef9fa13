import OpenAI from 'openai';
import { LlmCallError } from '../../models/errors';
import { RelevanceBackend, RelevanceVerdict, parseVerdict, toLlmCallError } from './RelevanceBackend';
import {
  SCORING_SYSTEM_PROMPT, SUMMARY_SYSTEM_PROMPT, ScoringInput, SummaryContext, SummaryItem,
  buildScoringPrompt, buildSummaryPrompt
} from './prompts';

export interface OpenAIBackendConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
}

/**
 * Relevance scoring and summaries through the OpenAI chat completions API
 */
export class OpenAIRelevanceBackend implements RelevanceBackend {
  readonly name = 'openai';
  private openai: OpenAI;
  private model: string;

  constructor(config: OpenAIBackendConfig) {
    if (!config.apiKey) {
      throw new Error('OpenAI API key is required');
    }

    this.openai = new OpenAI({
      apiKey: config.apiKey,
      ...(config.baseUrl && { baseURL: config.baseUrl })
    });
    this.model = config.model || 'gpt-4o-mini';
  }

  async score(input: ScoringInput): Promise<RelevanceVerdict> {
    let content: string | null | undefined;
    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: SCORING_SYSTEM_PROMPT },
          { role: 'user', content: buildScoringPrompt(input) }
        ],
        temperature: 0.1, // Low temperature for consistent scores
        max_tokens: 200,
        response_format: { type: 'json_object' }
      });
      content = response.choices[0]?.message?.content;
    } catch (error) {
      throw toLlmCallError(this.name, error);
    }

    return parseVerdict(this.name, content);
  }

  async summarize(items: readonly SummaryItem[], context: SummaryContext): Promise<string> {
    let content: string | null | undefined;
    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
          { role: 'user', content: buildSummaryPrompt(items, context) }
        ],
        temperature: 0.3,
        max_tokens: 300
      });
      content = response.choices[0]?.message?.content;
    } catch (error) {
      throw toLlmCallError(this.name, error);
    }

    const summary = content?.trim();
    if (!summary) {
      throw new LlmCallError(this.name, 'Empty summary', false);
    }
    return summary;
  }
}
