import { GoogleGenerativeAI } from '@google/generative-ai';
import { LlmCallError } from '../../models/errors';
import { RelevanceBackend, RelevanceVerdict, parseVerdict, toLlmCallError } from './RelevanceBackend';
import {
  SCORING_SYSTEM_PROMPT, SUMMARY_SYSTEM_PROMPT, ScoringInput, SummaryContext, SummaryItem,
  buildScoringPrompt, buildSummaryPrompt
} from './prompts';

export interface GeminiBackendConfig {
  apiKey: string;
  model?: string;
}

/**
 * Relevance scoring and summaries through Google's Gemini API
 */
export class GeminiRelevanceBackend implements RelevanceBackend {
  readonly name = 'gemini';
  private genAI: GoogleGenerativeAI;
  private model: string;

  constructor(config: GeminiBackendConfig) {
    if (!config.apiKey) {
      throw new Error('Gemini API key is required');
    }
    this.genAI = new GoogleGenerativeAI(config.apiKey);
    this.model = config.model || 'gemini-2.0-flash-lite';
  }

  async score(input: ScoringInput): Promise<RelevanceVerdict> {
    const text = await this.generate(SCORING_SYSTEM_PROMPT, buildScoringPrompt(input), {
      temperature: 0.1,
      maxOutputTokens: 200,
      responseMimeType: 'application/json'
    });
    return parseVerdict(this.name, text);
  }

  async summarize(items: readonly SummaryItem[], context: SummaryContext): Promise<string> {
    const text = await this.generate(SUMMARY_SYSTEM_PROMPT, buildSummaryPrompt(items, context), {
      temperature: 0.3,
      maxOutputTokens: 300
    });
    const summary = text.trim();
    if (!summary) {
      throw new LlmCallError(this.name, 'Empty summary', false);
    }
    return summary;
  }

  private async generate(
    systemInstruction: string,
    prompt: string,
    generationConfig: { temperature: number; maxOutputTokens: number; responseMimeType?: string }
  ): Promise<string> {
    try {
      const model = this.genAI.getGenerativeModel({ model: this.model, systemInstruction, generationConfig });
      const result = await model.generateContent(prompt);
      return result.response.text();
    } catch (error) {
      throw toLlmCallError(this.name, error);
    }
  }
}
