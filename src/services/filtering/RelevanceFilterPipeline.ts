import {
  CrawlBundle, FilteredResult, PipelineReport, ScoredResult, ScoringReport, SourceReport
} from '../../types/models';
import { OverflowStrategy } from '../../config/settings';
import { errorMessage } from '../../models/errors';
import { RelevanceScorer } from '../llm/FallbackRelevanceLlm';
import { SUMMARY_SNIPPET_CHARS } from '../llm/prompts';
import {
  Candidate, contentKeywordStage, selectForScoring, titleHeuristicStage, toCandidates
} from './stages';

export interface PipelineOptions {
  scoringThreshold: number;
  minRelevanceScore: number;
  titlePermissive: boolean;
  overflowStrategy: OverflowStrategy;
  summarize: boolean;
  scoringBatchSize: number;
}

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  scoringThreshold: 5,
  minRelevanceScore: 5,
  titlePermissive: true,
  overflowStrategy: 'skip',
  summarize: true,
  scoringBatchSize: 5
};

interface ScoringPass {
  scored: Array<{ candidate: Candidate; result: ScoredResult }>;
  aborted: boolean;
}

/**
 * Reduces a crawl bundle to scored, relevant results. Cheap keyword stages run
 * first; LLM scoring only runs when few enough candidates survive them.
 */
export class RelevanceFilterPipeline {
  private options: PipelineOptions;

  constructor(private scorer: RelevanceScorer, options: Partial<PipelineOptions> = {}) {
    this.options = { ...DEFAULT_PIPELINE_OPTIONS, ...options };
  }

  async process(bundle: CrawlBundle): Promise<FilteredResult> {
    const { keywords, detail } = bundle.query;
    const candidates = toCandidates(bundle.outcomes.flatMap(outcome => outcome.results));

    const afterTitle = titleHeuristicStage(candidates, keywords, { permissive: this.options.titlePermissive });
    const afterContent = contentKeywordStage(afterTitle, keywords);
    console.log(`[PIPELINE] ${candidates.length} raw -> ${afterTitle.length} after title -> ${afterContent.length} after content`);

    const scoring: ScoringReport = { in: afterContent.length, scored: 0, kept: 0, aborted: false };
    let kept: Array<{ candidate: Candidate; result: ScoredResult }> = [];

    if (!this.scorer.isAvailable()) {
      scoring.skipped = 'no_backend';
      console.warn('[PIPELINE] No LLM backend available, skipping relevance scoring');
    } else {
      const selection = selectForScoring(afterContent, keywords, this.options.scoringThreshold, this.options.overflowStrategy);
      if (selection.skipped) {
        scoring.skipped = selection.skipped;
        console.warn(`[PIPELINE] ${afterContent.length} candidates exceed the scoring threshold of ${this.options.scoringThreshold}; scoring ${selection.selected.length}`);
      }

      const pass = await this.scoreAll(selection.selected, keywords, detail);
      scoring.scored = pass.scored.length;
      scoring.aborted = pass.aborted;

      kept = pass.scored
        .filter(({ result }) => result.relevanceScore >= this.options.minRelevanceScore)
        .sort((a, b) => b.result.relevanceScore - a.result.relevanceScore || a.candidate.order - b.candidate.order);
      scoring.kept = kept.length;
    }

    const resultsBySource: Record<string, ScoredResult[]> = {};
    for (const outcome of bundle.outcomes) {
      resultsBySource[outcome.source] = [];
    }
    for (const { result } of kept) {
      (resultsBySource[result.source] ??= []).push(result);
    }

    const totalCount = kept.length;
    const summary = await this.summarize(kept.map(({ result }) => result), keywords, detail);

    const report: PipelineReport = {
      sources: bundle.outcomes.map((outcome): SourceReport => ({
        source: outcome.source,
        status: outcome.status,
        rawCount: outcome.results.length,
        ...(outcome.degradedReason && { degradedReason: outcome.degradedReason }),
        ...(outcome.error && { error: outcome.error })
      })),
      stages: {
        titleHeuristic: { in: candidates.length, out: afterTitle.length },
        contentKeyword: { in: afterTitle.length, out: afterContent.length },
        scoring
      },
      summarized: summary !== ''
    };

    console.log(`[PIPELINE] ${totalCount} relevant results (${scoring.scored} scored)`);
    return deepFreeze({ resultsBySource, totalCount, summary, report });
  }

  /**
   * Batches run one after another, items within a batch concurrently.
   * The first scoring failure stops further batches; scores already obtained are kept.
   */
  private async scoreAll(selected: Candidate[], keywords: readonly string[], detail: string): Promise<ScoringPass> {
    const scored: ScoringPass['scored'] = [];
    const batchSize = Math.max(1, this.options.scoringBatchSize);

    for (let i = 0; i < selected.length; i += batchSize) {
      const batch = selected.slice(i, i + batchSize);
      const settled = await Promise.allSettled(batch.map(({ item }) =>
        this.scorer.score({ keywords, detail, title: item.title, content: item.content })
      ));

      let failed = false;
      for (let index = 0; index < settled.length; index++) {
        const outcome = settled[index];
        const candidate = batch[index];
        if (outcome.status === 'fulfilled') {
          scored.push({
            candidate,
            result: {
              ...candidate.item,
              relevanceScore: clampScore(outcome.value.score),
              relevanceReason: outcome.value.reason
            }
          });
        } else {
          failed = true;
          console.error(`[PIPELINE] Scoring failed for ${candidate.item.url}:`, errorMessage(outcome.reason));
        }
      }

      if (failed) {
        const remaining = selected.length - (i + batch.length);
        if (remaining > 0) {
          console.warn(`[PIPELINE] Scoring unavailable, skipping ${remaining} remaining candidates`);
        }
        return { scored, aborted: true };
      }
    }

    return { scored, aborted: false };
  }

  // Best effort: any failure leaves the summary empty
  private async summarize(results: ScoredResult[], keywords: readonly string[], detail: string): Promise<string> {
    if (!this.options.summarize || results.length === 0 || !this.scorer.isAvailable()) {
      return '';
    }
    try {
      return await this.scorer.summarize(
        results.map(result => ({
          source: result.source,
          title: result.title,
          content: result.content.slice(0, SUMMARY_SNIPPET_CHARS)
        })),
        { keywords, detail }
      );
    } catch (error) {
      console.error('[PIPELINE] Summarization failed:', errorMessage(error));
      return '';
    }
  }
}

export function clampScore(score: number): number {
  return Math.min(10, Math.max(0, Math.round(score)));
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    const children: unknown[] = Object.values(value);
    Object.freeze(value);
    children.forEach(deepFreeze);
  }
  return value;
}
