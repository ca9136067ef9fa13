import { RawResult } from '../../types/models';
import { OverflowStrategy } from '../../config/settings';
import { countKeywordHits, matchesAnyKeyword, tokenize } from '../../utils/keywords';

/**
 * A result moving through the pipeline, tagged with its position in the merged bundle
 */
export interface Candidate {
  item: RawResult;
  order: number;
}

export interface TitleStageOptions {
  /** Pass items whose keyword overlap cannot be computed instead of dropping them */
  permissive: boolean;
}

export interface ScoringSelection {
  selected: Candidate[];
  skipped?: 'over_threshold';
}

export function toCandidates(items: readonly RawResult[]): Candidate[] {
  return items.map((item, order) => ({ item, order }));
}

/**
 * Stage 1: keep items whose title mentions at least one keyword
 */
export function titleHeuristicStage(
  candidates: readonly Candidate[],
  keywords: readonly string[],
  options: TitleStageOptions
): Candidate[] {
  const keywordsHaveTokens = keywords.some(keyword => tokenize(keyword).length > 0);

  return candidates.filter(({ item }) => {
    if (!keywordsHaveTokens || tokenize(item.title).length === 0) {
      return options.permissive;
    }
    return matchesAnyKeyword(item.title, keywords);
  });
}

/**
 * Stage 2: items with content must mention a keyword in it; empty content passes
 */
export function contentKeywordStage(candidates: readonly Candidate[], keywords: readonly string[]): Candidate[] {
  return candidates.filter(({ item }) => !item.content.trim() || matchesAnyKeyword(item.content, keywords));
}

/**
 * Guard in front of LLM scoring. At or under the threshold everything is scored.
 * Over it, `skip` scores nothing and `truncate` scores the `threshold` candidates
 * with the most keyword hits in title and content, earlier discoveries first on ties.
 */
export function selectForScoring(
  candidates: readonly Candidate[],
  keywords: readonly string[],
  threshold: number,
  strategy: OverflowStrategy
): ScoringSelection {
  if (candidates.length <= threshold) {
    return { selected: [...candidates] };
  }
  if (strategy === 'skip') {
    return { selected: [], skipped: 'over_threshold' };
  }

  return {
    selected: candidates
      .map(candidate => ({ candidate, hits: countKeywordHits(`${candidate.item.title} ${candidate.item.content}`, keywords) }))
      .sort((a, b) => b.hits - a.hits || a.candidate.order - b.candidate.order)
      .slice(0, threshold)
      .map(({ candidate }) => candidate)
      .sort((a, b) => a.order - b.order),
    skipped: 'over_threshold'
  };
}
