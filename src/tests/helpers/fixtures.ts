import { Query, RawResult, ScoredResult, CrawlBundle, SourceOutcome } from '../../types/models';

/**
 * Run fn and hand back whatever it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

export async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

export function makeQuery(overrides: Partial<Query> = {}): Query {
  return {
    keywords: ['rust'],
    sources: ['google'],
    detail: '',
    ...overrides
  };
}

export function makeRaw(overrides: Partial<RawResult> = {}): RawResult {
  return {
    source: 'google',
    title: 'Rust borrow checker crash',
    url: 'https://example.com/issues/1',
    content: '',
    sourceMetadata: {},
    ...overrides
  };
}

export function makeScored(overrides: Partial<ScoredResult> = {}): ScoredResult {
  return {
    ...makeRaw(),
    relevanceScore: 8,
    relevanceReason: 'matches',
    ...overrides
  };
}

export function makeOutcome(source: string, results: RawResult[]): SourceOutcome {
  return {
    source,
    status: 'ok',
    results,
    attempts: 1,
    durationMs: 5
  };
}

export function makeBundle(query: Query, outcomes: SourceOutcome[]): CrawlBundle {
  return {
    query,
    outcomes,
    startedAt: new Date('2024-03-01T09:00:00Z'),
    finishedAt: new Date('2024-03-01T09:00:01Z')
  };
}
