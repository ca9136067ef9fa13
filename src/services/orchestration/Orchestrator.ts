import { CrawlBundle, Query, RawResult, SourceOutcome } from '../../types/models';
import { SourceUnavailableError, errorMessage, toErrorReport } from '../../models/errors';
import { isAbsoluteHttpUrl } from '../../models/validation';
import { RetryExhaustedError, withRetry } from '../../utils/retry';
import { AdapterRegistry } from '../agents/AdapterRegistry';
import { CrawlRequest, SourceAdapter } from '../agents/SourceAdapter';

export interface OrchestratorOptions {
  sourceTimeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  retryBackoff: number;
  maxResultsPerSource: number;
  queryDeadlineMs?: number;
}

export interface RunOptions {
  /** Outer deadline for the whole query; sources still running when it expires are reported failed */
  deadlineMs?: number;
}

interface AttemptResult {
  results: RawResult[];
  degradedReason?: string;
}

/**
 * Fans a query out to its sources concurrently and collects a per-source bundle.
 * Per-source failures are recorded on the bundle, never thrown; the only error
 * `run` raises is RequestValidationError for unknown sources.
 */
export class Orchestrator {
  constructor(
    private registry: AdapterRegistry,
    private options: OrchestratorOptions,
    private clock: () => Date = () => new Date()
  ) {}

  async run(query: Query, runOptions: RunOptions = {}): Promise<CrawlBundle> {
    // Fails the whole call before anything is dispatched
    const adapters = this.registry.resolveAll(query.sources);
    const startedAt = this.clock();

    const request: CrawlRequest = {
      keywords: query.keywords,
      detail: query.detail,
      ...(query.dateRange && { dateRange: query.dateRange })
    };

    const deadline = new AbortController();
    const deadlineMs = runOptions.deadlineMs ?? this.options.queryDeadlineMs;
    const deadlineTimer = deadlineMs !== undefined
      ? setTimeout(() => {
          console.warn(`[ORCHESTRATOR] Query deadline of ${deadlineMs}ms reached`);
          deadline.abort();
        }, deadlineMs)
      : undefined;

    console.log(`[ORCHESTRATOR] Dispatching "${query.keywords.join(', ')}" to ${adapters.map(a => a.id).join(', ')}`);

    try {
      const outcomes = await Promise.all(adapters.map(adapter => this.dispatch(adapter, request, deadline.signal)));
      const finishedAt = this.clock();

      const failed = outcomes.filter(outcome => outcome.status === 'failed').length;
      console.log(`[ORCHESTRATOR] Completed ${outcomes.length} sources (${failed} failed) in ${finishedAt.getTime() - startedAt.getTime()}ms`);

      return { query, outcomes, startedAt, finishedAt };
    } finally {
      if (deadlineTimer) clearTimeout(deadlineTimer);
    }
  }

  private async dispatch(adapter: SourceAdapter, request: CrawlRequest, deadline: AbortSignal): Promise<SourceOutcome> {
    const started = Date.now();
    const controller = new AbortController();
    let timedOut = false;
    let attempts = 0;

    const onDeadline = () => controller.abort();
    deadline.addEventListener('abort', onDeadline, { once: true });
    if (deadline.aborted) controller.abort();

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.sourceTimeoutMs);

    // Settles the race even when an adapter ignores its signal
    const aborted = new Promise<never>((_, reject) => {
      const fail = () => reject(this.abortError(adapter.id, timedOut));
      if (controller.signal.aborted) fail();
      controller.signal.addEventListener('abort', fail, { once: true });
    });

    try {
      const attempt = withRetry(
        n => {
          attempts = n;
          return this.crawlOnce(adapter, request, controller.signal);
        },
        {
          maxAttempts: this.options.maxAttempts,
          baseDelayMs: this.options.retryBaseDelayMs,
          backoff: this.options.retryBackoff,
          signal: controller.signal,
          shouldRetry: error => error instanceof SourceUnavailableError && error.transient && !controller.signal.aborted,
          onRetry: (error, n, delayMs) =>
            console.warn(`[ORCHESTRATOR] ${adapter.id} attempt ${n} failed (${errorMessage(error)}), retrying in ${delayMs}ms`)
        }
      );

      const { value } = await Promise.race([attempt, aborted]);
      const durationMs = Date.now() - started;

      if (value.degradedReason) {
        console.warn(`[ORCHESTRATOR] ${adapter.id} degraded: ${value.degradedReason}`);
        return {
          source: adapter.id,
          status: 'degraded',
          results: value.results.map(result => ({
            ...result,
            sourceMetadata: { ...result.sourceMetadata, confidence: 'degraded' }
          })),
          attempts,
          durationMs,
          degradedReason: value.degradedReason
        };
      }

      console.log(`[ORCHESTRATOR] ${adapter.id}: ${value.results.length} results in ${durationMs}ms`);
      return { source: adapter.id, status: 'ok', results: value.results, attempts, durationMs };
    } catch (error) {
      // An abort wins over whatever the adapter threw while being cancelled
      const cause = controller.signal.aborted
        ? this.abortError(adapter.id, timedOut)
        : error instanceof RetryExhaustedError ? error.lastError : error;

      console.error(`[ORCHESTRATOR] ${adapter.id} failed after ${attempts} attempt(s):`, errorMessage(cause));
      return {
        source: adapter.id,
        status: 'failed',
        results: [],
        attempts,
        durationMs: Date.now() - started,
        error: toErrorReport(cause)
      };
    } finally {
      clearTimeout(timer);
      deadline.removeEventListener('abort', onDeadline);
    }
  }

  /**
   * One pass over the adapter's lazy sequence. A failed pass throws and its results are discarded.
   */
  private async crawlOnce(adapter: SourceAdapter, request: CrawlRequest, signal: AbortSignal): Promise<AttemptResult> {
    const results: RawResult[] = [];
    const seen = new Set<string>();
    let degradedReason: string | undefined;

    const context = {
      signal,
      reportDegraded: (reason: string) => {
        degradedReason = degradedReason ?? reason;
      }
    };

    for await (const item of adapter.crawl(request, context)) {
      if (signal.aborted) break;
      if (!this.accept(adapter.id, item)) continue;
      if (seen.has(item.url)) continue;

      seen.add(item.url);
      results.push(item);
      if (results.length >= this.options.maxResultsPerSource) {
        console.log(`[ORCHESTRATOR] ${adapter.id} reached the ${this.options.maxResultsPerSource} result cap`);
        break;
      }
    }

    if (signal.aborted) {
      throw this.abortError(adapter.id, false);
    }
    return { results, degradedReason };
  }

  private accept(source: string, item: RawResult): boolean {
    if (item.source !== source) {
      console.warn(`[ORCHESTRATOR] Dropping result tagged '${item.source}' from ${source}`);
      return false;
    }
    if (!item.title || !item.title.trim()) {
      console.warn(`[ORCHESTRATOR] Dropping untitled result from ${source}: ${item.url}`);
      return false;
    }
    if (!isAbsoluteHttpUrl(item.url)) {
      console.warn(`[ORCHESTRATOR] Dropping result with invalid URL from ${source}: ${item.url}`);
      return false;
    }
    return true;
  }

  private abortError(source: string, timedOut: boolean): SourceUnavailableError {
    return timedOut
      ? new SourceUnavailableError(source, 'timeout', `${source} did not finish within ${this.options.sourceTimeoutMs}ms`)
      : new SourceUnavailableError(source, 'deadline', `${source} was still running when the query deadline expired`);
  }
}
