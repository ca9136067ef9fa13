/**
 * Core data models for the Issue Radar system
 */

export interface DateRange {
  start: Date;
  end: Date; // inclusive
}

/**
 * Immutable search request. Built by `buildQuery` in models/validation.
 */
export interface Query {
  readonly keywords: readonly string[];
  readonly sources: readonly string[];
  readonly detail: string;
  readonly dateRange?: Readonly<DateRange>;
}

export interface RawResult {
  source: string;
  title: string;
  url: string;
  content: string;
  publishedAt?: Date;
  sourceMetadata: Record<string, string>;
}

export interface ScoredResult extends RawResult {
  relevanceScore: number; // integer 0-10
  relevanceReason: string;
}

export type SourceStatus = 'ok' | 'degraded' | 'failed';

export interface ErrorReport {
  code: string;
  message: string;
}

export interface SourceOutcome {
  source: string;
  status: SourceStatus;
  results: RawResult[];
  attempts: number;
  durationMs: number;
  degradedReason?: string;
  error?: ErrorReport;
}

export interface CrawlBundle {
  query: Query;
  outcomes: SourceOutcome[]; // request order
  startedAt: Date;
  finishedAt: Date;
}

export interface SourceReport {
  source: string;
  status: SourceStatus;
  rawCount: number;
  degradedReason?: string;
  error?: ErrorReport;
}

export type ScoringSkipReason = 'over_threshold' | 'no_backend';

export interface StageCount {
  in: number;
  out: number;
}

export interface ScoringReport {
  in: number;
  scored: number;
  kept: number;
  skipped?: ScoringSkipReason;
  aborted: boolean;
}

export interface PipelineReport {
  sources: SourceReport[];
  stages: {
    titleHeuristic: StageCount;
    contentKeyword: StageCount;
    scoring: ScoringReport;
  };
  summarized: boolean;
}

export interface FilteredResult {
  readonly resultsBySource: Readonly<Record<string, readonly ScoredResult[]>>;
  readonly totalCount: number;
  readonly summary: string;
  readonly report: PipelineReport;
}

export interface Subscription {
  id: string;
  email: string;
  query: Query;
  notificationTime: string; // HH:MM, local time
  lastRun: Date | null;
  createdAt: Date;
}

export type RunStatus = 'delivered' | 'delivery_failed' | 'failed';

export interface SubscriptionRun {
  id: string;
  subscriptionId: string;
  email: string;
  startedAt: Date;
  finishedAt: Date;
  status: RunStatus;
  totalCount: number;
  error?: string;
}

// Database row interfaces (for SQLite storage)
export interface SubscriptionRow {
  id: string;
  email: string;
  keywords: string; // JSON string array
  sources: string; // JSON string array
  detail: string;
  date_start: string | null;
  date_end: string | null;
  notification_time: string;
  last_run: string | null;
  created_at: string;
}

export interface SubscriptionRunRow {
  id: string;
  subscription_id: string;
  email: string;
  started_at: string;
  finished_at: string;
  status: string;
  total_count: number;
  error: string | null;
}
