import {
  Subscription, SubscriptionRow, SubscriptionRun, SubscriptionRunRow,
  FilteredResult, ScoredResult, RunStatus
} from '../types/models';

/**
 * Transformation functions between database rows, model objects and API payloads
 */

function parseStringArray(json: string): string[] {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((item): item is string => typeof item === 'string');
}

function isRunStatus(value: string): value is RunStatus {
  return value === 'delivered' || value === 'delivery_failed' || value === 'failed';
}

// Subscription transformations
export function subscriptionRowToModel(row: SubscriptionRow): Subscription {
  const dateRange = row.date_start && row.date_end
    ? Object.freeze({ start: new Date(row.date_start), end: new Date(row.date_end) })
    : undefined;

  return {
    id: row.id,
    email: row.email,
    query: Object.freeze({
      keywords: Object.freeze(parseStringArray(row.keywords)),
      sources: Object.freeze(parseStringArray(row.sources)),
      detail: row.detail,
      ...(dateRange && { dateRange })
    }),
    notificationTime: row.notification_time,
    lastRun: row.last_run ? new Date(row.last_run) : null,
    createdAt: new Date(row.created_at)
  };
}

export function subscriptionModelToRow(subscription: Subscription): SubscriptionRow {
  return {
    id: subscription.id,
    email: subscription.email,
    keywords: JSON.stringify(subscription.query.keywords),
    sources: JSON.stringify(subscription.query.sources),
    detail: subscription.query.detail,
    date_start: subscription.query.dateRange ? subscription.query.dateRange.start.toISOString() : null,
    date_end: subscription.query.dateRange ? subscription.query.dateRange.end.toISOString() : null,
    notification_time: subscription.notificationTime,
    last_run: subscription.lastRun ? subscription.lastRun.toISOString() : null,
    created_at: subscription.createdAt.toISOString()
  };
}

// Run record transformations
export function runRowToModel(row: SubscriptionRunRow): SubscriptionRun {
  return {
    id: row.id,
    subscriptionId: row.subscription_id,
    email: row.email,
    startedAt: new Date(row.started_at),
    finishedAt: new Date(row.finished_at),
    status: isRunStatus(row.status) ? row.status : 'failed',
    totalCount: row.total_count,
    ...(row.error !== null && { error: row.error })
  };
}

export function runModelToRow(run: SubscriptionRun): SubscriptionRunRow {
  return {
    id: run.id,
    subscription_id: run.subscriptionId,
    email: run.email,
    started_at: run.startedAt.toISOString(),
    finished_at: run.finishedAt.toISOString(),
    status: run.status,
    total_count: run.totalCount,
    error: run.error ?? null
  };
}

// API payloads
export function subscriptionToJson(subscription: Subscription) {
  return {
    id: subscription.id,
    email: subscription.email,
    keywords: [...subscription.query.keywords],
    sources: [...subscription.query.sources],
    detail: subscription.query.detail,
    date_range: subscription.query.dateRange
      ? {
          start: subscription.query.dateRange.start.toISOString(),
          end: subscription.query.dateRange.end.toISOString()
        }
      : null,
    notification_time: subscription.notificationTime,
    last_run: subscription.lastRun ? subscription.lastRun.toISOString() : null,
    created_at: subscription.createdAt.toISOString()
  };
}

function scoredResultToJson(item: ScoredResult) {
  return {
    source: item.source,
    title: item.title,
    url: item.url,
    content: item.content,
    published_at: item.publishedAt ? item.publishedAt.toISOString() : null,
    source_metadata: item.sourceMetadata,
    relevance_score: item.relevanceScore,
    relevance_reason: item.relevanceReason
  };
}

export function filteredResultToJson(result: FilteredResult) {
  const resultsBySource: Record<string, ReturnType<typeof scoredResultToJson>[]> = {};
  for (const [source, items] of Object.entries(result.resultsBySource)) {
    resultsBySource[source] = items.map(scoredResultToJson);
  }

  return {
    results_by_source: resultsBySource,
    total_count: result.totalCount,
    summary: result.summary,
    report: result.report
  };
}

export function runToJson(run: SubscriptionRun) {
  return {
    id: run.id,
    subscription_id: run.subscriptionId,
    started_at: run.startedAt.toISOString(),
    finished_at: run.finishedAt.toISOString(),
    status: run.status,
    total_count: run.totalCount,
    error: run.error ?? null
  };
}
