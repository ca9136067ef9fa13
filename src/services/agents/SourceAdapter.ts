import { DateRange, RawResult } from '../../types/models';

export interface CrawlRequest {
  keywords: readonly string[];
  detail: string;
  dateRange?: Readonly<DateRange>;
}

export interface CrawlContext {
  /** Aborted when the source's timeout budget or the query deadline expires */
  signal: AbortSignal;
  /** Lower confidence for this run without failing it (e.g. a scraping fallback was used) */
  reportDegraded(reason: string): void;
}

/**
 * A data source the orchestrator can dispatch a query to.
 *
 * `crawl` is lazy and not restartable: each call re-runs the underlying fetch.
 * Every result it yields carries `source === id`. Zero results is a valid,
 * successful crawl; failures are thrown as SourceUnavailableError.
 */
export interface SourceAdapter {
  readonly id: string;
  readonly domains: readonly string[];
  crawl(request: CrawlRequest, context: CrawlContext): AsyncIterable<RawResult>;
  supports(domain: string): boolean;
}

/**
 * Host match against an allow-list of domains or URLs, subdomains included
 */
export function domainMatches(domains: readonly string[], candidate: string): boolean {
  const host = hostOf(candidate);
  if (!host) return false;

  return domains.some(domain => {
    const allowed = hostOf(domain);
    return !!allowed && (host === allowed || host.endsWith(`.${allowed}`));
  });
}

function hostOf(value: string): string | null {
  const trimmed = value.trim().toLowerCase();
  if (!trimmed) return null;
  try {
    const url = new URL(trimmed.includes('://') ? trimmed : `https://${trimmed}`);
    return url.hostname.replace(/^www\./, '');
  } catch {
    return null;
  }
}

/**
 * `YYYY-MM-DD` in UTC
 */
export function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function searchText(request: CrawlRequest): string {
  return request.keywords.join(' ');
}
