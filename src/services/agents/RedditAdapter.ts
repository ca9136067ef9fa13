import { parseHTML } from 'linkedom';
import { DateRange, RawResult } from '../../types/models';
import { SourceUnavailableError } from '../../models/errors';
import { CrawlContext, CrawlRequest, SourceAdapter, domainMatches, searchText } from './SourceAdapter';
import {
  absoluteUrl, collapseWhitespace, fetchJson, fetchText, isRecord, numberField, parseDate, stringField
} from './http';

export type RedditTimeWindow = 'day' | 'week' | 'month' | 'year' | 'all';

export interface RedditAdapterOptions {
  userAgent?: string;
  apiBaseUrl?: string;
  scrapeBaseUrl?: string;
  limit?: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Reddit search. The JSON endpoint is the primary path; when it is unavailable
 * the old.reddit.com results page is scraped and the run is reported degraded.
 */
export class RedditAdapter implements SourceAdapter {
  readonly id = 'reddit';
  readonly domains = ['https://www.reddit.com', 'https://old.reddit.com'];
  private userAgent: string;
  private apiBaseUrl: string;
  private scrapeBaseUrl: string;
  private limit: number;

  constructor(options: RedditAdapterOptions = {}) {
    this.userAgent = options.userAgent ?? 'issue-radar/1.0';
    this.apiBaseUrl = options.apiBaseUrl ?? 'https://www.reddit.com';
    this.scrapeBaseUrl = options.scrapeBaseUrl ?? 'https://old.reddit.com';
    this.limit = options.limit ?? 100;
  }

  supports(domain: string): boolean {
    return domainMatches(this.domains, domain);
  }

  async *crawl(request: CrawlRequest, context: CrawlContext): AsyncIterable<RawResult> {
    let results: RawResult[];
    try {
      results = await this.searchApi(request, context.signal);
    } catch (error) {
      if (!(error instanceof SourceUnavailableError) || context.signal.aborted) {
        throw error;
      }
      console.warn(`[REDDIT] JSON search unavailable (${error.message}), falling back to HTML`);
      context.reportDegraded('reddit_json_unavailable');
      results = await this.searchHtml(request, context.signal);
    }

    yield* results.filter(result => withinRange(result.publishedAt, request.dateRange));
  }

  private async searchApi(request: CrawlRequest, signal: AbortSignal): Promise<RawResult[]> {
    const params = new URLSearchParams({
      q: searchText(request),
      sort: 'new',
      t: timeWindow(request.dateRange),
      limit: String(this.limit),
      raw_json: '1'
    });
    const url = `${this.apiBaseUrl}/search.json?${params.toString()}`;
    const payload = await fetchJson(this.id, url, { signal, headers: { 'User-Agent': this.userAgent } });
    return this.parseListing(payload);
  }

  parseListing(payload: unknown): RawResult[] {
    if (!isRecord(payload) || !isRecord(payload.data) || !Array.isArray(payload.data.children)) {
      throw new SourceUnavailableError(this.id, 'parse', 'Unexpected Reddit listing shape');
    }

    const children: unknown[] = payload.data.children;
    const results: RawResult[] = [];
    for (const child of children) {
      if (!isRecord(child) || !isRecord(child.data)) continue;
      const post = child.data;

      const title = collapseWhitespace(stringField(post, 'title'));
      const url = absoluteUrl(stringField(post, 'permalink'), 'https://www.reddit.com');
      if (!title || !url) continue;

      const sourceMetadata: Record<string, string> = {};
      const subreddit = stringField(post, 'subreddit');
      const comments = numberField(post, 'num_comments');
      const score = numberField(post, 'score');
      if (subreddit) sourceMetadata.subreddit = subreddit;
      if (comments !== undefined) sourceMetadata.num_comments = String(comments);
      if (score !== undefined) sourceMetadata.score = String(score);

      results.push({
        source: this.id,
        title,
        url,
        content: collapseWhitespace(stringField(post, 'selftext')),
        publishedAt: parseDate(numberField(post, 'created_utc')),
        sourceMetadata
      });
    }
    return results;
  }

  private async searchHtml(request: CrawlRequest, signal: AbortSignal): Promise<RawResult[]> {
    const params = new URLSearchParams({ q: searchText(request), sort: 'new', t: timeWindow(request.dateRange) });
    const url = `${this.scrapeBaseUrl}/search?${params.toString()}`;
    const html = await fetchText(this.id, url, { signal, headers: { 'User-Agent': this.userAgent } });
    return this.parseSearchPage(html);
  }

  parseSearchPage(html: string): RawResult[] {
    const { document } = parseHTML(html);
    const results: RawResult[] = [];

    for (const post of Array.from(document.querySelectorAll('div.search-result-link'))) {
      const titleLink = post.querySelector('a.search-title');
      const title = collapseWhitespace(titleLink?.textContent);
      const url = absoluteUrl(titleLink?.getAttribute('href'), this.scrapeBaseUrl);
      if (!title || !url) continue;

      const sourceMetadata: Record<string, string> = {};
      const subreddit = collapseWhitespace(post.querySelector('a.search-subreddit-link')?.textContent);
      if (subreddit) sourceMetadata.subreddit = subreddit.replace(/^r\//, '');
      const comments = collapseWhitespace(post.querySelector('a.search-comments')?.textContent).match(/\d[\d,]*/);
      if (comments) sourceMetadata.num_comments = comments[0].replace(/,/g, '');

      results.push({
        source: this.id,
        title,
        url,
        content: collapseWhitespace(post.querySelector('.search-result-body')?.textContent),
        publishedAt: parseDate(post.querySelector('time[datetime]')?.getAttribute('datetime')),
        sourceMetadata
      });
    }
    return results;
  }
}

/**
 * Reddit's `t` parameter, from the length of the requested range
 */
export function timeWindow(range?: Readonly<DateRange>): RedditTimeWindow {
  if (!range) return 'all';
  const days = (range.end.getTime() - range.start.getTime()) / DAY_MS;
  if (days <= 1) return 'day';
  if (days <= 7) return 'week';
  if (days <= 31) return 'month';
  if (days <= 365) return 'year';
  return 'all';
}

function withinRange(date: Date | undefined, range?: Readonly<DateRange>): boolean {
  if (!range || !date) return true;
  // The end bound covers the whole end day
  return date.getTime() >= range.start.getTime() && date.getTime() < range.end.getTime() + DAY_MS;
}
