import { parseHTML } from 'linkedom';
import { RawResult } from '../../types/models';
import { SourceUnavailableError } from '../../models/errors';
import { CrawlContext, CrawlRequest, SourceAdapter, domainMatches, isoDay, searchText } from './SourceAdapter';
import {
  absoluteUrl, collapseWhitespace, fetchJson, fetchText, isRecord, numberField, parseDate, stringField
} from './http';

export interface GithubAdapterOptions {
  token?: string;
  apiBaseUrl?: string;
  webBaseUrl?: string;
  perPage?: number;
}

/**
 * GitHub issue and pull request search through the REST API, with the
 * github.com search page as a degraded fallback when the API refuses us.
 */
export class GithubAdapter implements SourceAdapter {
  readonly id = 'github';
  readonly domains = ['https://github.com/search', 'https://github.com', 'https://api.github.com'];
  private token?: string;
  private apiBaseUrl: string;
  private webBaseUrl: string;
  private perPage: number;

  constructor(options: GithubAdapterOptions = {}) {
    this.token = options.token;
    this.apiBaseUrl = options.apiBaseUrl ?? 'https://api.github.com';
    this.webBaseUrl = options.webBaseUrl ?? 'https://github.com';
    this.perPage = options.perPage ?? 50;
  }

  supports(domain: string): boolean {
    return domainMatches(this.domains, domain);
  }

  async *crawl(request: CrawlRequest, context: CrawlContext): AsyncIterable<RawResult> {
    let results: RawResult[];
    try {
      results = await this.searchApi(request, context.signal);
    } catch (error) {
      if (!(error instanceof SourceUnavailableError) || !this.shouldFallBack(error) || context.signal.aborted) {
        throw error;
      }
      console.warn(`[GITHUB] API search refused (${error.message}), falling back to HTML`);
      context.reportDegraded(this.token ? 'github_api_refused' : 'github_api_rate_limited');
      results = await this.searchHtml(request, context.signal);
    }

    yield* results;
  }

  // Rejected credentials and anonymous rate limits; other failures are retried as usual
  private shouldFallBack(error: SourceUnavailableError): boolean {
    return error.reason === 'auth' || error.status === 429;
  }

  buildQualifiedQuery(request: CrawlRequest): string {
    const terms = request.keywords.map(keyword => (/\s/.test(keyword) ? `"${keyword}"` : keyword));
    if (request.dateRange) {
      terms.push(`created:${isoDay(request.dateRange.start)}..${isoDay(request.dateRange.end)}`);
    }
    return terms.join(' ');
  }

  private async searchApi(request: CrawlRequest, signal: AbortSignal): Promise<RawResult[]> {
    const params = new URLSearchParams({
      q: this.buildQualifiedQuery(request),
      sort: 'created',
      order: 'desc',
      per_page: String(this.perPage)
    });
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28'
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    const payload = await fetchJson(this.id, `${this.apiBaseUrl}/search/issues?${params.toString()}`, { signal, headers });
    return this.parseSearchResponse(payload);
  }

  parseSearchResponse(payload: unknown): RawResult[] {
    if (!isRecord(payload) || !Array.isArray(payload.items)) {
      throw new SourceUnavailableError(this.id, 'parse', 'Unexpected GitHub search response shape');
    }

    const items: unknown[] = payload.items;
    const results: RawResult[] = [];
    for (const item of items) {
      if (!isRecord(item)) continue;
      const title = collapseWhitespace(stringField(item, 'title'));
      const url = absoluteUrl(stringField(item, 'html_url'), this.webBaseUrl);
      if (!title || !url) continue;

      const sourceMetadata: Record<string, string> = {};
      const state = stringField(item, 'state');
      const comments = numberField(item, 'comments');
      const repository = repositoryOf(url);
      if (state) sourceMetadata.state = state;
      if (comments !== undefined) sourceMetadata.comments = String(comments);
      if (repository) sourceMetadata.repository = repository;

      results.push({
        source: this.id,
        title,
        url,
        content: collapseWhitespace(stringField(item, 'body')),
        publishedAt: parseDate(stringField(item, 'created_at')),
        sourceMetadata
      });
    }
    return results;
  }

  private async searchHtml(request: CrawlRequest, signal: AbortSignal): Promise<RawResult[]> {
    const params = new URLSearchParams({ q: this.buildQualifiedQuery(request), type: 'issues', s: 'created', o: 'desc' });
    const html = await fetchText(this.id, `${this.webBaseUrl}/search?${params.toString()}`, { signal });
    return this.parseSearchPage(html);
  }

  parseSearchPage(html: string): RawResult[] {
    const { document } = parseHTML(html);
    const results: RawResult[] = [];
    const seen = new Set<string>();

    for (const row of Array.from(document.querySelectorAll('[data-testid="results-list"] > div'))) {
      const link = row.querySelector('h3 a[href]');
      const title = collapseWhitespace(link?.textContent);
      const url = absoluteUrl(link?.getAttribute('href'), this.webBaseUrl);
      if (!title || !url || seen.has(url)) continue;
      seen.add(url);

      const repository = repositoryOf(url);
      results.push({
        source: this.id,
        title,
        url,
        content: collapseWhitespace(row.querySelector('.search-match')?.textContent),
        publishedAt: parseDate(row.querySelector('relative-time[datetime], time[datetime]')?.getAttribute('datetime')),
        sourceMetadata: repository ? { repository } : {}
      });
    }
    return results;
  }
}

function repositoryOf(url: string): string | undefined {
  const match = new URL(url).pathname.match(/^\/([^/]+\/[^/]+)\/(issues|pull)\//);
  return match ? match[1] : undefined;
}
