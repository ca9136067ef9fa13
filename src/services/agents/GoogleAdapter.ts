import { parseHTML } from 'linkedom';
import { RawResult } from '../../types/models';
import { CrawlContext, CrawlRequest, SourceAdapter, domainMatches, searchText } from './SourceAdapter';
import { absoluteUrl, collapseWhitespace, fetchText } from './http';

const BASE_URL = 'https://www.google.com/search';
const RESULTS_PER_PAGE = 20;
const CONTAINER_SELECTORS = ['div.g', 'div.MjjYud', 'div.Gx5Zad', 'div[data-hveid]'];
const SNIPPET_SELECTORS = ['.VwiC3b', '.IsZvec', '.aCOpRe', '.kb0PBd', '.s'];

export interface GoogleAdapterOptions {
  maxPages?: number;
  baseUrl?: string;
}

/**
 * Google web search, read from the plain HTML results page
 */
export class GoogleAdapter implements SourceAdapter {
  readonly id = 'google';
  readonly domains = ['https://www.google.com/search', 'https://google.com/search'];
  private maxPages: number;
  private baseUrl: string;

  constructor(options: GoogleAdapterOptions = {}) {
    this.maxPages = options.maxPages ?? 3;
    this.baseUrl = options.baseUrl ?? BASE_URL;
  }

  supports(domain: string): boolean {
    return domainMatches(this.domains, domain);
  }

  async *crawl(request: CrawlRequest, context: CrawlContext): AsyncIterable<RawResult> {
    for (let page = 0; page < this.maxPages; page++) {
      const url = this.buildSearchUrl(request, page * RESULTS_PER_PAGE);
      const html = await fetchText(this.id, url, { signal: context.signal });
      const results = this.parseResultsPage(html);

      console.log(`[GOOGLE] Page ${page + 1}: ${results.length} results`);
      if (results.length === 0) return;

      yield* results;
    }
  }

  buildSearchUrl(request: CrawlRequest, start: number): string {
    const params = new URLSearchParams({ q: searchText(request), num: String(RESULTS_PER_PAGE) });
    if (request.dateRange) {
      params.set('tbs', `cdr:1,cd_min:${usDate(request.dateRange.start)},cd_max:${usDate(request.dateRange.end)}`);
    }
    if (start > 0) {
      params.set('start', String(start));
    }
    return `${this.baseUrl}?${params.toString()}`;
  }

  parseResultsPage(html: string): RawResult[] {
    const { document } = parseHTML(html);

    // Markup varies between layouts; use the first container selector that matches
    const containers = CONTAINER_SELECTORS
      .map(selector => Array.from(document.querySelectorAll(selector)))
      .find(list => list.length > 0) ?? [];

    const results: RawResult[] = [];
    const seen = new Set<string>();
    for (const container of containers) {
      const title = collapseWhitespace(container.querySelector('h3')?.textContent);
      const link = container.querySelector('a[href]');
      const url = unwrapRedirect(link?.getAttribute('href'));
      if (!title || !url || seen.has(url)) continue;
      seen.add(url);

      let content = '';
      for (const selector of SNIPPET_SELECTORS) {
        content = collapseWhitespace(container.querySelector(selector)?.textContent);
        if (content) break;
      }

      results.push({
        source: this.id,
        title,
        url,
        content,
        sourceMetadata: { host: new URL(url).hostname }
      });
    }
    return results;
  }
}

// Google's cdr filter takes MM/DD/YYYY
function usDate(date: Date): string {
  const mm = String(date.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(date.getUTCDate()).padStart(2, '0');
  return `${mm}/${dd}/${date.getUTCFullYear()}`;
}

function unwrapRedirect(href: string | null | undefined): string | undefined {
  if (href && href.startsWith('/url?')) {
    const target = new URLSearchParams(href.slice('/url?'.length)).get('q');
    return absoluteUrl(target, BASE_URL);
  }
  const url = absoluteUrl(href, BASE_URL);
  // Links back into Google itself are navigation, not results
  if (url && /^https?:\/\/(www\.)?google\.[a-z.]+\//.test(url)) return undefined;
  return url;
}
