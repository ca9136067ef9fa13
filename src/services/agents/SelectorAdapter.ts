import { parseHTML } from 'linkedom';
import { RawResult } from '../../types/models';
import { SourceUnavailableError, errorMessage } from '../../models/errors';
import { SelectorSourceConfig } from '../../models/validation';
import { CrawlContext, CrawlRequest, SourceAdapter, domainMatches, searchText } from './SourceAdapter';
import { absoluteUrl, collapseWhitespace, fetchText, parseDate } from './http';

/**
 * Adapter generated from a CSS-selector description of a site's search page.
 * New sources are added at runtime by registering one of these.
 */
export class SelectorAdapter implements SourceAdapter {
  readonly id: string;
  readonly domains: readonly string[];

  constructor(private config: SelectorSourceConfig) {
    this.id = config.id.toLowerCase();
    this.domains = [...config.domains];
  }

  supports(domain: string): boolean {
    return domainMatches(this.domains, domain);
  }

  async *crawl(request: CrawlRequest, context: CrawlContext): AsyncIterable<RawResult> {
    const url = this.config.searchUrl.replace('{query}', encodeURIComponent(searchText(request)));
    const html = await fetchText(this.id, url, { signal: context.signal });
    yield* this.parse(html);
  }

  parse(html: string): RawResult[] {
    const { document } = parseHTML(html);
    const { selectors } = this.config;
    const results: RawResult[] = [];

    try {
      for (const item of Array.from(document.querySelectorAll(selectors.container))) {
        const title = collapseWhitespace(item.querySelector(selectors.title)?.textContent);
        const url = absoluteUrl(item.querySelector(selectors.link)?.getAttribute('href'), this.config.baseUrl);
        if (!title || !url) continue;

        const content = selectors.content ? collapseWhitespace(item.querySelector(selectors.content)?.textContent) : '';
        let publishedAt: Date | undefined;
        if (selectors.date) {
          const dateEl = item.querySelector(selectors.date);
          publishedAt = parseDate(dateEl?.getAttribute('datetime') || collapseWhitespace(dateEl?.textContent));
        }

        results.push({
          source: this.id,
          title,
          url,
          content,
          ...(publishedAt && { publishedAt }),
          sourceMetadata: {}
        });
      }
    } catch (error) {
      throw new SourceUnavailableError(this.id, 'parse', `Selectors of ${this.id} could not be applied: ${errorMessage(error)}`);
    }

    console.log(`[${this.id.toUpperCase()}] Parsed ${results.length} results`);
    return results;
  }
}
