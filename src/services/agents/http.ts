import { SourceUnavailableError } from '../../models/errors';

const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; issue-radar/1.0)';

export interface FetchOptions {
  signal: AbortSignal;
  headers?: Record<string, string>;
}

/**
 * GET a URL for an adapter, mapping every failure to SourceUnavailableError
 */
export async function fetchText(source: string, url: string, options: FetchOptions): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { 'User-Agent': DEFAULT_USER_AGENT, ...options.headers },
      signal: options.signal
    });
  } catch (error) {
    if (options.signal.aborted) {
      throw new SourceUnavailableError(source, 'timeout', `Request to ${url} was aborted`);
    }
    const message = error instanceof Error ? error.message : 'Unknown fetch error';
    throw new SourceUnavailableError(source, 'network', `Fetch failed for ${url}: ${message}`);
  }

  if (!response.ok) {
    const reason = response.status === 401 || response.status === 403 ? 'auth' : 'http';
    throw new SourceUnavailableError(source, reason, `HTTP ${response.status} from ${url}`, response.status);
  }

  try {
    return await response.text();
  } catch (error) {
    if (options.signal.aborted) {
      throw new SourceUnavailableError(source, 'timeout', `Reading ${url} was aborted`);
    }
    const message = error instanceof Error ? error.message : 'Unknown read error';
    throw new SourceUnavailableError(source, 'network', `Reading body of ${url} failed: ${message}`);
  }
}

export async function fetchJson(source: string, url: string, options: FetchOptions): Promise<unknown> {
  const text = await fetchText(source, url, {
    ...options,
    headers: { Accept: 'application/json', ...options.headers }
  });
  try {
    return JSON.parse(text);
  } catch {
    throw new SourceUnavailableError(source, 'parse', `Response from ${url} is not valid JSON`);
  }
}

/**
 * Narrowing helpers for untyped JSON payloads
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

export function numberField(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function parseDate(value: string | number | undefined | null): Date | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  const date = typeof value === 'number' ? new Date(value * 1000) : new Date(value);
  return isNaN(date.getTime()) ? undefined : date;
}

/**
 * Resolve an href against a base, returning undefined for unusable links
 */
export function absoluteUrl(href: string | null | undefined, base: string): string | undefined {
  if (!href) return undefined;
  try {
    const url = new URL(href, base);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url.toString() : undefined;
  } catch {
    return undefined;
  }
}

export function collapseWhitespace(text: string | null | undefined): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}
