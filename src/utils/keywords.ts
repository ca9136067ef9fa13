const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

/**
 * Lower-cased runs of letters and digits
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

/**
 * A keyword matches when the text contains the whole phrase, or every token of it.
 * "memory safety" matches "Safety of memory in Rust".
 */
export function matchesKeyword(text: string, keyword: string, textTokens: ReadonlySet<string> = new Set(tokenize(text))): boolean {
  const phrase = keyword.trim().toLowerCase();
  if (!phrase) return false;
  if (text.toLowerCase().includes(phrase)) return true;

  const keywordTokens = tokenize(phrase);
  return keywordTokens.length > 0 && keywordTokens.every(token => textTokens.has(token));
}

export function countKeywordHits(text: string, keywords: readonly string[]): number {
  const textTokens = new Set(tokenize(text));
  return keywords.filter(keyword => matchesKeyword(text, keyword, textTokens)).length;
}

export function matchesAnyKeyword(text: string, keywords: readonly string[]): boolean {
  const textTokens = new Set(tokenize(text));
  return keywords.some(keyword => matchesKeyword(text, keyword, textTokens));
}
