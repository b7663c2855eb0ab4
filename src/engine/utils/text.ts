/**
 * Small text helpers shared by the extractor, translator and converter
 */

/** Punctuation stripped from token edges before lookups */
const EDGE_PUNCTUATION = '.,!?;:()"\'';

const DEVANAGARI = /[\u0900-\u097F]/;

export interface Token {
  /** Token as written, punctuation included */
  raw: string;
  /** Offset of raw in the source text */
  start: number;
  leading: string;
  core: string;
  trailing: string;
  /** Offset of core in the source text */
  coreStart: number;
}

/**
 * Split a token into leading punctuation, core and trailing punctuation
 */
export function splitPunctuation(raw: string): { leading: string; core: string; trailing: string } {
  let head = 0;
  let tail = raw.length;
  while (head < tail && EDGE_PUNCTUATION.includes(raw[head])) head++;
  while (tail > head && EDGE_PUNCTUATION.includes(raw[tail - 1])) tail--;
  return {
    leading: raw.slice(0, head),
    core: raw.slice(head, tail),
    trailing: raw.slice(tail),
  };
}

/**
 * Whitespace tokenization that keeps real offsets
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  for (const match of text.matchAll(/\S+/g)) {
    const raw = match[0];
    const start = match.index ?? 0;
    const { leading, core, trailing } = splitPunctuation(raw);
    tokens.push({ raw, start, leading, core, trailing, coreStart: start + leading.length });
  }
  return tokens;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function containsDevanagari(text: string): boolean {
  return DEVANAGARI.test(text);
}

/** Lowercase and collapse internal whitespace, for term lookups */
export function normalizeTerm(term: string): string {
  return term.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(w => w.length > 0).length;
}
