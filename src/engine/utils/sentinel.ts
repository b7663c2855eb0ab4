/**
 * Sentinel placeholders for protected text
 *
 * Keys look like STX <decimal index> ETX (U+0002 ... U+0003). Neither control
 * character occurs in normal input, neither is whitespace, word character or
 * punctuation, so no word-level pattern in the engine can match across or
 * inside a key.
 */

export const SENTINEL_OPEN = '\u0002';
export const SENTINEL_CLOSE = '\u0003';

/** Matches one complete sentinel key */
export const SENTINEL_PATTERN = '\\u0002\\d+\\u0003';

const SENTINEL_TOKEN = new RegExp(`^${SENTINEL_PATTERN}$`);

export function sentinelKey(index: number): string {
  return `${SENTINEL_OPEN}${index}${SENTINEL_CLOSE}`;
}

export function isSentinel(token: string): boolean {
  return SENTINEL_TOKEN.test(token);
}

/**
 * Call-scoped map from minted keys to the content they stand for.
 * Create one per translate/convert call and drop it afterwards.
 */
export class PlaceholderMap {
  private readonly values: string[] = [];

  /** Remember a value and return the key that replaces it in the text */
  stash(value: string): string {
    const key = sentinelKey(this.values.length);
    this.values.push(value);
    return key;
  }

  get size(): number {
    return this.values.length;
  }

  /** Substitute every key in text by its stored value */
  restore(text: string): string {
    let result = text;
    this.values.forEach((value, index) => {
      result = result.split(sentinelKey(index)).join(value);
    });
    return result;
  }
}

const BRACKETED_TERM = /\[[^\]]+\]/g;

/**
 * Replace every [term] with a placeholder, run fn, then put the terms back.
 * fn never sees bracketed text, so word-level rewrites cannot alter a term.
 */
export function withTermsProtected(text: string, fn: (protectedText: string) => string): string {
  const placeholders = new PlaceholderMap();
  const protectedText = text.replace(BRACKETED_TERM, term => placeholders.stash(term));
  return placeholders.restore(fn(protectedText));
}
