/**
 * Term Extractor - finds technical terms and guards them with brackets
 *
 * Three candidate sources are merged and then resolved leftmost-longest:
 * 1. Compound terms: word trie walked over consecutive tokens
 * 2. Single terms: set lookup per token
 * 3. Domain regex patterns over the raw text
 */

import type { ExtractedTerm, Span, TermPhoneticMap } from '../types/common.js';
import type { Glossary, TermPattern } from '../types/glossary.js';
import { loadGlossary, loadPatterns } from '../glossary/glossary-loader.js';
import { normalizeTerm, tokenize } from '../utils/text.js';
import { resolveSpans } from './span-resolver.js';
import { TermTrie } from './term-trie.js';

const BRACKETED = /\[([^\]]+)\]/g;

export interface TermExtractorOptions {
  glossaryDir?: string;
  patternsDir?: string;
}

export class TermExtractor {
  readonly domain: string;

  private readonly singleTerms: ReadonlySet<string>;
  private readonly compoundTrie: TermTrie;
  private readonly phonetics: ReadonlyMap<string, string>;
  private readonly patterns: readonly RegExp[];

  constructor(glossary: Glossary, patterns: readonly TermPattern[] = []) {
    this.domain = glossary.domain;

    const phonetics = new Map<string, string>();
    const singles = new Set<string>();

    for (const entry of glossary.terms) {
      const key = normalizeTerm(entry.term);
      singles.add(key);
      if (entry.phonetic) phonetics.set(key, entry.phonetic);
    }

    for (const entry of glossary.compoundTerms) {
      if (entry.phonetic) phonetics.set(normalizeTerm(entry.term), entry.phonetic);
    }

    this.singleTerms = singles;
    this.phonetics = phonetics;
    this.compoundTrie = TermTrie.fromTerms(glossary.compoundTerms.map(e => e.term));
    this.patterns = compilePatterns(glossary.domain, patterns);

    console.log(
      `[TermExtractor] Domain '${this.domain}': ${singles.size} terms, ` +
      `${glossary.compoundTerms.length} compound terms, ${this.patterns.length} patterns`
    );
  }

  /**
   * Create an extractor from the domain's glossary and pattern files
   */
  static forDomain(domain: string, options: TermExtractorOptions = {}): TermExtractor {
    const glossary = loadGlossary(domain, options.glossaryDir);
    const patterns = loadPatterns(domain, options.patternsDir);
    return new TermExtractor(glossary, patterns);
  }

  /**
   * Extract all technical terms, sorted by position, overlaps resolved
   */
  extractTerms(text: string): ExtractedTerm[] {
    if (!text) return [];

    const candidates: Span[] = [
      ...this.extractCompoundTerms(text),
      ...this.extractSingleTerms(text),
      ...this.extractPatternTerms(text),
    ];

    return resolveSpans(candidates).map(span => ({
      text: span.text,
      devanagari: this.phonetics.get(normalizeTerm(span.text)) ?? '',
      start: span.start,
      end: span.end,
    }));
  }

  /**
   * Wrap each term in square brackets. Terms are extracted when omitted.
   */
  guardTerms(text: string, terms?: readonly ExtractedTerm[]): string {
    const spans = terms ?? this.extractTerms(text);
    if (spans.length === 0) return text;

    // Right to left so earlier offsets stay valid
    let result = text;
    for (const term of [...spans].sort((a, b) => b.start - a.start)) {
      result = `${result.slice(0, term.start)}[${text.slice(term.start, term.end)}]${result.slice(term.end)}`;
    }
    return result;
  }

  /**
   * Remove one layer of brackets, keeping the term text
   */
  unguardTerms(text: string): string {
    return unguardTerms(text);
  }

  /**
   * Terms currently inside brackets, in order of appearance
   */
  getGuardedTerms(text: string): string[] {
    return getGuardedTerms(text);
  }

  /**
   * True if unguarding the guarded text reproduces the original
   */
  validateGuarding(original: string, guarded: string): boolean {
    return original.trim() === this.unguardTerms(guarded).trim();
  }

  /**
   * Phonetic forms of the given terms, keyed by lowercase term text.
   * Terms without a phonetic form are left out.
   */
  buildPhoneticMap(terms: readonly ExtractedTerm[]): TermPhoneticMap {
    const map: TermPhoneticMap = {};
    for (const term of terms) {
      if (term.devanagari) {
        map[normalizeTerm(term.text)] = term.devanagari;
      }
    }
    return map;
  }

  /**
   * Phonetic form of a single term, '' when unknown
   */
  getPhonetic(term: string): string {
    return this.phonetics.get(normalizeTerm(term)) ?? '';
  }

  // ============ Candidate sources ============

  private extractCompoundTerms(text: string): Span[] {
    if (this.compoundTrie.isEmpty) return [];

    const tokens = tokenize(text);
    const words = tokens.map(t => t.core.toLowerCase());
    const matches: Span[] = [];

    for (let i = 0; i < tokens.length; i++) {
      if (!words[i]) continue;

      for (const length of this.compoundTrie.matchLengths(words, i)) {
        const first = tokens[i];
        const last = tokens[i + length - 1];
        const start = first.coreStart;
        const end = last.coreStart + last.core.length;
        matches.push({ text: text.slice(start, end), start, end });
      }
    }

    return matches;
  }

  private extractSingleTerms(text: string): Span[] {
    const matches: Span[] = [];

    for (const token of tokenize(text)) {
      if (token.core && this.singleTerms.has(token.core.toLowerCase())) {
        const start = token.coreStart;
        matches.push({ text: token.core, start, end: start + token.core.length });
      }
    }

    return matches;
  }

  private extractPatternTerms(text: string): Span[] {
    const matches: Span[] = [];

    for (const pattern of this.patterns) {
      for (const match of text.matchAll(pattern)) {
        const start = match.index ?? 0;
        if (match[0].length === 0) continue;
        matches.push({ text: match[0], start, end: start + match[0].length });
      }
    }

    return matches;
  }
}

export function unguardTerms(text: string): string {
  return text.replace(BRACKETED, '$1');
}

export function getGuardedTerms(text: string): string[] {
  return Array.from(text.matchAll(BRACKETED), m => m[1]);
}

/**
 * Compile domain patterns, skipping any that are not valid regular expressions
 */
function compilePatterns(domain: string, patterns: readonly TermPattern[]): RegExp[] {
  const compiled: RegExp[] = [];
  for (const pattern of patterns) {
    try {
      compiled.push(new RegExp(pattern.source, 'g'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'Unknown error';
      console.warn(`[TermExtractor] Skipping invalid pattern for '${domain}': ${pattern.source} (${reason})`);
    }
  }
  return compiled;
}
