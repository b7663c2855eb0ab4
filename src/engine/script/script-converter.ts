/**
 * Script Converter - Roman <-> Devanagari for Hinglish text
 *
 * Roman -> Devanagari is a three-pass rewrite:
 *   1. stash glossary terms behind sentinel keys (longest term first)
 *   2. word-level substitution from the Roman -> Devanagari table
 *   3. restore each key to the term's phonetic spelling
 * Stashing first keeps loanwords like "for loop" from being split up by
 * pass 2. English residue the table does not know stays Latin.
 *
 * Devanagari -> Roman transliterates only the Devanagari runs through
 * Sanscript, loaded on first use.
 */

import type { ScriptFormat, TermPhoneticMap } from '../types/common.js';
import type { BilingualOutput } from '../types/pipeline.js';
import { loadDevanagariTable, longestFirst, type DevanagariTable } from '../lexicon/lexicon.js';
import { PlaceholderMap } from '../utils/sentinel.js';
import { containsDevanagari, escapeRegExp } from '../utils/text.js';
import { loadSanscript, type TransliteratorLoader } from './sanscript.js';

/** Start of text, whitespace, a sentinel or an opening bracket/quote before the match */
const LEFT_BOUNDARY = '(?<![^\\s\\u0002\\u0003("\'])';
/**
 * Whitespace, sentinel start, punctuation or end of text after the match.
 * \u0003 is left out so the digits inside a sentinel never match.
 */
const RIGHT_BOUNDARY = '(?=[\\s\\u0002.,!?;:)"\']|$)';

const DEVANAGARI_RUN = /([\u0900-\u097F]+)/;

export interface ScriptConverterOptions {
  /** Sanscript scheme used for Roman output */
  scheme?: string;
  table?: DevanagariTable;
  /** Replaces the Sanscript loader; used where the package is absent */
  loadTransliterator?: TransliteratorLoader;
}

interface CompiledEntry {
  pattern: RegExp;
  devanagari: string;
}

export class ScriptConverter {
  readonly scheme: string;

  private readonly entries: readonly CompiledEntry[];
  private readonly loadTransliterator: TransliteratorLoader;

  constructor(options: ScriptConverterOptions = {}) {
    this.scheme = options.scheme ?? 'itrans';
    this.loadTransliterator = options.loadTransliterator ?? loadSanscript;

    const table = options.table ?? loadDevanagariTable();
    this.entries = longestFirst(Object.entries(table)).map(([roman, devanagari]) => ({
      pattern: new RegExp(`${LEFT_BOUNDARY}${escapeRegExp(roman)}${RIGHT_BOUNDARY}`, 'gi'),
      devanagari,
    }));
  }

  convert(text: string, toFormat: ScriptFormat, termPhoneticMap: TermPhoneticMap = {}): string {
    if (!text) return '';
    return toFormat === 'devanagari'
      ? this.romanToDevanagari(text, termPhoneticMap)
      : this.devanagariToRoman(text);
  }

  /**
   * Derive the missing script from whichever one the translation is in
   */
  generateBilingualOutput(
    englishInput: string,
    translatedText: string,
    termPhoneticMap: TermPhoneticMap = {}
  ): BilingualOutput {
    if (containsDevanagari(translatedText)) {
      return {
        originalEnglish: englishInput,
        hinglishRoman: this.convert(translatedText, 'roman'),
        hinglishDevanagari: translatedText,
      };
    }

    return {
      originalEnglish: englishInput,
      hinglishRoman: translatedText,
      hinglishDevanagari: this.convert(translatedText, 'devanagari', termPhoneticMap),
    };
  }

  private romanToDevanagari(text: string, termPhoneticMap: TermPhoneticMap): string {
    const placeholders = new PlaceholderMap();

    // Pass 1: glossary terms
    let working = text;
    for (const [term, phonetic] of longestFirst(Object.entries(termPhoneticMap))) {
      if (!term || !phonetic) continue;
      const pattern = new RegExp(`${LEFT_BOUNDARY}${escapeRegExp(term)}${RIGHT_BOUNDARY}`, 'gi');
      working = working.replace(pattern, () => placeholders.stash(phonetic));
    }

    // Pass 2: grammar words
    for (const { pattern, devanagari } of this.entries) {
      working = working.replace(pattern, devanagari);
    }

    // Pass 3
    return placeholders.restore(working);
  }

  private devanagariToRoman(text: string): string {
    if (!containsDevanagari(text)) return text;

    const transliterate = this.loadTransliterator();
    return text
      .split(DEVANAGARI_RUN)
      .map(run => (containsDevanagari(run) ? transliterate(run, 'devanagari', this.scheme) : run))
      .join('');
  }
}
