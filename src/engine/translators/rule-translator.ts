/**
 * Rule Translator - baseline English -> Hinglish translation
 *
 * Works on guarded text one sentence at a time:
 *   pre-rules -> bracket protection -> word substitution -> post-rules
 *   -> SOV verb reorder -> (Marathi) -> placeholder restoration
 *
 * Deterministic and offline. Unknown words pass through as English.
 */

import type { TargetLanguage } from '../types/common.js';
import type { Translator, TranslatorOutput } from '../types/pipeline.js';
import { getGuardedTerms } from '../extraction/term-extractor.js';
import { loadTranslationLexicon, type TranslationLexicon } from '../lexicon/lexicon.js';
import { isSentinel, withTermsProtected } from '../utils/sentinel.js';
import { joinSentences, splitIntoSentences } from '../utils/sentences.js';
import { collapseWhitespace, escapeRegExp, splitPunctuation } from '../utils/text.js';
import { applyRules, POST_RULES, PRE_RULES } from './grammar-rules.js';
import { toMarathiRoman } from './marathi.js';

interface VerbPhrase {
  phrase: string;
  pattern: RegExp;
}

export class RuleTranslator implements Translator {
  readonly type = 'baseline' as const;
  readonly targetLanguage: TargetLanguage;

  private readonly wordMap: ReadonlyMap<string, string>;
  private readonly verbPhrases: readonly VerbPhrase[];

  constructor(targetLanguage: TargetLanguage = 'hi', lexicon: TranslationLexicon = loadTranslationLexicon()) {
    this.targetLanguage = targetLanguage;
    this.wordMap = new Map(Object.entries(lexicon.wordMap));

    // Longest first, so "return karta hai" wins over "karta hai"
    this.verbPhrases = [...lexicon.verbPhrases]
      .sort((a, b) => b.length - a.length)
      .map(phrase => ({
        phrase,
        pattern: new RegExp(`(^|\\s)${escapeRegExp(phrase)}(?=[\\s.,!?;:]|$)`, 'i'),
      }));
  }

  /**
   * Translate guarded English to Roman Hinglish (or Marathi).
   * Bracketed terms come back bracketed and untouched.
   */
  translate(guardedText: string): string {
    if (!guardedText.trim()) return '';

    const sentences = splitIntoSentences(guardedText).map(sentence => this.translateSentence(sentence));
    return joinSentences(sentences);
  }

  async translateGuarded(guardedText: string): Promise<TranslatorOutput> {
    const roman = this.translate(guardedText);
    return {
      roman,
      constraintsPreserved: this.validateConstraints(guardedText, roman),
      producedBy: 'baseline',
    };
  }

  /**
   * True iff both texts carry the same bracketed terms, in any order
   */
  validateConstraints(original: string, translated: string): boolean {
    return validateConstraints(original, translated);
  }

  private translateSentence(sentence: string): string {
    const restructured = applyRules(sentence.trim(), PRE_RULES);

    const translated = withTermsProtected(restructured, protectedText => {
      const substituted = this.substituteWords(protectedText);
      const reordered = this.reorderVerbPhrase(applyRules(substituted, POST_RULES));
      return this.targetLanguage === 'mr' ? toMarathiRoman(reordered) : reordered;
    });

    return collapseWhitespace(translated);
  }

  private substituteWords(text: string): string {
    const output: string[] = [];
    // Opening punctuation of a dropped word, waiting for the next emitted token
    let pending = '';

    const emit = (token: string): void => {
      output.push(`${pending}${token}`);
      pending = '';
    };

    for (const token of text.split(/\s+/)) {
      if (!token) continue;

      const { leading, core, trailing } = splitPunctuation(token);
      if (!core || isSentinel(core)) {
        emit(token);
        continue;
      }

      const mapped = this.wordMap.get(core.toLowerCase());
      if (mapped === undefined) {
        emit(token);
      } else if (mapped === '') {
        const { open, close } = stripEnclosingPairs(leading, trailing);
        pending += open;
        // Dropped word: keep its sentence punctuation on the previous word
        if (close && output.length > 0) {
          output[output.length - 1] += close;
        }
      } else {
        emit(`${leading}${mapped}${trailing}`);
      }
    }

    if (pending && output.length > 0) {
      output[output.length - 1] += pending;
    }

    return output.join(' ');
  }

  /**
   * Move the sentence's verb phrase to the end, before its final punctuation.
   * The first phrase found in priority order is the only one considered, and
   * it moves only when text stands on both sides of it.
   */
  private reorderVerbPhrase(sentence: string): string {
    for (const { phrase, pattern } of this.verbPhrases) {
      const match = pattern.exec(sentence);
      if (!match) continue;

      const phraseStart = match.index + match[1].length;
      const phraseEnd = phraseStart + phrase.length;
      const before = sentence.slice(0, phraseStart).trim();
      const { body, punctuation } = splitFinalPunctuation(sentence.slice(phraseEnd));
      const after = body.replace(/^[,;:]\s*/, '').trim();

      if (!before || !after) return sentence;

      return `${before} ${after} ${sentence.slice(phraseStart, phraseEnd)}${punctuation}`;
    }
    return sentence;
  }
}

/**
 * True iff both texts carry the same multiset of bracketed terms
 */
export function validateConstraints(original: string, translated: string): boolean {
  const expected = getGuardedTerms(original).sort();
  const actual = getGuardedTerms(translated).sort();
  return expected.length === actual.length && expected.every((term, i) => term === actual[i]);
}

const CLOSING: Readonly<Record<string, string>> = { '(': ')', '"': '"', "'": "'" };

/**
 * Drop brackets and quotes that only wrapped the dropped word itself,
 * e.g. `"the"` or `(the).`
 */
function stripEnclosingPairs(leading: string, trailing: string): { open: string; close: string } {
  let open = leading;
  let close = trailing;
  while (open && close && CLOSING[open[open.length - 1]] === close[0]) {
    open = open.slice(0, -1);
    close = close.slice(1);
  }
  return { open, close };
}

function splitFinalPunctuation(text: string): { body: string; punctuation: string } {
  const trimmed = text.trimEnd();
  const match = /[.!?]+$/.exec(trimmed);
  if (!match) return { body: trimmed, punctuation: '' };
  return { body: trimmed.slice(0, match.index), punctuation: match[0] };
}
