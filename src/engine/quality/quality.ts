/**
 * Translation quality metrics
 *
 * Cheap surface checks, no reference model:
 * - terminologyPreservation: share of the original's technical terms that
 *   survive verbatim (case-insensitive) in the translation
 * - lengthRatio: translated words per original word
 * - wordOverlap: bag-of-words overlap with a reference translation
 */

import type { ExtractedTerm } from '../types/common.js';
import type { QualityMetrics } from '../types/pipeline.js';
import { countWords } from '../utils/text.js';

export function terminologyPreservation(terms: readonly ExtractedTerm[], translated: string): number {
  const distinct = new Set(terms.map(t => t.text.toLowerCase()));
  if (distinct.size === 0) return 1;

  const haystack = translated.toLowerCase();
  let found = 0;
  for (const term of distinct) {
    if (haystack.includes(term)) found++;
  }
  return found / distinct.size;
}

export function lengthRatio(original: string, translated: string): number {
  return countWords(translated) / Math.max(countWords(original), 1);
}

export function wordOverlap(translated: string, reference: string): number {
  const translatedWords = distinctWords(translated);
  const referenceWords = distinctWords(reference);

  let shared = 0;
  for (const word of referenceWords) {
    if (translatedWords.has(word)) shared++;
  }
  return shared / Math.max(referenceWords.size, 1);
}

export function computeQualityMetrics(
  terms: readonly ExtractedTerm[],
  original: string,
  translated: string,
  reference?: string
): QualityMetrics {
  const metrics: QualityMetrics = {
    terminologyPreservation: terminologyPreservation(terms, translated),
    lengthRatio: lengthRatio(original, translated),
  };
  if (reference !== undefined) {
    metrics.wordOverlap = wordOverlap(translated, reference);
  }
  return metrics;
}

function distinctWords(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter(w => w.length > 0));
}
