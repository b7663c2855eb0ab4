/**
 * Glossary types for technical term guarding
 *
 * Files may write an entry as a bare string or as { term, devanagari };
 * the loader turns both into GlossaryEntry.
 */

export interface GlossaryEntry {
  term: string;
  phonetic?: string;
}

export interface Glossary {
  domain: string;
  terms: readonly GlossaryEntry[];
  compoundTerms: readonly GlossaryEntry[];
}

export interface TermPattern {
  source: string;
  description?: string;
}
