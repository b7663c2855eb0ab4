/**
 * Common types used across the Inglish engine
 */

export type TargetLanguage =
  | 'hi'  // Hindi
  | 'mr'; // Marathi

export type ScriptFormat = 'roman' | 'devanagari';

export type TranslatorType = 'baseline' | 'llm';

/**
 * Half-open character range into the original input text.
 * Invariant: 0 <= start < end <= input.length
 */
export interface Span {
  text: string;
  start: number;
  end: number;
}

export interface ExtractedTerm {
  text: string;
  devanagari: string; // '' when the glossary has no phonetic form
  start: number;
  end: number;
}

/** lowercase term -> phonetic Devanagari */
export type TermPhoneticMap = Record<string, string>;

export function isTargetLanguage(value: unknown): value is TargetLanguage {
  return value === 'hi' || value === 'mr';
}

export function isTranslatorType(value: unknown): value is TranslatorType {
  return value === 'baseline' || value === 'llm';
}
