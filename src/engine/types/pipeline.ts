/**
 * Translation pipeline types
 */

import type { TargetLanguage, TranslatorType } from './common.js';

/**
 * Translator output. Bracketed terms are still bracketed; the pipeline
 * unguards after validating them.
 */
export interface TranslatorOutput {
  roman: string;
  /** Present when the translator produced Devanagari itself */
  devanagari?: string;
  constraintsPreserved: boolean;
  /** Which translator actually produced the output */
  producedBy: TranslatorType | 'passthrough';
  tokensUsed?: number;
}

export interface Translator {
  readonly type: TranslatorType;
  translateGuarded(guardedText: string): Promise<TranslatorOutput>;
}

export interface BilingualOutput {
  originalEnglish: string;
  hinglishRoman: string;
  hinglishDevanagari: string;
}

export interface TranslationMetadata {
  domain: string;
  targetLanguage: TargetLanguage;
  translatorType: TranslatorType;
  producedBy: TranslatorOutput['producedBy'];
  termsExtracted: number;
  technicalTerms: string[];
  constraintsPreserved: boolean;
  durationMs: number;
}

export interface PipelineResult extends BilingualOutput {
  intermediateBracketed: string;
  metadata: TranslationMetadata;
}

export interface QualityMetrics {
  terminologyPreservation: number;
  lengthRatio: number;
  wordOverlap?: number;
}

/**
 * Outcome of one external call that may fail softly
 */
export type StageResult<T> =
  | { success: true; data: T; tokensUsed: number; duration: number }
  | { success: false; error: string; tokensUsed: number; duration: number };
