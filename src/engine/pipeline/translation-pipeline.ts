/**
 * Translation Pipeline - Orchestrates the Inglish translation process
 *
 * Stage 1: Extract - find technical terms, guard them with [brackets]
 * Stage 2: Translate - baseline rules or LLM, terms kept intact
 * Stage 3: Convert - unguard, then derive Roman and Devanagari forms
 */

import type { ILLMProvider } from '../interfaces/llm-provider.js';
import type { TargetLanguage, TranslatorType } from '../types/common.js';
import type { PipelineResult, QualityMetrics, Translator } from '../types/pipeline.js';
import { TermExtractor, unguardTerms } from '../extraction/term-extractor.js';
import { LLMTranslator } from '../translators/llm-translator.js';
import { RuleTranslator } from '../translators/rule-translator.js';
import { ScriptConverter } from '../script/script-converter.js';
import { computeQualityMetrics } from '../quality/quality.js';
import { containsDevanagari } from '../utils/text.js';

export interface PipelineConfig {
  extractor: TermExtractor;
  translator: Translator;
  converter: ScriptConverter;
  targetLanguage: TargetLanguage;
}

export interface PipelineOptions {
  domain: string;
  targetLanguage?: TargetLanguage;
  translatorType?: TranslatorType;
  /** Used by the LLM translator; without one it falls back to the baseline */
  provider?: ILLMProvider | null;
  temperature?: number;
  glossaryDir?: string;
  patternsDir?: string;
}

export class TranslationPipeline {
  readonly extractor: TermExtractor;
  readonly translator: Translator;
  readonly converter: ScriptConverter;
  readonly targetLanguage: TargetLanguage;

  constructor(config: PipelineConfig) {
    this.extractor = config.extractor;
    this.translator = config.translator;
    this.converter = config.converter;
    this.targetLanguage = config.targetLanguage;
  }

  /**
   * Build the components for one (domain, language, translator) configuration.
   * Throws GlossaryNotFoundError for an unknown domain.
   */
  static create(options: PipelineOptions): TranslationPipeline {
    const targetLanguage = options.targetLanguage ?? 'hi';

    const extractor = TermExtractor.forDomain(options.domain, {
      glossaryDir: options.glossaryDir,
      patternsDir: options.patternsDir,
    });

    const baseline = new RuleTranslator(targetLanguage);
    const translator: Translator =
      options.translatorType === 'llm'
        ? new LLMTranslator({
            targetLanguage,
            provider: options.provider,
            fallback: baseline,
            temperature: options.temperature,
          })
        : baseline;

    console.log(`[Pipeline] Created for domain '${options.domain}' (${targetLanguage}, ${translator.type})`);

    return new TranslationPipeline({
      extractor,
      translator,
      converter: new ScriptConverter(),
      targetLanguage,
    });
  }

  get domain(): string {
    return this.extractor.domain;
  }

  async translate(text: string): Promise<PipelineResult> {
    const startTime = Date.now();

    if (!text.trim()) {
      return {
        originalEnglish: text,
        intermediateBracketed: text,
        hinglishRoman: '',
        hinglishDevanagari: '',
        metadata: {
          domain: this.domain,
          targetLanguage: this.targetLanguage,
          translatorType: this.translator.type,
          producedBy: 'passthrough',
          termsExtracted: 0,
          technicalTerms: [],
          constraintsPreserved: true,
          durationMs: Date.now() - startTime,
        },
      };
    }

    // ============ STAGE 1: EXTRACT ============
    const terms = this.extractor.extractTerms(text);
    const guarded = this.extractor.guardTerms(text, terms);
    const phoneticMap = this.extractor.buildPhoneticMap(terms);

    // ============ STAGE 2: TRANSLATE ============
    const output = await this.translator.translateGuarded(guarded);

    if (!output.constraintsPreserved) {
      console.warn(`[Pipeline] Technical terms were altered during translation (${output.producedBy}): "${guarded}"`);
    }

    // ============ STAGE 3: CONVERT ============
    const roman = unguardTerms(output.roman);
    const bilingual =
      output.devanagari !== undefined && containsDevanagari(output.devanagari)
        ? {
            originalEnglish: text,
            hinglishRoman: roman,
            // Terms the model left in Latin script get their glossary spelling
            hinglishDevanagari: this.converter.convert(unguardTerms(output.devanagari), 'devanagari', phoneticMap),
          }
        : this.converter.generateBilingualOutput(text, roman, phoneticMap);

    const durationMs = Date.now() - startTime;
    console.log(`[Pipeline] Translated ${text.length} chars, ${terms.length} terms, ${durationMs}ms (${output.producedBy})`);

    return {
      ...bilingual,
      intermediateBracketed: guarded,
      metadata: {
        domain: this.domain,
        targetLanguage: this.targetLanguage,
        translatorType: this.translator.type,
        producedBy: output.producedBy,
        termsExtracted: terms.length,
        technicalTerms: terms.map(t => t.text),
        constraintsPreserved: output.constraintsPreserved,
        durationMs,
      },
    };
  }

  /**
   * Translate texts one after another; results keep input order
   */
  async translateBatch(texts: readonly string[]): Promise<PipelineResult[]> {
    const results: PipelineResult[] = [];
    for (const text of texts) {
      results.push(await this.translate(text));
    }
    return results;
  }

  evaluateQuality(original: string, translated: string, reference?: string): QualityMetrics {
    const terms = this.extractor.extractTerms(original);
    return computeQualityMetrics(terms, original, translated, reference);
  }
}
