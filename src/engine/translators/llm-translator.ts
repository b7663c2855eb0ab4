/**
 * LLM Translator - chat-model translation with a fallback chain
 *
 * provider -> fallback translator (baseline) -> input unchanged
 *
 * A missing provider, a failed request and a malformed response all take the
 * same path: warn and hand the text to the next link.
 */

import type { ILLMProvider, Message } from '../interfaces/llm-provider.js';
import type { TargetLanguage } from '../types/common.js';
import type { StageResult, Translator, TranslatorOutput } from '../types/pipeline.js';
import { createTranslatorSystemPrompt } from '../prompts/system/translator.js';
import { isRecord } from '../utils/guards.js';
import { withTermsProtected } from '../utils/sentinel.js';
import { toMarathiDevanagari, toMarathiRoman } from './marathi.js';
import { validateConstraints } from './rule-translator.js';

export interface LLMTranslatorOptions {
  targetLanguage?: TargetLanguage;
  provider?: ILLMProvider | null;
  fallback?: Translator | null;
  temperature?: number;
}

interface LLMTranslation {
  roman: string;
  devanagari: string;
}

export class LLMTranslator implements Translator {
  readonly type = 'llm' as const;
  readonly targetLanguage: TargetLanguage;

  private readonly provider: ILLMProvider | null;
  private readonly fallback: Translator | null;
  private readonly temperature: number;

  constructor(options: LLMTranslatorOptions = {}) {
    this.targetLanguage = options.targetLanguage ?? 'hi';
    this.provider = options.provider ?? null;
    this.fallback = options.fallback ?? null;
    this.temperature = options.temperature ?? 0.3;
  }

  async translateGuarded(guardedText: string): Promise<TranslatorOutput> {
    const result = await this.requestTranslation(guardedText);

    if (!result.success) {
      const next = this.fallback ? this.fallback.type : 'passthrough';
      console.warn(`[LLMTranslator] ${result.error}. Falling back to ${next}`);
      return this.translateWithFallback(guardedText);
    }

    let { roman, devanagari } = result.data;
    if (this.targetLanguage === 'mr') {
      roman = withTermsProtected(roman, toMarathiRoman);
      devanagari = withTermsProtected(devanagari, toMarathiDevanagari);
    }

    console.log(`[LLMTranslator] Translated ${guardedText.length} chars in ${result.duration}ms, ${result.tokensUsed} tokens`);

    return {
      roman,
      devanagari,
      constraintsPreserved: validateConstraints(guardedText, roman),
      producedBy: 'llm',
      tokensUsed: result.tokensUsed,
    };
  }

  private async requestTranslation(guardedText: string): Promise<StageResult<LLMTranslation>> {
    const startTime = Date.now();

    if (!this.provider) {
      return { success: false, error: 'No LLM provider configured', tokensUsed: 0, duration: 0 };
    }

    const messages: Message[] = [
      { role: 'system', content: createTranslatorSystemPrompt(this.targetLanguage) },
      { role: 'user', content: guardedText },
    ];

    try {
      const { data, tokensUsed } = await this.provider.completeJSON(messages, {
        temperature: this.temperature,
      });

      if (!isLLMTranslation(data)) {
        return {
          success: false,
          error: 'Malformed LLM response: expected non-empty "roman" and "devanagari" strings',
          tokensUsed: tokensUsed.total,
          duration: Date.now() - startTime,
        };
      }

      return { success: true, data, tokensUsed: tokensUsed.total, duration: Date.now() - startTime };
    } catch (error) {
      return {
        success: false,
        error: `LLM request failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        tokensUsed: 0,
        duration: Date.now() - startTime,
      };
    }
  }

  private async translateWithFallback(guardedText: string): Promise<TranslatorOutput> {
    if (this.fallback) {
      return this.fallback.translateGuarded(guardedText);
    }
    return { roman: guardedText, constraintsPreserved: true, producedBy: 'passthrough' };
  }
}

function isLLMTranslation(value: unknown): value is LLMTranslation {
  return (
    isRecord(value) &&
    typeof value.roman === 'string' &&
    typeof value.devanagari === 'string' &&
    value.roman.trim().length > 0
  );
}
