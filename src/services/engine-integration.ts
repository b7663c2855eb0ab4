/**
 * Engine Integration - connects the Inglish engine to the HTTP server
 *
 * Pipelines are built once per (domain, language, translator) and reused;
 * construction loads the glossary, lexicons and regex patterns.
 */

import {
  TranslationPipeline,
  OpenAIProvider,
  listDomains,
  type ILLMProvider,
  type TargetLanguage,
  type TranslatorType,
} from '../engine/index.js';

import type { AppConfig } from '../config.js';
import { hasAIProvider } from '../config.js';

export interface PipelineSelection {
  domain?: string;
  targetLanguage?: TargetLanguage;
  translator?: TranslatorType;
}

export class EngineService {
  private readonly pipelineCache = new Map<string, TranslationPipeline>();
  private readonly config: AppConfig;
  private readonly provider: ILLMProvider | null;

  /**
   * @param provider - overrides the provider built from config; null disables the LLM
   */
  constructor(config: AppConfig, provider?: ILLMProvider | null) {
    this.config = config;
    this.provider = provider === undefined ? createProvider(config) : provider;
  }

  /**
   * Get or create the pipeline for a configuration.
   * Throws GlossaryNotFoundError for an unknown domain.
   */
  getPipeline(selection: PipelineSelection = {}): TranslationPipeline {
    const domain = selection.domain ?? this.config.translation.defaultDomain;
    const targetLanguage = selection.targetLanguage ?? this.config.translation.defaultTargetLanguage;
    const translatorType = selection.translator ?? this.config.translation.defaultTranslator;

    const key = `${domain}:${targetLanguage}:${translatorType}`;
    let pipeline = this.pipelineCache.get(key);

    if (!pipeline) {
      pipeline = TranslationPipeline.create({
        domain,
        targetLanguage,
        translatorType,
        provider: this.provider,
        temperature: this.config.translation.temperature,
        glossaryDir: this.config.data.glossaryDir,
        patternsDir: this.config.data.patternsDir,
      });
      this.pipelineCache.set(key, pipeline);
    }

    return pipeline;
  }

  listDomains(): string[] {
    return listDomains(this.config.data.glossaryDir);
  }
}

/**
 * OpenAI provider from config, or null when no API key is set
 */
export function createProvider(config: AppConfig): ILLMProvider | null {
  if (!hasAIProvider(config)) {
    return null;
  }

  return new OpenAIProvider({
    apiKey: config.openai.apiKey,
    model: config.openai.model,
    baseUrl: config.openai.baseUrl || undefined,
  });
}
