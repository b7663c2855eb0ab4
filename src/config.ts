/**
 * Configuration management for the Inglish translator
 */

import type { TargetLanguage, TranslatorType } from './engine/types/common.js';
import { isTargetLanguage, isTranslatorType } from './engine/types/common.js';
import { DEFAULT_GLOSSARY_DIR, DEFAULT_PATTERNS_DIR } from './engine/utils/paths.js';
import { DEFAULT_OPENAI_MODEL } from './engine/providers/openai.js';

export interface AppConfig {
  // Server
  port: number;

  // AI Provider
  openai: {
    apiKey: string;
    model: string;
    /** OpenAI-compatible endpoint; empty for the official API */
    baseUrl: string;
  };

  // Translation settings
  translation: {
    defaultDomain: string;
    defaultTargetLanguage: TargetLanguage;
    defaultTranslator: TranslatorType;
    temperature: number;
  };

  // Data files
  data: {
    glossaryDir: string;
    patternsDir: string;
  };

  // Raw values that failed to parse, reported by validateConfig
  invalid: string[];
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const invalid: string[] = [];

  const targetLanguage = env.DEFAULT_TARGET_LANGUAGE ?? 'hi';
  if (!isTargetLanguage(targetLanguage)) {
    invalid.push(`DEFAULT_TARGET_LANGUAGE must be "hi" or "mr", got "${targetLanguage}"`);
  }

  const translator = env.TRANSLATOR_TYPE ?? 'baseline';
  if (!isTranslatorType(translator)) {
    invalid.push(`TRANSLATOR_TYPE must be "baseline" or "llm", got "${translator}"`);
  }

  return {
    port: parseInt(env.PORT ?? '3000', 10),

    openai: {
      apiKey: env.OPENAI_API_KEY ?? '',
      model: env.OPENAI_MODEL ?? DEFAULT_OPENAI_MODEL,
      baseUrl: env.OPENAI_BASE_URL ?? '',
    },

    translation: {
      defaultDomain: env.DEFAULT_DOMAIN ?? 'programming',
      defaultTargetLanguage: isTargetLanguage(targetLanguage) ? targetLanguage : 'hi',
      defaultTranslator: isTranslatorType(translator) ? translator : 'baseline',
      temperature: parseFloat(env.TRANSLATION_TEMPERATURE ?? '0.3'),
    },

    data: {
      glossaryDir: env.GLOSSARY_DIR ?? DEFAULT_GLOSSARY_DIR,
      patternsDir: env.PATTERNS_DIR ?? DEFAULT_PATTERNS_DIR,
    },

    invalid,
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: AppConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [...config.invalid];

  if (!Number.isInteger(config.port) || config.port <= 0) {
    errors.push('PORT must be a positive integer');
  }

  if (config.translation.defaultTranslator === 'llm' && !hasAIProvider(config)) {
    errors.push('TRANSLATOR_TYPE=llm needs OPENAI_API_KEY; the baseline translator will be used instead');
  }

  const temperature = config.translation.temperature;
  if (Number.isNaN(temperature) || temperature < 0 || temperature > 2) {
    errors.push('TRANSLATION_TEMPERATURE must be between 0 and 2');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Check if AI provider is configured
 */
export function hasAIProvider(config: AppConfig): boolean {
  return Boolean(config.openai.apiKey);
}
