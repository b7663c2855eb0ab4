import { describe, it, expect } from 'vitest';
import { hasAIProvider, loadConfig, validateConfig } from './config.js';

describe('config', () => {
  it('uses defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.openai).toEqual({ apiKey: '', model: 'gpt-4o-mini', baseUrl: '' });
    expect(config.translation).toEqual({
      defaultDomain: 'programming',
      defaultTargetLanguage: 'hi',
      defaultTranslator: 'baseline',
      temperature: 0.3,
    });
    expect(hasAIProvider(config)).toBe(false);
    expect(validateConfig(config)).toEqual({ valid: true, errors: [] });
  });

  it('reads translation settings from the environment', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-secret',
      OPENAI_BASE_URL: 'http://localhost:11434/v1',
      DEFAULT_TARGET_LANGUAGE: 'mr',
      TRANSLATOR_TYPE: 'llm',
      GLOSSARY_DIR: '/srv/glossaries',
    });

    expect(hasAIProvider(config)).toBe(true);
    expect(config.openai.baseUrl).toBe('http://localhost:11434/v1');
    expect(config.translation.defaultTargetLanguage).toBe('mr');
    expect(config.translation.defaultTranslator).toBe('llm');
    expect(config.data.glossaryDir).toBe('/srv/glossaries');
    expect(validateConfig(config).valid).toBe(true);
  });

  it('reports invalid values and falls back to defaults', () => {
    const config = loadConfig({ DEFAULT_TARGET_LANGUAGE: 'fr', TRANSLATION_TEMPERATURE: 'hot' });

    expect(config.translation.defaultTargetLanguage).toBe('hi');
    expect(validateConfig(config).errors).toEqual([
      'DEFAULT_TARGET_LANGUAGE must be "hi" or "mr", got "fr"',
      'TRANSLATION_TEMPERATURE must be between 0 and 2',
    ]);
  });

  it('warns when the LLM translator has no API key', () => {
    const { errors } = validateConfig(loadConfig({ TRANSLATOR_TYPE: 'llm' }));
    expect(errors).toEqual(['TRANSLATOR_TYPE=llm needs OPENAI_API_KEY; the baseline translator will be used instead']);
  });
});
