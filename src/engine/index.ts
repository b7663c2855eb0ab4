/**
 * Inglish Engine - technical English to code-mixed Hindi/Marathi
 *
 * 3-stage pipeline:
 * 1. Extract: find glossary terms, guard them with [brackets]
 * 2. Translate: rule-based baseline or LLM, terms untouched
 * 3. Convert: Roman <-> Devanagari with glossary phonetics
 *
 * @module inglish-engine
 */

// Types
export type {
  TargetLanguage,
  ScriptFormat,
  TranslatorType,
  Span,
  ExtractedTerm,
  TermPhoneticMap,
} from './types/common.js';
export { isTargetLanguage, isTranslatorType } from './types/common.js';
export type { GlossaryEntry, Glossary, TermPattern } from './types/glossary.js';
export type {
  TranslatorOutput,
  Translator,
  BilingualOutput,
  TranslationMetadata,
  PipelineResult,
  QualityMetrics,
  StageResult,
} from './types/pipeline.js';

// Errors
export {
  EngineError,
  GlossaryNotFoundError,
  TransliterationUnavailableError,
  LexiconError,
  type EngineErrorCode,
} from './errors.js';

// Interfaces
export type {
  ILLMProvider,
  LLMProviderConfig,
  Message,
  CompletionOptions,
  JSONCompletionResult,
  TokenUsage,
} from './interfaces/llm-provider.js';

// Providers
export { OpenAIProvider, DEFAULT_OPENAI_MODEL } from './providers/openai.js';

// Glossary
export { loadGlossary, parseGlossary, loadPatterns, listDomains } from './glossary/glossary-loader.js';

// Extraction
export { resolveSpans, spansOverlap } from './extraction/span-resolver.js';
export { TermTrie } from './extraction/term-trie.js';
export {
  TermExtractor,
  unguardTerms,
  getGuardedTerms,
  type TermExtractorOptions,
} from './extraction/term-extractor.js';

// Translators
export { RuleTranslator, validateConstraints } from './translators/rule-translator.js';
export { LLMTranslator, type LLMTranslatorOptions } from './translators/llm-translator.js';
export { toMarathiRoman, toMarathiDevanagari } from './translators/marathi.js';
export { PRE_RULES, POST_RULES, applyRules, type GrammarRule } from './translators/grammar-rules.js';

// Script conversion
export { ScriptConverter, type ScriptConverterOptions } from './script/script-converter.js';
export { loadSanscript, type TransliterateFn, type TransliteratorLoader } from './script/sanscript.js';

// Lexicons
export {
  loadTranslationLexicon,
  loadDevanagariTable,
  type TranslationLexicon,
  type DevanagariTable,
} from './lexicon/lexicon.js';

// Pipeline
export {
  TranslationPipeline,
  type PipelineConfig,
  type PipelineOptions,
} from './pipeline/translation-pipeline.js';
export { computeQualityMetrics } from './quality/quality.js';

// Prompts
export { createTranslatorSystemPrompt } from './prompts/system/translator.js';
