/**
 * Engine errors
 *
 * Each error carries a stable code so callers (HTTP layer, scripts) can map
 * it without string matching on messages.
 */

export type EngineErrorCode = 'GLOSSARY_NOT_FOUND' | 'TRANSLITERATION_UNAVAILABLE' | 'LEXICON_INVALID';

export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;
  readonly context: Record<string, string>;

  constructor(message: string, context: Record<string, string> = {}) {
    super(message);
    this.name = new.target.name;
    this.context = context;
  }
}

/**
 * No glossary file exists for the requested domain
 */
export class GlossaryNotFoundError extends EngineError {
  readonly code = 'GLOSSARY_NOT_FOUND';
  readonly domain: string;
  readonly path: string;

  constructor(domain: string, path: string) {
    super(`Glossary not found for domain '${domain}': ${path}`, { domain, path });
    this.domain = domain;
    this.path = path;
  }
}

/**
 * The Devanagari -> Roman engine could not be loaded
 */
export class TransliterationUnavailableError extends EngineError {
  readonly code = 'TRANSLITERATION_UNAVAILABLE';

  constructor(packageName: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(
      `Devanagari to Roman conversion requires '${packageName}'. Install it with: npm install ${packageName}${reason}`,
      { package: packageName }
    );
  }
}

/**
 * A lexicon data file is missing or has the wrong shape
 */
export class LexiconError extends EngineError {
  readonly code = 'LEXICON_INVALID';

  constructor(path: string, reason: string) {
    super(`Invalid lexicon file ${path}: ${reason}`, { path });
  }
}
