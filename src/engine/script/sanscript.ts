/**
 * Lazy access to @indic-transliteration/sanscript
 *
 * Only the Devanagari -> Roman direction needs the engine, so it is loaded on
 * first use rather than at import time.
 */

import { createRequire } from 'module';
import { TransliterationUnavailableError } from '../errors.js';

export const SANSCRIPT_PACKAGE = '@indic-transliteration/sanscript';

/** Transliterate text between two Sanscript schemes */
export type TransliterateFn = (text: string, from: string, to: string) => string;

export type TransliteratorLoader = () => TransliterateFn;

const require = createRequire(import.meta.url);

let cached: TransliterateFn | null = null;

/**
 * Load the Sanscript engine once and return its transliterate function
 */
export function loadSanscript(): TransliterateFn {
  if (cached) return cached;

  let loaded: unknown;
  try {
    loaded = require(SANSCRIPT_PACKAGE);
  } catch (error) {
    throw new TransliterationUnavailableError(SANSCRIPT_PACKAGE, error);
  }

  const engine = findEngine(loaded);
  if (!engine) {
    throw new TransliterationUnavailableError(SANSCRIPT_PACKAGE, new Error('module has no t() function'));
  }

  cached = (text, from, to) => engine.t(text, from, to);
  return cached;
}

interface SanscriptLike {
  t: TransliterateFn;
}

function isSanscriptLike(value: unknown): value is SanscriptLike {
  return typeof value === 'object' && value !== null && 't' in value && typeof value.t === 'function';
}

// CommonJS build exports the object itself, bundled builds nest it under default
function findEngine(loaded: unknown): SanscriptLike | null {
  if (isSanscriptLike(loaded)) return loaded;
  if (typeof loaded === 'object' && loaded !== null && 'default' in loaded) {
    const nested = loaded.default;
    if (isSanscriptLike(nested)) return nested;
  }
  return null;
}
