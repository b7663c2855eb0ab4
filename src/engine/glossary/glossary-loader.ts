/**
 * Glossary Loader - reads per-domain glossary and pattern files
 *
 * Glossary files: <glossaryDir>/<domain>.json
 *   { "terms": Entry[], "compound_terms": Entry[] }
 *   Entry = "term" | { "term": "term", "devanagari": "..." }
 *
 * Pattern file: <patternsDir>/regex_patterns.json
 *   { "<domain>": ("regex" | { "regex": "regex" })[] }
 */

import fs from 'fs';
import path from 'path';
import type { Glossary, GlossaryEntry, TermPattern } from '../types/glossary.js';
import { GlossaryNotFoundError } from '../errors.js';
import { DEFAULT_GLOSSARY_DIR, DEFAULT_PATTERNS_DIR } from '../utils/paths.js';
import { isRecord } from '../utils/guards.js';

export const PATTERNS_FILE = 'regex_patterns.json';

const DOMAIN_NAME = /^[A-Za-z0-9_-]+$/;

export function glossaryPath(domain: string, glossaryDir: string = DEFAULT_GLOSSARY_DIR): string {
  return path.join(glossaryDir, `${domain}.json`);
}

/**
 * Load and normalize the glossary for a domain.
 * Throws GlossaryNotFoundError when the file does not exist.
 */
export function loadGlossary(domain: string, glossaryDir: string = DEFAULT_GLOSSARY_DIR): Glossary {
  const filePath = glossaryPath(domain, glossaryDir);

  // Domain names end up in a file path; anything unusual is simply not found
  if (!DOMAIN_NAME.test(domain) || !fs.existsSync(filePath)) {
    throw new GlossaryNotFoundError(domain, filePath);
  }

  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return parseGlossary(domain, raw);
}

/**
 * Normalize a parsed glossary document. Malformed entries are skipped.
 */
export function parseGlossary(domain: string, raw: unknown): Glossary {
  if (!isRecord(raw)) {
    console.warn(`[GlossaryLoader] Glossary for '${domain}' is not an object, treating it as empty`);
    return { domain, terms: [], compoundTerms: [] };
  }

  return {
    domain,
    terms: normalizeEntries(domain, raw.terms),
    compoundTerms: normalizeEntries(domain, raw.compound_terms),
  };
}

/**
 * Load the extraction patterns for a domain. Missing file or domain yields [].
 */
export function loadPatterns(domain: string, patternsDir: string = DEFAULT_PATTERNS_DIR): TermPattern[] {
  const filePath = path.join(patternsDir, PATTERNS_FILE);
  if (!fs.existsSync(filePath)) {
    return [];
  }

  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  if (!isRecord(raw)) {
    return [];
  }

  const entries = raw[domain];
  if (!Array.isArray(entries)) {
    return [];
  }

  const patterns: TermPattern[] = [];
  for (const entry of entries) {
    if (typeof entry === 'string' && entry) {
      patterns.push({ source: entry });
    } else if (isRecord(entry) && typeof entry.regex === 'string' && entry.regex) {
      patterns.push({
        source: entry.regex,
        description: typeof entry.description === 'string' ? entry.description : undefined,
      });
    }
  }
  return patterns;
}

/**
 * List domains that have a glossary file
 */
export function listDomains(glossaryDir: string = DEFAULT_GLOSSARY_DIR): string[] {
  if (!fs.existsSync(glossaryDir)) {
    return [];
  }
  return fs
    .readdirSync(glossaryDir)
    .filter(file => file.endsWith('.json'))
    .map(file => file.slice(0, -'.json'.length))
    .filter(domain => DOMAIN_NAME.test(domain))
    .sort();
}

function normalizeEntries(domain: string, value: unknown): GlossaryEntry[] {
  if (!Array.isArray(value)) {
    return [];
  }

  const entries: GlossaryEntry[] = [];
  for (const item of value) {
    const entry = normalizeEntry(item);
    if (entry) {
      entries.push(entry);
    } else {
      console.warn(`[GlossaryLoader] Skipping malformed entry in '${domain}': ${JSON.stringify(item)}`);
    }
  }
  return entries;
}

function normalizeEntry(item: unknown): GlossaryEntry | null {
  if (typeof item === 'string') {
    return item.trim() ? { term: item.trim() } : null;
  }
  if (isRecord(item) && typeof item.term === 'string' && item.term.trim()) {
    const phonetic = typeof item.devanagari === 'string' && item.devanagari ? item.devanagari : undefined;
    return { term: item.term.trim(), phonetic };
  }
  return null;
}

