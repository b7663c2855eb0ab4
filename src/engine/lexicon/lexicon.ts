/**
 * Lexicon files for the rule-based translator and the script converter
 *
 *   data/lexicon/hi.json               English word -> Hindi Roman, verb phrases
 *   data/lexicon/roman-devanagari.json Hindi/Marathi Roman -> Devanagari
 */

import fs from 'fs';
import path from 'path';
import { LexiconError } from '../errors.js';
import { DEFAULT_LEXICON_DIR } from '../utils/paths.js';
import { isRecord } from '../utils/guards.js';

export interface TranslationLexicon {
  /** lowercase English word -> Roman fragment ('' drops the word) */
  wordMap: Readonly<Record<string, string>>;
  /** Multi-word verb phrases moved by the SOV reorder */
  verbPhrases: readonly string[];
}

/** Roman token (possibly multi-word) -> Devanagari */
export type DevanagariTable = Readonly<Record<string, string>>;

export function loadTranslationLexicon(lexiconDir: string = DEFAULT_LEXICON_DIR): TranslationLexicon {
  const filePath = path.join(lexiconDir, 'hi.json');
  const raw = readJson(filePath);

  if (!isRecord(raw)) {
    throw new LexiconError(filePath, 'expected an object');
  }

  const wordMap = toStringRecord(raw.wordMap);
  if (!wordMap) {
    throw new LexiconError(filePath, '"wordMap" must map words to strings');
  }

  const verbPhrases = raw.verbPhrases;
  if (!Array.isArray(verbPhrases) || !verbPhrases.every((p): p is string => typeof p === 'string')) {
    throw new LexiconError(filePath, '"verbPhrases" must be a list of strings');
  }

  return { wordMap, verbPhrases };
}

export function loadDevanagariTable(lexiconDir: string = DEFAULT_LEXICON_DIR): DevanagariTable {
  const filePath = path.join(lexiconDir, 'roman-devanagari.json');
  const table = toStringRecord(readJson(filePath));
  if (!table) {
    throw new LexiconError(filePath, 'expected an object mapping Roman tokens to Devanagari');
  }
  return table;
}

/**
 * Entries ordered longest key first; ties keep file order
 */
export function longestFirst<T>(entries: readonly [string, T][]): [string, T][] {
  return [...entries].sort((a, b) => b[0].length - a[0].length);
}

function readJson(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new LexiconError(filePath, 'file not found');
  }
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

function toStringRecord(value: unknown): Record<string, string> | null {
  if (!isRecord(value)) return null;

  const record: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') return null;
    record[key.toLowerCase()] = entry;
  }
  return record;
}
