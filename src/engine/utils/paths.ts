/**
 * Locations of the bundled data files (glossaries, patterns, lexicons).
 * Resolved from this module so they work from src/ and from dist/ alike.
 */

import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DATA_DIR = path.resolve(__dirname, '../../../data');
export const DEFAULT_GLOSSARY_DIR = path.join(DATA_DIR, 'glossaries');
export const DEFAULT_PATTERNS_DIR = path.join(DATA_DIR, 'patterns');
export const DEFAULT_LEXICON_DIR = path.join(DATA_DIR, 'lexicon');
