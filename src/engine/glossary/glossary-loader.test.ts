import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { GlossaryNotFoundError } from '../errors.js';
import { listDomains, loadGlossary, loadPatterns, parseGlossary } from './glossary-loader.js';

describe('glossary-loader', () => {
  let dir: string;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'inglish-glossary-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('parseGlossary', () => {
    it('normalizes bare strings and records into one entry shape', () => {
      const glossary = parseGlossary('test', {
        terms: ['API', { term: ' array ', devanagari: 'ऐरे' }, { term: 'loop', devanagari: '' }],
        compound_terms: [{ term: 'for loop', devanagari: 'फ़ॉर लूप' }],
      });

      expect(glossary).toEqual({
        domain: 'test',
        terms: [{ term: 'API' }, { term: 'array', phonetic: 'ऐरे' }, { term: 'loop' }],
        compoundTerms: [{ term: 'for loop', phonetic: 'फ़ॉर लूप' }],
      });
    });

    it('skips malformed entries with a warning', () => {
      const glossary = parseGlossary('test', { terms: [42, { devanagari: 'x' }, '', 'stack'] });

      expect(glossary.terms).toEqual([{ term: 'stack' }]);
      expect(glossary.compoundTerms).toEqual([]);
      expect(console.warn).toHaveBeenCalledTimes(3);
    });
  });

  describe('loadGlossary', () => {
    it('reads <domain>.json from the directory', () => {
      fs.writeFileSync(path.join(dir, 'chemistry.json'), JSON.stringify({ terms: ['molecule'] }));
      expect(loadGlossary('chemistry', dir).terms).toEqual([{ term: 'molecule' }]);
    });

    it('throws GlossaryNotFoundError with the domain and path', () => {
      try {
        loadGlossary('biology', dir);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(GlossaryNotFoundError);
        if (error instanceof GlossaryNotFoundError) {
          expect(error.domain).toBe('biology');
          expect(error.path).toBe(path.join(dir, 'biology.json'));
          expect(error.name).toBe('GlossaryNotFoundError');
        }
      }
    });
  });

  describe('loadPatterns', () => {
    it('reads string and object entries for the domain', () => {
      fs.writeFileSync(
        path.join(dir, 'regex_patterns.json'),
        JSON.stringify({ chemistry: ['H2O', { regex: '\\bNaCl\\b', description: 'salt' }, { other: 1 }] })
      );

      expect(loadPatterns('chemistry', dir)).toEqual([
        { source: 'H2O' },
        { source: '\\bNaCl\\b', description: 'salt' },
      ]);
    });

    it('returns no patterns for a missing file or domain', () => {
      expect(loadPatterns('chemistry', dir)).toEqual([]);
      fs.writeFileSync(path.join(dir, 'regex_patterns.json'), JSON.stringify({ physics: ['m/s'] }));
      expect(loadPatterns('chemistry', dir)).toEqual([]);
    });
  });

  describe('listDomains', () => {
    it('lists glossary files with valid domain names', () => {
      fs.writeFileSync(path.join(dir, 'physics.json'), '{}');
      fs.writeFileSync(path.join(dir, 'chemistry.json'), '{}');
      fs.writeFileSync(path.join(dir, 'notes.txt'), '');
      fs.writeFileSync(path.join(dir, 'bad name.json'), '{}');

      expect(listDomains(dir)).toEqual(['chemistry', 'physics']);
    });

    it('includes the bundled domains by default', () => {
      expect(listDomains()).toEqual(expect.arrayContaining(['physics', 'programming']));
    });
  });
});
