import { describe, it, expect } from 'vitest';
import { TermTrie } from './term-trie.js';

describe('TermTrie', () => {
  const trie = TermTrie.fromTerms(['binary search', 'Binary Search Tree', 'for loop', '  hash   map ']);

  it('reports every term ending along the walk', () => {
    const words = ['binary', 'search', 'tree', 'node'];
    expect(trie.matchLengths(words, 0)).toEqual([2, 3]);
  });

  it('matches from an offset into the word list', () => {
    const words = ['the', 'for', 'loop', 'runs'];
    expect(trie.matchLengths(words, 0)).toEqual([]);
    expect(trie.matchLengths(words, 1)).toEqual([2]);
  });

  it('does not report a path that is only a prefix', () => {
    expect(trie.matchLengths(['binary', 'tree'], 0)).toEqual([]);
    expect(trie.matchLengths(['binary'], 0)).toEqual([]);
  });

  it('normalizes case and whitespace of the terms', () => {
    expect(trie.matchLengths(['hash', 'map'], 0)).toEqual([2]);
  });

  it('is empty when built from no usable terms', () => {
    expect(TermTrie.fromTerms([]).isEmpty).toBe(true);
    expect(TermTrie.fromTerms(['   ']).isEmpty).toBe(true);
    expect(trie.isEmpty).toBe(false);
  });
});
