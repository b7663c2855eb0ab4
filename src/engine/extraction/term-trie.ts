/**
 * Word trie for compound (multi-word) glossary terms
 */

interface TrieNode {
  readonly children: ReadonlyMap<string, TrieNode>;
  readonly terminal: boolean;
}

interface MutableTrieNode {
  children: Map<string, MutableTrieNode>;
  terminal: boolean;
}

export class TermTrie {
  private readonly root: TrieNode;

  private constructor(root: TrieNode) {
    this.root = root;
  }

  /**
   * Build a trie from terms; each term is split on whitespace and lowercased
   */
  static fromTerms(terms: Iterable<string>): TermTrie {
    const root: MutableTrieNode = { children: new Map(), terminal: false };

    for (const term of terms) {
      const words = term.toLowerCase().split(/\s+/).filter(w => w.length > 0);
      if (words.length === 0) continue;

      let node = root;
      for (const word of words) {
        let child = node.children.get(word);
        if (!child) {
          child = { children: new Map(), terminal: false };
          node.children.set(word, child);
        }
        node = child;
      }
      node.terminal = true;
    }

    return new TermTrie(root);
  }

  get isEmpty(): boolean {
    return this.root.children.size === 0;
  }

  /**
   * Walk the trie over words[from], words[from + 1], ... (already lowercased)
   * and return the length, in words, of every term that ends along the way.
   * A term that is a prefix of a longer term yields its own length too.
   */
  matchLengths(words: readonly string[], from: number): number[] {
    const lengths: number[] = [];
    let node: TrieNode | undefined = this.root;

    for (let i = from; i < words.length; i++) {
      node = node.children.get(words[i]);
      if (!node) break;
      if (node.terminal) lengths.push(i - from + 1);
    }

    return lengths;
  }
}
