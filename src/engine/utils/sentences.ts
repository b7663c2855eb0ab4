/**
 * Sentence splitter for the rule-based translator
 */

/**
 * Split text into sentences.
 * A boundary is sentence-ending punctuation followed by whitespace; bracketed
 * terms never contain one, so guarded text splits the same way as plain text.
 */
export function splitIntoSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .filter(s => s.trim().length > 0);
}

/**
 * Join translated sentences back into one line
 */
export function joinSentences(sentences: string[]): string {
  return sentences.map(s => s.trim()).filter(s => s.length > 0).join(' ');
}
