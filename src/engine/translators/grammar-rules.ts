/**
 * Grammar rules for the rule-based translator
 *
 * Rules run in array order; later rules assume earlier ones have run.
 */

import { SENTINEL_PATTERN } from '../utils/sentinel.js';

export interface GrammarRule {
  name: string;
  pattern: RegExp;
  replacement: string;
}

/** A protected term slot after bracket protection */
const TERM = `(${SENTINEL_PATTERN})`;

/**
 * Rules applied while [term] brackets are still visible
 */
export const PRE_RULES: readonly GrammarRule[] = [
  {
    // "<Subject> has <Object>." -> "<Subject> mein <Object> hain."
    // Not "has been"; a "has" inside brackets belongs to a term.
    name: 'possession',
    pattern: /^(.+?)\s+(?:has|have)(?![^[\]]*\])\s+(?!been\b)(.+?)\s*([.!?]?)$/i,
    replacement: '$1 mein $2 hain$3',
  },
];

/**
 * Rules applied to substituted text, terms replaced by placeholders
 */
export const POST_RULES: readonly GrammarRule[] = [
  {
    // "[X] of [Y]" -> "[Y] ka [X]"
    name: 'genitive-swap',
    pattern: new RegExp(`${TERM} ka ${TERM}`, 'g'),
    replacement: '$2 ka $1',
  },
  {
    // "ke upar [X]" -> "[X] ke upar"; left alone when [X] starts a genitive
    name: 'postposition-shift',
    pattern: new RegExp(`(^|\\s)(ke upar|ke saath|ke liye|par|se|ko) ${TERM}(?! ka(?:\\s|$))`, 'g'),
    replacement: '$1$3 $2',
  },
];

export function applyRules(text: string, rules: readonly GrammarRule[]): string {
  return rules.reduce((current, rule) => current.replace(rule.pattern, rule.replacement), text);
}
