/**
 * Hindi -> Marathi adaptation
 *
 * The baseline lexicon is Hindi; Marathi output is derived from it by ordered
 * replacement of the grammatical words. Multi-word forms come first.
 */

type Replacement = readonly [pattern: RegExp, replacement: string];

const ROMAN_REPLACEMENTS: readonly Replacement[] = [
  [/\bkarta hai\b/gi, 'karte'],
  [/\bkarti hai\b/gi, 'karte'],
  [/\bke saath\b/gi, 'sobat'],
  [/\bke upar\b/gi, 'vpar'],
  [/\bke liye\b/gi, 'saathi'],
  [/\bhain\b/gi, 'ahet'],
  [/\bhai\b/gi, 'ahe'],
  [/\bmein\b/gi, 'madhye'],
  [/\bpar\b/gi, 'vpar'],
  [/\bke\b/gi, 'cha'],
  [/\bko\b/gi, 'la'],
  [/\bdo\b/gi, 'don'],
  [/\bhar\b/gi, 'prati'],
];

// \b does not see Devanagari as word characters. The danda (U+0964/U+0965)
// ends a sentence, so it counts as a boundary.
const DEVANAGARI_LETTER = '[\\u0900-\\u0963\\u0966-\\u097F]';
const NOT_DEVANAGARI_BEFORE = `(?<!${DEVANAGARI_LETTER})`;
const NOT_DEVANAGARI_AFTER = `(?!${DEVANAGARI_LETTER})`;

function devanagariWord(word: string): RegExp {
  return new RegExp(`${NOT_DEVANAGARI_BEFORE}${word}${NOT_DEVANAGARI_AFTER}`, 'g');
}

const DEVANAGARI_REPLACEMENTS: readonly Replacement[] = [
  [devanagariWord('करता है'), 'करते'],
  [devanagariWord('करती है'), 'करते'],
  [devanagariWord('के साथ'), 'सोबत'],
  [devanagariWord('के ऊपर'), 'वर'],
  [devanagariWord('के लिए'), 'साठी'],
  [devanagariWord('हैं'), 'आहेत'],
  [devanagariWord('है'), 'आहे'],
  [devanagariWord('में'), 'मध्ये'],
  [devanagariWord('के'), 'च्या'],
  [devanagariWord('को'), 'ला'],
  [devanagariWord('पर'), 'वर'],
  [devanagariWord('द्वारा'), 'द्वारे'],
];

export function toMarathiRoman(text: string): string {
  return applyReplacements(text, ROMAN_REPLACEMENTS);
}

export function toMarathiDevanagari(text: string): string {
  return applyReplacements(text, DEVANAGARI_REPLACEMENTS);
}

function applyReplacements(text: string, replacements: readonly Replacement[]): string {
  return replacements.reduce((current, [pattern, replacement]) => current.replace(pattern, replacement), text);
}
