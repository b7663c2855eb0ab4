/**
 * System prompt for the LLM translator
 *
 * The model receives guarded English (technical terms in [brackets]) and
 * returns code-mixed text in both scripts.
 */

import type { TargetLanguage } from '../../types/common.js';

const LANGUAGE_NAMES: Record<TargetLanguage, string> = {
  hi: 'Hindi',
  mr: 'Marathi',
};

interface FewShotExample {
  english: string;
  roman: string;
  devanagari: string;
}

const EXAMPLES: Record<TargetLanguage, FewShotExample[]> = {
  hi: [
    {
      english: 'The [for loop] iterates over the [array].',
      roman: '[for loop] [array] ke upar iterate karta hai.',
      devanagari: '[for loop] [array] के ऊपर iterate करता है।',
    },
    {
      english: 'This [class] has four [member variables].',
      roman: 'Is [class] mein chaar [member variables] hain.',
      devanagari: 'इस [class] में चार [member variables] हैं।',
    },
  ],
  mr: [
    {
      english: 'The [for loop] iterates over the [array].',
      roman: '[for loop] [array] vpar iterate karte.',
      devanagari: '[for loop] [array] वर iterate करते.',
    },
    {
      english: 'This [class] has four [member variables].',
      roman: 'Ya [class] madhye chaar [member variables] ahet.',
      devanagari: 'या [class] मध्ये चार [member variables] आहेत.',
    },
  ],
};

export const createTranslatorSystemPrompt = (targetLanguage: TargetLanguage): string => {
  const language = LANGUAGE_NAMES[targetLanguage];

  let prompt = `You translate short technical English sentences into code-mixed ${language} ("Inglish") for programming and science learners.

## Rules

### Technical terms
- Every term in square brackets is a technical term. Copy it EXACTLY, brackets included.
- Never translate, transliterate, reorder the words of, or drop a bracketed term.
- Every bracketed term of the input appears exactly once in each output field.

### Grammar
- Use natural ${language} word order: subject, object, then verb (SOV).
- Translate the grammatical words (articles, postpositions, verbs, copulas) into ${language}.
- Leave English words that have no common ${language} equivalent in English.

## Output Format

Return a JSON object:
{
  "roman": "translation in Roman script",
  "devanagari": "the same translation in Devanagari script"
}

## Examples
`;

  for (const example of EXAMPLES[targetLanguage]) {
    prompt += `\nInput: ${example.english}\n`;
    prompt += `Output: ${JSON.stringify({ roman: example.roman, devanagari: example.devanagari })}\n`;
  }

  return prompt;
};
