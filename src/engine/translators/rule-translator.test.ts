import { describe, it, expect } from 'vitest';
import { RuleTranslator, validateConstraints } from './rule-translator.js';

describe('RuleTranslator', () => {
  const translator = new RuleTranslator('hi');

  describe('translate', () => {
    it('returns empty output for empty input', () => {
      expect(translator.translate('')).toBe('');
      expect(translator.translate('   ')).toBe('');
    });

    it('substitutes function words when there are no terms', () => {
      expect(translator.translate('This is a simple sentence.')).toBe('yeh hai ek simple sentence.');
    });

    it('moves the verb phrase after the object', () => {
      expect(translator.translate('[function] returns a [boolean] value.')).toBe(
        '[function] ek [boolean] value return karta hai.'
      );
    });

    it('shifts postpositions after the term they govern', () => {
      expect(translator.translate('The [for loop] iterates over the [array].')).toBe(
        '[for loop] [array] ke upar iterate karta hai.'
      );
    });

    it('swaps "[X] of [Y]" into "[Y] ka [X]"', () => {
      expect(translator.translate('The [array] of [integers] is sorted.')).toBe('[integers] ka [array] hai sorted.');
    });

    it('keeps the genitive pair together after a postposition', () => {
      expect(translator.translate('The [for loop] iterates over the [array] of [integers].')).toBe(
        '[for loop] ke upar [integers] ka [array] iterate karta hai.'
      );
    });

    it('rewrites possession into a "mein ... hain" construction', () => {
      expect(translator.translate('This [class] has four [member variables].')).toBe(
        'yeh [class] mein chaar [member variables] hain.'
      );
    });

    it('leaves "has been" alone', () => {
      expect(translator.translate('The [array] has been sorted.')).toBe('[array] has been sorted.');
    });

    it('does not move a verb phrase with nothing after it', () => {
      expect(translator.translate('The [loop] runs.')).toBe('[loop] run karta hai.');
    });

    it('translates each sentence on its own', () => {
      expect(translator.translate('[function] returns a value. [loop] runs.')).toBe(
        '[function] ek value return karta hai. [loop] run karta hai.'
      );
    });

    it('moves trailing punctuation of a dropped word to the previous word', () => {
      expect(translator.translate('Find the [array] and the.')).toBe('Find [array] aur.');
    });

    it('moves opening punctuation of a dropped word to the next word', () => {
      expect(translator.translate('Sort (the [array]) now.')).toBe('Sort ([array]) now.');
    });

    it('drops quotes that only wrapped a dropped word', () => {
      expect(translator.translate('Use "the" [array].')).toBe('upyog karo [array].');
    });

    it('passes unknown words through', () => {
      expect(translator.translate('Compile quickly!')).toBe('Compile quickly!');
    });

    it('never alters bracketed terms that look like lexicon words', () => {
      expect(translator.translate('The [is] of [the].')).toBe('[the] ka [is].');
    });

    it('uses an injected lexicon', () => {
      const custom = new RuleTranslator('hi', { wordMap: { cat: 'billi' }, verbPhrases: [] });
      expect(custom.translate('The cat sat on the constructor')).toBe('The billi sat on the constructor');
    });
  });

  describe('Marathi output', () => {
    const marathi = new RuleTranslator('mr');

    it('adapts verbs and postpositions', () => {
      expect(marathi.translate('The [for loop] iterates over the [array].')).toBe(
        '[for loop] [array] vpar iterate karte.'
      );
    });

    it('adapts the possession construction', () => {
      expect(marathi.translate('This [class] has four [member variables].')).toBe(
        'yeh [class] madhye chaar [member variables] ahet.'
      );
    });

    it('does not touch words inside terms', () => {
      expect(marathi.translate('Two [do while] loops.')).toBe('don [do while] loops.');
    });
  });

  describe('translateGuarded', () => {
    it('reports the baseline output and preserved constraints', async () => {
      const output = await translator.translateGuarded('The [loop] runs.');
      expect(output).toEqual({
        roman: '[loop] run karta hai.',
        constraintsPreserved: true,
        producedBy: 'baseline',
      });
    });
  });

  describe('validateConstraints', () => {
    it('compares bracketed terms as a multiset', () => {
      expect(validateConstraints('[a] [b] [a]', 'x [a] y [a] [b]')).toBe(true);
      expect(validateConstraints('[a] [b] [a]', '[a] [b]')).toBe(false);
      expect(validateConstraints('[for loop]', '[For loop]')).toBe(false);
      expect(validateConstraints('no terms', 'koi term nahi')).toBe(true);
    });

    it('is exposed on the translator', () => {
      expect(translator.validateConstraints('[array]', '[array] hai')).toBe(true);
    });
  });
});
