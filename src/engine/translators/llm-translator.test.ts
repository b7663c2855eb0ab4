import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { ILLMProvider, JSONCompletionResult, Message } from '../interfaces/llm-provider.js';
import { LLMTranslator } from './llm-translator.js';
import { RuleTranslator } from './rule-translator.js';

/**
 * Provider stand-in that answers every JSON request with a fixed result
 */
class FakeProvider implements ILLMProvider {
  readonly name = 'fake';
  readonly model = 'fake-model';
  readonly requests: Message[][] = [];

  constructor(private readonly respond: () => Promise<JSONCompletionResult>) {}

  async completeJSON(messages: Message[]): Promise<JSONCompletionResult> {
    this.requests.push(messages);
    return this.respond();
  }
}

const usage = { prompt: 10, completion: 5, total: 15 };

const answer = (data: unknown) => new FakeProvider(async () => ({ data, tokensUsed: usage }));

describe('LLMTranslator', () => {
  const guarded = 'The [for loop] iterates over the [array].';

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the model translation', async () => {
    const provider = answer({
      roman: '[for loop] [array] ke upar iterate karta hai.',
      devanagari: '[for loop] [array] के ऊपर iterate करता है।',
    });
    const translator = new LLMTranslator({ provider });

    const output = await translator.translateGuarded(guarded);

    expect(output).toEqual({
      roman: '[for loop] [array] ke upar iterate karta hai.',
      devanagari: '[for loop] [array] के ऊपर iterate करता है।',
      constraintsPreserved: true,
      producedBy: 'llm',
      tokensUsed: 15,
    });
  });

  it('sends the system prompt and the guarded text', async () => {
    const provider = answer({ roman: '[for loop] [array]', devanagari: '' });
    await new LLMTranslator({ provider, targetLanguage: 'mr' }).translateGuarded(guarded);

    const [system, user] = provider.requests[0];
    expect(system.role).toBe('system');
    expect(system.content).toContain('code-mixed Marathi');
    expect(user).toEqual({ role: 'user', content: guarded });
  });

  it('reports terms the model dropped', async () => {
    const provider = answer({ roman: '[for loop] ke upar iterate karta hai.', devanagari: '' });
    const output = await new LLMTranslator({ provider }).translateGuarded(guarded);

    expect(output.producedBy).toBe('llm');
    expect(output.constraintsPreserved).toBe(false);
  });

  it('adapts Marathi output without touching terms', async () => {
    const provider = answer({
      roman: '[do while] [array] ke upar iterate karta hai.',
      devanagari: '[do while] [array] के ऊपर iterate करता है.',
    });
    const output = await new LLMTranslator({ provider, targetLanguage: 'mr' }).translateGuarded(
      'The [do while] iterates over the [array].'
    );

    expect(output.roman).toBe('[do while] [array] vpar iterate karte.');
    expect(output.devanagari).toBe('[do while] [array] वर iterate करते.');
  });

  describe('fallback chain', () => {
    const baseline = new RuleTranslator('hi');

    it('uses the fallback when no provider is configured', async () => {
      const output = await new LLMTranslator({ fallback: baseline }).translateGuarded(guarded);

      expect(output).toEqual({
        roman: '[for loop] [array] ke upar iterate karta hai.',
        constraintsPreserved: true,
        producedBy: 'baseline',
      });
      expect(console.warn).toHaveBeenCalledWith('[LLMTranslator] No LLM provider configured. Falling back to baseline');
    });

    it('uses the fallback when the request fails', async () => {
      const provider = new FakeProvider(async () => {
        throw new Error('connect ECONNREFUSED');
      });
      const output = await new LLMTranslator({ provider, fallback: baseline }).translateGuarded(guarded);

      expect(output.producedBy).toBe('baseline');
      expect(console.warn).toHaveBeenCalledWith(
        '[LLMTranslator] LLM request failed: connect ECONNREFUSED. Falling back to baseline'
      );
    });

    it('uses the fallback when the response is malformed', async () => {
      for (const data of [{ translation: 'x' }, { roman: 42, devanagari: '' }, { roman: ' ', devanagari: '' }, null]) {
        const output = await new LLMTranslator({ provider: answer(data), fallback: baseline }).translateGuarded(guarded);
        expect(output.producedBy).toBe('baseline');
      }
    });

    it('returns the input unchanged without provider or fallback', async () => {
      const output = await new LLMTranslator().translateGuarded(guarded);

      expect(output).toEqual({ roman: guarded, constraintsPreserved: true, producedBy: 'passthrough' });
      expect(console.warn).toHaveBeenCalledWith('[LLMTranslator] No LLM provider configured. Falling back to passthrough');
    });
  });
});
