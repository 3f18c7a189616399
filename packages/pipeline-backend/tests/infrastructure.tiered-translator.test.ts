import { describe, expect, it, vi } from 'vitest';

import type { TranslationProvider } from '../src/domain/translator.js';
import { EchoTranslationProvider } from '../src/infrastructure/translation/echo-provider.js';
import { TieredTranslator } from '../src/infrastructure/translation/tiered-translator.js';

function providerNamed(name: string, translate: TranslationProvider['translate']): TranslationProvider {
  return { name, translate };
}

describe('infrastructure/translation', () => {
  /**
   * Intent:
   * - Each tier routes to its own provider.
   * - Transient provider errors are retried; other errors surface at once.
   * - Batch calls fall back to sequential calls for providers without batch support.
   */

  const options = { timeoutMs: 1_000, maxAttempts: 3, retryDelayMs: 1 };

  it('tags text with the target language in the echo provider', async () => {
    const echo = new EchoTranslationProvider();
    await expect(echo.translate('Hello', 'en', 'vi')).resolves.toBe('[vi] Hello');
    await expect(echo.translateBatch(['a', 'b'], 'en', 'fr')).resolves.toEqual(['[fr] a', '[fr] b']);
  });

  it('routes calls by tier', async () => {
    const basic = providerNamed('basic', vi.fn(async (text: string) => `basic:${text}`));
    const premium = providerNamed('premium', vi.fn(async (text: string) => `premium:${text}`));
    const translator = new TieredTranslator({ basic, standard: basic, premium }, options);

    await expect(translator.translate('hi', 'en', 'vi', 'premium')).resolves.toBe('premium:hi');
    await expect(translator.translate('hi', 'en', 'vi', 'basic')).resolves.toBe('basic:hi');
  });

  it('retries transient provider failures', async () => {
    const translate = vi
      .fn<TranslationProvider['translate']>()
      .mockRejectedValueOnce(Object.assign(new Error('rate limited'), { status: 429 }))
      .mockResolvedValueOnce('xin chao');
    const provider = providerNamed('flaky', translate);
    const translator = new TieredTranslator(
      { basic: provider, standard: provider, premium: provider },
      options,
    );

    await expect(translator.translate('hello', 'en', 'vi', 'standard')).resolves.toBe('xin chao');
    expect(translate).toHaveBeenCalledTimes(2);
  });

  it('surfaces non-transient failures without retrying', async () => {
    const translate = vi
      .fn<TranslationProvider['translate']>()
      .mockRejectedValue(new Error('unsupported language pair'));
    const provider = providerNamed('strict', translate);
    const translator = new TieredTranslator(
      { basic: provider, standard: provider, premium: provider },
      options,
    );

    await expect(translator.translate('hello', 'en', 'xx', 'basic')).rejects.toThrow(
      'unsupported language pair',
    );
    expect(translate).toHaveBeenCalledTimes(1);
  });

  it('times out slow provider calls', async () => {
    const provider = providerNamed('slow', () => new Promise<string>(() => {}));
    const translator = new TieredTranslator(
      { basic: provider, standard: provider, premium: provider },
      { timeoutMs: 20, maxAttempts: 1 },
    );

    await expect(translator.translate('hello', 'en', 'vi', 'basic')).rejects.toThrow(
      'slow.translate timed out after 20ms',
    );
  });

  it('translates batches sequentially when the provider has no batch call', async () => {
    const provider = providerNamed('single', vi.fn(async (text: string) => text.toUpperCase()));
    const translator = new TieredTranslator(
      { basic: provider, standard: provider, premium: provider },
      options,
    );

    await expect(translator.translateBatch(['a', 'b'], 'en', 'vi', 'basic')).resolves.toEqual([
      'A',
      'B',
    ]);
  });

  it('rejects batch results that do not line up with the inputs', async () => {
    const provider: TranslationProvider = {
      name: 'short',
      translate: async (text) => text,
      translateBatch: async () => ['only one'],
    };
    const translator = new TieredTranslator(
      { basic: provider, standard: provider, premium: provider },
      options,
    );

    await expect(translator.translateBatch(['a', 'b'], 'en', 'vi', 'basic')).rejects.toThrow(
      'short returned 1 translations for 2 inputs',
    );
  });
});
