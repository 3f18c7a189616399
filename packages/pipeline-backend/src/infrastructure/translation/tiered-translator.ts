// packages/pipeline-backend/src/infrastructure/translation/tiered-translator.ts
// Routes each call to the provider configured for the job's tier.
// Every provider call is bounded by a timeout and retried on transient failures.
import { InfrastructureError } from '@doc-relay/contracts';
import { withRetry, withTimeout } from '@doc-relay/shared-infrastructure';

import type { TranslationTier } from '../../domain/job-model.js';
import type { TranslationProvider, Translator } from '../../domain/translator.js';

export interface TieredTranslatorOptions {
  timeoutMs: number;
  maxAttempts: number;
  retryDelayMs?: number;
}

export class TieredTranslator implements Translator {
  constructor(
    private readonly providers: Record<TranslationTier, TranslationProvider>,
    private readonly options: TieredTranslatorOptions,
  ) {}

  async translate(
    text: string,
    sourceLang: string,
    targetLang: string,
    tier: TranslationTier,
  ): Promise<string> {
    const provider = this.providers[tier];
    return this.call(`${provider.name}.translate`, () =>
      provider.translate(text, sourceLang, targetLang),
    );
  }

  async translateBatch(
    texts: string[],
    sourceLang: string,
    targetLang: string,
    tier: TranslationTier,
  ): Promise<string[]> {
    const provider = this.providers[tier];
    if (!provider.translateBatch) {
      const results: string[] = [];
      for (const text of texts) {
        results.push(await this.translate(text, sourceLang, targetLang, tier));
      }
      return results;
    }

    const batch = provider.translateBatch.bind(provider);
    const results = await this.call(`${provider.name}.translateBatch`, () =>
      batch(texts, sourceLang, targetLang),
    );
    if (results.length !== texts.length) {
      throw new InfrastructureError(
        `${provider.name} returned ${results.length} translations for ${texts.length} inputs`,
      );
    }
    return results;
  }

  private call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(() => withTimeout(fn, this.options.timeoutMs, label), {
      label,
      tries: this.options.maxAttempts,
      initialDelayMs: this.options.retryDelayMs,
    });
  }
}
