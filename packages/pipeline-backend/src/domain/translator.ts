// packages/pipeline-backend/src/domain/translator.ts
//
// Translation collaborators. Providers do the calls; a Translator picks one per tier.
import type { TranslationTier } from './job-model.js';

export interface TranslationProvider {
  readonly name: string;
  translate(text: string, sourceLang: string, targetLang: string): Promise<string>;
  translateBatch?(texts: string[], sourceLang: string, targetLang: string): Promise<string[]>;
}

export interface Translator {
  translate(
    text: string,
    sourceLang: string,
    targetLang: string,
    tier: TranslationTier,
  ): Promise<string>;
  /** Resolves to exactly one translation per input, in order. */
  translateBatch(
    texts: string[],
    sourceLang: string,
    targetLang: string,
    tier: TranslationTier,
  ): Promise<string[]>;
}
