// packages/pipeline-backend/src/infrastructure/translation/echo-provider.ts
// Development provider: tags each text with the target language instead of translating it.
import type { TranslationProvider } from '../../domain/translator.js';

export class EchoTranslationProvider implements TranslationProvider {
  readonly name = 'echo';

  async translate(text: string, _sourceLang: string, targetLang: string): Promise<string> {
    return `[${targetLang}] ${text}`;
  }

  async translateBatch(texts: string[], sourceLang: string, targetLang: string): Promise<string[]> {
    return Promise.all(texts.map((text) => this.translate(text, sourceLang, targetLang)));
  }
}
