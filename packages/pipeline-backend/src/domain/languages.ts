// packages/pipeline-backend/src/domain/languages.ts

const LANGUAGE_ALIASES: Record<string, string> = {
  english: 'en',
  eng: 'en',
  vietnamese: 'vi',
  vie: 'vi',
  chinese: 'zh',
  chi: 'zh',
  japanese: 'ja',
  jpn: 'ja',
  korean: 'ko',
  kor: 'ko',
  french: 'fr',
  fra: 'fr',
  german: 'de',
  deu: 'de',
  spanish: 'es',
  spa: 'es',
};

export const AUTO_DETECT = 'auto';

// Lower-cases and maps common names/ISO 639-2 codes to two-letter codes.
// Unknown codes pass through unchanged.
export function normalizeLanguage(raw: string | undefined, fallback: string): string {
  const value = raw?.trim().toLowerCase();
  if (!value) return fallback;
  return LANGUAGE_ALIASES[value] ?? value;
}
