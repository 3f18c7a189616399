// packages/pipeline-backend/src/domain/artifacts.ts
//
// JSON payloads passed between stages through the artifact store.
import { InfrastructureError } from '@doc-relay/contracts';
import { z } from 'zod';

const extractionArtifactSchema = z.object({
  pages: z.array(z.string()),
});

const translatedChunkSchema = z.object({
  page: z.number().int().min(1),
  index: z.number().int().min(0),
  text: z.string(),
});

const translationArtifactSchema = z.object({
  chunks: z.array(translatedChunkSchema),
});

export type ExtractionArtifact = z.infer<typeof extractionArtifactSchema>;
export type TranslatedChunk = z.infer<typeof translatedChunkSchema>;
export type TranslationArtifact = z.infer<typeof translationArtifactSchema>;

function parseArtifact<T>(schema: z.ZodType<T>, raw: string, label: string): T {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error: unknown) {
    throw new InfrastructureError(`${label} artifact is not valid JSON`, { cause: error });
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new InfrastructureError(`${label} artifact is malformed`, { cause: parsed.error });
  }
  return parsed.data;
}

export function encodeExtractionArtifact(artifact: ExtractionArtifact): string {
  return JSON.stringify(artifact);
}

export function decodeExtractionArtifact(raw: string): ExtractionArtifact {
  return parseArtifact(extractionArtifactSchema, raw, 'Extraction');
}

export function encodeTranslationArtifact(artifact: TranslationArtifact): string {
  return JSON.stringify(artifact);
}

export function decodeTranslationArtifact(raw: string): TranslationArtifact {
  return parseArtifact(translationArtifactSchema, raw, 'Translation');
}
