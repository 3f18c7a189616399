// packages/pipeline-backend/src/domain/progress.ts

// Overall progress checkpoints (percent).
// Each stage owns a band; only the ordering of these numbers matters to callers.
export const PROGRESS = {
  extractionStart: 0,
  extractionEnd: 25,
  translationClaimed: 30,
  translationPlanned: 40,
  translationEnd: 80,
  reconstructionClaimed: 85,
  completed: 100,
} as const;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function clampFraction(fraction: number): number {
  if (!Number.isFinite(fraction)) return 0;
  return Math.min(1, Math.max(0, fraction));
}

// Maps the extractor's own completion fraction onto the extraction band.
export function extractionProgress(done: number, total: number): number {
  const fraction = total > 0 ? clampFraction(done / total) : 1;
  const span = PROGRESS.extractionEnd - PROGRESS.extractionStart;
  return round2(PROGRESS.extractionStart + span * fraction);
}

export function translationProgress(done: number, total: number): number {
  const fraction = total > 0 ? clampFraction(done / total) : 1;
  const span = PROGRESS.translationEnd - PROGRESS.translationPlanned;
  return round2(PROGRESS.translationPlanned + span * fraction);
}
