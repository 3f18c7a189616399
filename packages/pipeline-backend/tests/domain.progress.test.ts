import { describe, expect, it } from 'vitest';

import { extractionProgress, PROGRESS, translationProgress } from '../src/domain/progress.js';

describe('domain/progress', () => {
  /**
   * Intent:
   * - Stage bands stay ordered and per-unit progress is rounded to two decimals.
   */

  it('orders the checkpoints', () => {
    const checkpoints = [
      PROGRESS.extractionStart,
      PROGRESS.extractionEnd,
      PROGRESS.translationClaimed,
      PROGRESS.translationPlanned,
      PROGRESS.translationEnd,
      PROGRESS.reconstructionClaimed,
      PROGRESS.completed,
    ];
    expect(checkpoints).toEqual([0, 25, 30, 40, 80, 85, 100]);
  });

  it('spreads extraction over 0..25', () => {
    expect(extractionProgress(1, 3)).toBe(8.33);
    expect(extractionProgress(2, 3)).toBe(16.67);
    expect(extractionProgress(3, 3)).toBe(25);
    expect(extractionProgress(0, 0)).toBe(25);
  });

  it('spreads translation over 40..80', () => {
    expect(translationProgress(1, 3)).toBe(53.33);
    expect(translationProgress(2, 3)).toBe(66.67);
    expect(translationProgress(3, 3)).toBe(80);
    expect(translationProgress(1, 4)).toBe(50);
  });

  it('clamps fractions above one', () => {
    expect(translationProgress(5, 4)).toBe(80);
  });
});
