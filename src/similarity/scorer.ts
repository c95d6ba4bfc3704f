/**
 * Length-based similarity score shared by every calculator.
 */

export interface ScoreParams {
  threshold: number;
  maxDiffRatio: number;
  /** Decimal places applied to score and ratio before the threshold check. */
  precision?: number;
}

export interface ScoreOutcome {
  score: number;
  /** min(count) / max(count). */
  ratio: number;
  passed: boolean;
  /** Set for the degenerate empty-input cases. */
  note?: string;
  warning?: string;
}

export function roundTo(value: number, precision: number | undefined): number {
  if (precision === undefined) return value;
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
}

/**
 * Scores two lengths.
 *
 * `score = 1 - min(1, |aug - orig| / (orig * maxDiffRatio))`, so a difference of
 * `maxDiffRatio` of the original or more scores 0. Both empty scores 1; an
 * empty original with a non-empty augmented scores 0.
 */
export function scoreCounts(originalCount: number, augmentedCount: number, params: ScoreParams): ScoreOutcome {
  if (originalCount === 0 && augmentedCount === 0) {
    return { score: 1, ratio: 1, passed: true, note: 'both inputs are empty' };
  }
  if (originalCount === 0) {
    return { score: 0, ratio: 0, passed: false, warning: 'original input is empty' };
  }

  const ratio = Math.min(originalCount, augmentedCount) / Math.max(originalCount, augmentedCount);
  const diffRatio = Math.min(1, Math.abs(augmentedCount - originalCount) / (originalCount * params.maxDiffRatio));

  const score = roundTo(1 - diffRatio, params.precision);
  return {
    score,
    ratio: roundTo(ratio, params.precision),
    passed: score >= params.threshold,
  };
}
