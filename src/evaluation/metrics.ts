/**
 * @fileoverview Evaluation metrics over claim batches
 *
 * Scores are in [0, 1]; `score: null` means the metric could not be
 * computed (no items), which is different from a zero score.
 */

import { clamp01, formatFloat } from '../utils/math.js';

export interface EvalResult {
  readonly name: string;
  readonly score: number | null;
  readonly details: string;
}

export interface MetricClaim {
  text: string;
  /** `source_id:locator` strings */
  evidence: readonly string[];
}

const MAX_LISTED_MISSING = 5;
const MAX_LISTED_INDEXES = 10;

function listWithEllipsis<T>(items: readonly T[], max: number): string {
  const shown = items.slice(0, max).join(', ');
  return items.length > max ? `${shown}...` : shown;
}

/**
 * Line-item agreement: each expected key must be present in `predicted`
 * and within `tolerance`. Score = matches / expected.
 */
export function numericAgreementMetric(
  expected: Readonly<Record<string, number>>,
  predicted: Readonly<Record<string, number>>,
  options: { tolerance?: number } = {}
): EvalResult {
  const tolerance = options.tolerance ?? 0;
  const keys = Object.keys(expected);
  if (keys.length === 0) {
    return { name: 'numeric_agreement', score: null, details: 'No expected items provided.' };
  }

  let matches = 0;
  const missing: string[] = [];
  for (const key of keys) {
    const predictedValue = predicted[key];
    if (predictedValue === undefined) {
      missing.push(key);
      continue;
    }
    if (Math.abs(predictedValue - expected[key]) <= tolerance) {
      matches++;
    }
  }

  let details = `matches=${matches}/${keys.length}, tolerance=${formatFloat(tolerance)}, missing=${missing.length}`;
  if (missing.length > 0) {
    details += ` (${listWithEllipsis(missing, MAX_LISTED_MISSING)})`;
  }
  return { name: 'numeric_agreement', score: clamp01(matches / keys.length), details };
}

function isAttributed(claim: MetricClaim): boolean {
  return claim.evidence.length > 0 && claim.evidence.every((ref) => ref.trim().length > 0);
}

/**
 * Share of claims with non-empty evidence; blank evidence strings do not count.
 */
export function attributionCoverageMetric(claims: readonly MetricClaim[]): EvalResult {
  if (claims.length === 0) {
    return { name: 'attribution_coverage', score: null, details: 'No claims provided.' };
  }

  const missingIndexes: number[] = [];
  claims.forEach((claim, index) => {
    if (!isAttributed(claim)) missingIndexes.push(index);
  });
  const covered = claims.length - missingIndexes.length;

  return {
    name: 'attribution_coverage',
    score: clamp01(covered / claims.length),
    details: `covered=${covered}/${claims.length}, missing_indexes=[${listWithEllipsis(missingIndexes, MAX_LISTED_INDEXES)}]`,
  };
}

/**
 * Sentence-level factuality stand-in: supported / total until retrieval-backed
 * verification replaces it.
 */
export function placeholderFactscore(supportedSentences: number, totalSentences: number): EvalResult {
  if (totalSentences <= 0) {
    return { name: 'factscore', score: null, details: 'total_sentences must be > 0.' };
  }
  return {
    name: 'factscore',
    score: clamp01(supportedSentences / totalSentences),
    details: `supported=${supportedSentences}/${totalSentences}`,
  };
}
