/**
 * @fileoverview Numeric agreement between a claimed value and its evidence
 *
 * Passes when the absolute difference is within `absTol` OR the difference
 * relative to the evidence value is within `relTol`. Either criterion alone
 * suffices. Pure and total over finite inputs.
 */

import { formatGeneral } from '../utils/math.js';

export const DEFAULT_ABS_TOL = 0.01;
export const DEFAULT_REL_TOL = 0.01;
/** Floor for the relative-difference denominator when the evidence is 0. */
export const RELATIVE_SCALE_EPSILON = 1e-12;

export interface NumericAgreementInput {
  claimValue: number;
  evidenceValue: number;
  absTol?: number;
  relTol?: number;
}

export interface NumericAgreementResult {
  readonly ok: boolean;
  readonly claimValue: number;
  readonly evidenceValue: number;
  readonly absDiff: number;
  readonly relDiff: number;
  readonly absTol: number;
  readonly relTol: number;
  /** `abs_ok`, `rel_ok`, or a `mismatch(...)` message. */
  readonly reason: string;
}

export function formatMismatchReason(absDiff: number, absTol: number, relDiff: number, relTol: number): string {
  return (
    `mismatch(abs_diff=${formatGeneral(absDiff)} > abs_tol=${formatGeneral(absTol)}, ` +
    `rel_diff=${formatGeneral(relDiff)} > rel_tol=${formatGeneral(relTol)})`
  );
}

export function checkNumericAgreement(input: NumericAgreementInput): NumericAgreementResult {
  const { claimValue, evidenceValue, absTol = DEFAULT_ABS_TOL, relTol = DEFAULT_REL_TOL } = input;

  const absDiff = Math.abs(claimValue - evidenceValue);
  const scale = Math.max(Math.abs(evidenceValue), RELATIVE_SCALE_EPSILON);
  const relDiff = absDiff / scale;

  const absOk = absDiff <= absTol;
  const relOk = relDiff <= relTol;

  let reason: string;
  if (absOk) {
    reason = 'abs_ok';
  } else if (relOk) {
    reason = 'rel_ok';
  } else {
    reason = formatMismatchReason(absDiff, absTol, relDiff, relTol);
  }

  return Object.freeze({
    ok: absOk || relOk,
    claimValue,
    evidenceValue,
    absDiff,
    relDiff,
    absTol,
    relTol,
    reason,
  });
}
