/**
 * @fileoverview Numeric agreement over a claim batch
 *
 * Layers checkNumericAgreement on top of evidence rows. This report is
 * informational: release gating stays on evidence presence alone, and the
 * pipeline records this report beside it in the run artifact.
 */

import type { Claim, EvidenceRef } from '../claims/types.js';
import { numericValueFromRow, type NumericField } from '../evidence/evidence_store.js';
import { formatFloat } from '../utils/math.js';
import {
  DEFAULT_ABS_TOL,
  DEFAULT_REL_TOL,
  checkNumericAgreement,
  type NumericAgreementResult,
} from './numeric_agreement.js';
import { MISSING_EVIDENCE_REASON } from './evidence_presence.js';
import { createVerificationReport, type ClaimCheck, type VerificationReport, type VerificationStatus } from './types.js';

export const NO_NUMERIC_CLAIMS_SUMMARY = 'No numeric claims to check.';
export const NO_NUMERIC_EVIDENCE_REASON = 'Evidence has no numeric value.';

export interface NumericClaimsOptions {
  absTol?: number;
  relTol?: number;
}

export interface NumericClaimOutcome {
  readonly check: ClaimCheck;
  /** null when there was nothing to compare against */
  readonly agreement: NumericAgreementResult | null;
  readonly evidence: EvidenceRef | null;
}

export interface NumericClaimsReport {
  readonly report: VerificationReport;
  readonly outcomes: readonly NumericClaimOutcome[];
}

function isCheckable(claim: Claim): claim is Claim & { value: number } {
  return claim.type === 'numeric' && claim.value !== null;
}

function firstNumericEvidence(claim: Claim): { evidence: EvidenceRef; numeric: NumericField } | null {
  for (const evidence of claim.evidence) {
    if (!evidence.dataRow) continue;
    const numeric = numericValueFromRow(evidence.dataRow);
    if (numeric) return { evidence, numeric };
  }
  return null;
}

function checkClaim(claim: Claim & { value: number }, absTol: number, relTol: number): NumericClaimOutcome {
  if (claim.evidence.length === 0) {
    return {
      check: { claimId: claim.id, status: 'fail', reason: MISSING_EVIDENCE_REASON },
      agreement: null,
      evidence: null,
    };
  }

  const resolved = firstNumericEvidence(claim);
  if (!resolved) {
    return {
      check: { claimId: claim.id, status: 'needs_review', reason: NO_NUMERIC_EVIDENCE_REASON },
      agreement: null,
      evidence: null,
    };
  }

  const agreement = checkNumericAgreement({
    claimValue: claim.value,
    evidenceValue: resolved.numeric.value,
    absTol,
    relTol,
  });
  const check: ClaimCheck = agreement.ok
    ? { claimId: claim.id, status: 'pass', reason: `Numeric agreement: ${agreement.reason}` }
    : { claimId: claim.id, status: 'fail', reason: `Numeric mismatch: ${agreement.reason}` };
  return { check, agreement, evidence: resolved.evidence };
}

function overallStatus(checks: readonly ClaimCheck[]): VerificationStatus {
  if (checks.some((check) => check.status === 'fail')) return 'fail';
  if (checks.some((check) => check.status === 'needs_review')) return 'needs_review';
  return 'pass';
}

export function verifyNumericClaims(
  claims: readonly Claim[],
  options: NumericClaimsOptions = {}
): NumericClaimsReport {
  const absTol = options.absTol ?? DEFAULT_ABS_TOL;
  const relTol = options.relTol ?? DEFAULT_REL_TOL;
  const checkable = claims.filter(isCheckable);

  if (checkable.length === 0) {
    return {
      report: createVerificationReport('needs_review', [], NO_NUMERIC_CLAIMS_SUMMARY),
      outcomes: [],
    };
  }

  const outcomes = checkable.map((claim) => checkClaim(claim, absTol, relTol));
  const checks = outcomes.map((outcome) => outcome.check);
  const agreeing = checks.filter((check) => check.status === 'pass').length;
  const summary =
    `numeric_agreement=${agreeing}/${checks.length}, ` +
    `abs_tol=${formatFloat(absTol)}, rel_tol=${formatFloat(relTol)}`;

  return {
    report: createVerificationReport(overallStatus(checks), checks, summary),
    outcomes,
  };
}
