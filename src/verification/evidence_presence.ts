/**
 * @fileoverview Evidence-presence gate
 *
 * Attribution coverage is the share of claims carrying at least one
 * evidence ref. The gate compares it with a threshold:
 * - coverage >= threshold => pass
 * - coverage == 0 => fail
 * - otherwise => needs_review
 *
 * An empty batch is needs_review ("nothing to certify"), not an error.
 *
 * The summary line is a parsing contract for downstream reporting:
 *   evidence_coverage=0.500 (1/2), threshold=1.0
 */

import { hasEvidence, type Claim } from '../claims/types.js';
import { formatFixed, formatFloat } from '../utils/math.js';
import { createVerificationReport, type ClaimCheck, type VerificationReport, type VerificationStatus } from './types.js';

export const DEFAULT_MIN_ATTRIBUTION_COVERAGE = 1.0;
export const EVIDENCE_PRESENT_REASON = 'Evidence present.';
export const MISSING_EVIDENCE_REASON = 'Missing evidence.';
export const NO_CLAIMS_SUMMARY = 'No claims provided.';

export interface EvidencePresenceOptions {
  minAttributionCoverage?: number;
}

export interface AttributionCoverage {
  withEvidence: number;
  total: number;
  /** null for an empty batch */
  coverage: number | null;
}

const COVERAGE_SUMMARY_PATTERN = /evidence_coverage\s*=\s*([0-9]*\.?[0-9]+)/;

export function computeAttributionCoverage(claims: readonly Claim[]): AttributionCoverage {
  const total = claims.length;
  const withEvidence = claims.filter(hasEvidence).length;
  return { withEvidence, total, coverage: total > 0 ? withEvidence / total : null };
}

export function formatCoverageSummary(coverage: number, withEvidence: number, total: number, threshold: number): string {
  return `evidence_coverage=${formatFixed(coverage, 3)} (${withEvidence}/${total}), threshold=${formatFloat(threshold)}`;
}

/**
 * Read the coverage fraction back out of a report summary.
 */
export function parseCoverageSummary(summary: string): number | null {
  const match = COVERAGE_SUMMARY_PATTERN.exec(summary);
  if (!match) return null;
  const value = Number(match[1]);
  return Number.isFinite(value) ? value : null;
}

function gateStatus(coverage: number, threshold: number): VerificationStatus {
  if (coverage >= threshold) return 'pass';
  if (coverage === 0) return 'fail';
  return 'needs_review';
}

export function verifyEvidencePresence(
  claims: readonly Claim[],
  options: EvidencePresenceOptions = {}
): VerificationReport {
  const threshold = options.minAttributionCoverage ?? DEFAULT_MIN_ATTRIBUTION_COVERAGE;
  const { withEvidence, total, coverage } = computeAttributionCoverage(claims);

  if (coverage === null) {
    return createVerificationReport('needs_review', [], NO_CLAIMS_SUMMARY);
  }

  const checks = claims.map((claim): ClaimCheck =>
    hasEvidence(claim)
      ? { claimId: claim.id, status: 'pass', reason: EVIDENCE_PRESENT_REASON }
      : { claimId: claim.id, status: 'fail', reason: MISSING_EVIDENCE_REASON }
  );

  return createVerificationReport(
    gateStatus(coverage, threshold),
    checks,
    formatCoverageSummary(coverage, withEvidence, total, threshold)
  );
}
