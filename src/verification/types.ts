/**
 * @fileoverview Verification verdict types
 */

export const VERIFICATION_STATUSES = ['pass', 'fail', 'needs_review'] as const;

export type VerificationStatus = (typeof VERIFICATION_STATUSES)[number];

export interface ClaimCheck {
  readonly claimId: string;
  readonly status: VerificationStatus;
  /** Stable vocabulary, e.g. "Evidence present." / "Missing evidence." */
  readonly reason: string;
}

/**
 * Structured, machine-consumable gate output.
 */
export interface VerificationReport {
  readonly status: VerificationStatus;
  readonly checks: readonly ClaimCheck[];
  readonly summary: string;
}

export interface ClaimCheckJSON {
  claim_id: string;
  status: VerificationStatus;
  reason: string;
}

export interface VerificationReportJSON {
  status: VerificationStatus;
  checks: ClaimCheckJSON[];
  summary: string;
}

export function isVerificationStatus(value: unknown): value is VerificationStatus {
  return typeof value === 'string' && (VERIFICATION_STATUSES as readonly string[]).includes(value);
}

export function createVerificationReport(
  status: VerificationStatus,
  checks: readonly ClaimCheck[],
  summary: string
): VerificationReport {
  return Object.freeze({
    status,
    checks: Object.freeze(checks.map((check) => Object.freeze({ ...check }))),
    summary,
  });
}

export function claimCheckToJSON(check: ClaimCheck): ClaimCheckJSON {
  return { claim_id: check.claimId, status: check.status, reason: check.reason };
}

export function verificationReportToJSON(report: VerificationReport): VerificationReportJSON {
  return {
    status: report.status,
    checks: report.checks.map(claimCheckToJSON),
    summary: report.summary,
  };
}
