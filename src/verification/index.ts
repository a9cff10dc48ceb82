export {
  VERIFICATION_STATUSES,
  claimCheckToJSON,
  createVerificationReport,
  isVerificationStatus,
  verificationReportToJSON,
  type ClaimCheck,
  type ClaimCheckJSON,
  type VerificationReport,
  type VerificationReportJSON,
  type VerificationStatus,
} from './types.js';

export {
  DEFAULT_ABS_TOL,
  DEFAULT_REL_TOL,
  RELATIVE_SCALE_EPSILON,
  checkNumericAgreement,
  formatMismatchReason,
  type NumericAgreementInput,
  type NumericAgreementResult,
} from './numeric_agreement.js';

export {
  DEFAULT_MIN_ATTRIBUTION_COVERAGE,
  EVIDENCE_PRESENT_REASON,
  MISSING_EVIDENCE_REASON,
  NO_CLAIMS_SUMMARY,
  computeAttributionCoverage,
  formatCoverageSummary,
  parseCoverageSummary,
  verifyEvidencePresence,
  type AttributionCoverage,
  type EvidencePresenceOptions,
} from './evidence_presence.js';

export {
  NO_NUMERIC_CLAIMS_SUMMARY,
  NO_NUMERIC_EVIDENCE_REASON,
  verifyNumericClaims,
  type NumericClaimOutcome,
  type NumericClaimsOptions,
  type NumericClaimsReport,
} from './numeric_claims.js';
