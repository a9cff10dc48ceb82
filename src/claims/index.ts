export {
  CLAIM_TYPES,
  createClaim,
  createEvidenceRef,
  hasEvidence,
  hashContent,
  hashRow,
  isClaimType,
  type Claim,
  type ClaimInit,
  type ClaimType,
  type DataRow,
  type EvidenceRef,
  type EvidenceRefInit,
} from './types.js';

export {
  CLAIM_SCHEMA_VERSION,
  ClaimBatchJSONSchema,
  ClaimJSONSchema,
  EvidenceRefJSONSchema,
  claimBatchFromJSON,
  claimFromJSON,
  claimToJSON,
  evidenceRefToJSON,
  type ClaimJSON,
  type EvidenceRefJSON,
} from './serialization.js';
