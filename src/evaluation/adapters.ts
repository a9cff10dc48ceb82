import type { Claim } from '../claims/types.js';
import type { MetricClaim } from './metrics.js';

/**
 * Claims in the minimal shape the attribution metric consumes.
 */
export function claimsToMetricShape(claims: readonly Claim[]): MetricClaim[] {
  return claims.map((claim) => ({
    text: claim.text,
    evidence: claim.evidence.map((ref) => `${ref.sourceId}:${ref.locator}`),
  }));
}
