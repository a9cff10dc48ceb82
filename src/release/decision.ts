/**
 * @fileoverview Release gate
 *
 * pass -> proceed, needs_review -> hold, anything else -> block.
 * A decision never feeds back into verification within the same run.
 */

import type { VerificationReport, VerificationStatus } from '../verification/types.js';

export const RELEASE_DECISIONS = ['proceed', 'hold', 'block'] as const;

export type ReleaseDecision = (typeof RELEASE_DECISIONS)[number];

export interface ReleaseOutcome {
  readonly decision: ReleaseDecision;
  readonly reason: string;
}

export interface ReleaseOutcomeJSON {
  decision: ReleaseDecision;
  reason: string;
}

export const RELEASE_REASONS: Readonly<Record<ReleaseDecision, string>> = Object.freeze({
  proceed: 'All verification gates passed.',
  hold: 'Verification incomplete; human review or additional evidence required.',
  block: 'Verification failed; release blocked.',
});

export function decisionForStatus(status: VerificationStatus | string): ReleaseDecision {
  if (status === 'pass') return 'proceed';
  if (status === 'needs_review') return 'hold';
  return 'block';
}

export function decideRelease(report: Pick<VerificationReport, 'status'>): ReleaseOutcome {
  const decision = decisionForStatus(report.status);
  return Object.freeze({ decision, reason: RELEASE_REASONS[decision] });
}

export function releaseOutcomeToJSON(outcome: ReleaseOutcome): ReleaseOutcomeJSON {
  return { decision: outcome.decision, reason: outcome.reason };
}

export function isReleaseDecision(value: unknown): value is ReleaseDecision {
  return typeof value === 'string' && (RELEASE_DECISIONS as readonly string[]).includes(value);
}
