import { describe, expect, it } from 'vitest';
import { VERIFICATION_STATUSES } from '../../verification/types.js';
import { RELEASE_REASONS, decideRelease, decisionForStatus, isReleaseDecision, releaseOutcomeToJSON } from '../decision.js';

describe('decideRelease', () => {
  it('maps each verification status to a fixed decision and reason', () => {
    expect(decideRelease({ status: 'pass' })).toEqual({ decision: 'proceed', reason: 'All verification gates passed.' });
    expect(decideRelease({ status: 'needs_review' })).toEqual({
      decision: 'hold',
      reason: 'Verification incomplete; human review or additional evidence required.',
    });
    expect(decideRelease({ status: 'fail' })).toEqual({ decision: 'block', reason: 'Verification failed; release blocked.' });
  });

  it('produces only the fixed decision and reason pairs', () => {
    const outcomes = VERIFICATION_STATUSES.map((status) => decideRelease({ status }));

    expect(new Set(outcomes.map((outcome) => outcome.decision)).size).toBe(3);
    for (const outcome of outcomes) {
      expect(outcome.reason).toBe(RELEASE_REASONS[outcome.decision]);
    }
  });

  it('blocks on an unrecognized status', () => {
    expect(decisionForStatus('unknown')).toBe('block');
  });

  it('serializes outcomes and recognizes decisions', () => {
    expect(releaseOutcomeToJSON(decideRelease({ status: 'pass' }))).toEqual({
      decision: 'proceed',
      reason: 'All verification gates passed.',
    });
    expect(isReleaseDecision('hold')).toBe(true);
    expect(isReleaseDecision('ship')).toBe(false);
  });
});
