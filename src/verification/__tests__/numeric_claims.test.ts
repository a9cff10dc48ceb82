import { describe, expect, it } from 'vitest';
import { createClaim, createEvidenceRef, type Claim } from '../../claims/types.js';
import { verifyNumericClaims } from '../numeric_claims.js';

const revenueRow = createEvidenceRef({
  sourceId: 'trial_balance.csv',
  locator: 'account=Revenue',
  dataRow: { account: 'Revenue', amount: '100' },
});

function numericClaim(id: string, value: number | null, evidence = [revenueRow]): Claim {
  return createClaim({ id, type: 'numeric', text: id, value, unit: 'USD', evidence });
}

describe('verifyNumericClaims', () => {
  it('passes a claim that agrees with its evidence row', () => {
    const { report, outcomes } = verifyNumericClaims([numericClaim('rev', 100)]);

    expect(report.status).toBe('pass');
    expect(report.checks).toEqual([{ claimId: 'rev', status: 'pass', reason: 'Numeric agreement: abs_ok' }]);
    expect(report.summary).toBe('numeric_agreement=1/1, abs_tol=0.01, rel_tol=0.01');
    expect(outcomes[0]?.evidence).toBe(revenueRow);
    expect(outcomes[0]?.agreement?.evidenceValue).toBe(100);
  });

  it('fails a claim that disagrees', () => {
    const { report } = verifyNumericClaims([numericClaim('rev', 100), numericClaim('rev_high', 120)]);

    expect(report.status).toBe('fail');
    expect(report.checks[1]).toEqual({
      claimId: 'rev_high',
      status: 'fail',
      reason: 'Numeric mismatch: mismatch(abs_diff=20 > abs_tol=0.01, rel_diff=0.2 > rel_tol=0.01)',
    });
    expect(report.summary).toBe('numeric_agreement=1/2, abs_tol=0.01, rel_tol=0.01');
  });

  it('applies the given tolerances', () => {
    const { report } = verifyNumericClaims([numericClaim('rev', 120)], { absTol: 25, relTol: 0 });

    expect(report.status).toBe('pass');
    expect(report.summary).toBe('numeric_agreement=1/1, abs_tol=25.0, rel_tol=0.0');
  });

  it('fails a numeric claim without evidence', () => {
    const { report } = verifyNumericClaims([numericClaim('rev', 100, [])]);

    expect(report.checks).toEqual([{ claimId: 'rev', status: 'fail', reason: 'Missing evidence.' }]);
  });

  it('needs review when the evidence carries no numeric row', () => {
    const pointer = createEvidenceRef({ sourceId: 'memo.md', locator: 'page=1' });
    const { report } = verifyNumericClaims([numericClaim('rev', 100, [pointer])]);

    expect(report.status).toBe('needs_review');
    expect(report.checks[0]?.reason).toBe('Evidence has no numeric value.');
  });

  it('ignores textual claims and numeric claims without a value', () => {
    const textual = createClaim({ id: 'profit', type: 'textual', text: 'Profitable.', evidence: [revenueRow] });
    const { report, outcomes } = verifyNumericClaims([textual, numericClaim('blank', null)]);

    expect(report.status).toBe('needs_review');
    expect(report.summary).toBe('No numeric claims to check.');
    expect(outcomes).toEqual([]);
  });
});
