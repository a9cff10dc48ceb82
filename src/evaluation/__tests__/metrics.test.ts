import { describe, expect, it } from 'vitest';
import { createClaim, createEvidenceRef } from '../../claims/types.js';
import { claimsToMetricShape } from '../adapters.js';
import { attributionCoverageMetric, numericAgreementMetric, placeholderFactscore } from '../metrics.js';

describe('numericAgreementMetric', () => {
  it('counts exact matches and lists missing items', () => {
    const result = numericAgreementMetric({ revenue: 100, cogs: 50, opex: 10 }, { revenue: 100, cogs: 51 });

    expect(result.name).toBe('numeric_agreement');
    expect(result.score).toBeCloseTo(1 / 3, 12);
    expect(result.details).toBe('matches=1/3, tolerance=0.0, missing=1 (opex)');
  });

  it('applies the tolerance', () => {
    const result = numericAgreementMetric({ revenue: 100, cogs: 50, opex: 10 }, { revenue: 100, cogs: 51 }, { tolerance: 1 });

    expect(result.score).toBeCloseTo(2 / 3, 12);
    expect(result.details).toBe('matches=2/3, tolerance=1.0, missing=1 (opex)');
  });

  it('truncates a long missing list', () => {
    const expected = Object.fromEntries(['k1', 'k2', 'k3', 'k4', 'k5', 'k6', 'k7'].map((key) => [key, 1]));

    const result = numericAgreementMetric(expected, {});

    expect(result.score).toBe(0);
    expect(result.details).toBe('matches=0/7, tolerance=0.0, missing=7 (k1, k2, k3, k4, k5...)');
  });

  it('has no score without expected items', () => {
    expect(numericAgreementMetric({}, { revenue: 1 })).toEqual({
      name: 'numeric_agreement',
      score: null,
      details: 'No expected items provided.',
    });
  });
});

describe('attributionCoverageMetric', () => {
  it('ignores blank evidence strings', () => {
    const result = attributionCoverageMetric([
      { text: 'a', evidence: ['trial_balance.csv:account=Revenue'] },
      { text: 'b', evidence: [] },
      { text: 'c', evidence: ['  '] },
    ]);

    expect(result.score).toBeCloseTo(1 / 3, 12);
    expect(result.details).toBe('covered=1/3, missing_indexes=[1, 2]');
  });

  it('has no score for an empty batch', () => {
    expect(attributionCoverageMetric([]).score).toBeNull();
  });

  it('accepts engine claims through the adapter', () => {
    const claims = [
      createClaim({
        id: 'rev_total',
        type: 'numeric',
        text: 'Revenue',
        value: 100,
        evidence: [createEvidenceRef({ sourceId: 'trial_balance.csv', locator: 'account=Revenue' })],
      }),
      createClaim({ id: 'profit_positive', type: 'textual', text: 'Profitable.' }),
    ];

    const shaped = claimsToMetricShape(claims);

    expect(shaped).toEqual([
      { text: 'Revenue', evidence: ['trial_balance.csv:account=Revenue'] },
      { text: 'Profitable.', evidence: [] },
    ]);
    expect(attributionCoverageMetric(shaped).details).toBe('covered=1/2, missing_indexes=[1]');
  });
});

describe('placeholderFactscore', () => {
  it('scores supported over total sentences', () => {
    expect(placeholderFactscore(3, 4)).toEqual({ name: 'factscore', score: 0.75, details: 'supported=3/4' });
    expect(placeholderFactscore(5, 4).score).toBe(1);
  });

  it('has no score without sentences', () => {
    expect(placeholderFactscore(1, 0)).toEqual({ name: 'factscore', score: null, details: 'total_sentences must be > 0.' });
  });
});
