import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { createClaim, createEvidenceRef } from '../../claims/types.js';
import { makeTempDir, removeDir } from '../../test/fixtures.js';
import { evaluateCase, parseEvalCase, runEvaluation, writeEvaluationResult, type EvaluationOutputs } from '../harness.js';

const NOW = new Date(Date.UTC(2024, 0, 31, 9, 5, 7));

const HALF_ATTRIBUTED = [
  createClaim({
    id: 'rev_total',
    type: 'numeric',
    text: 'Revenue',
    value: 100,
    evidence: [createEvidenceRef({ sourceId: 'trial_balance.csv', locator: 'account=Revenue' })],
  }),
  createClaim({ id: 'profit_positive', type: 'textual', text: 'Profitable.' }),
];

const HOLD_OUTPUTS: Pick<EvaluationOutputs, 'evidence_coverage' | 'verification_status' | 'release_decision'> = {
  evidence_coverage: 0.5,
  verification_status: 'needs_review',
  release_decision: 'hold',
};

describe('parseEvalCase', () => {
  let dir: string | undefined;

  afterEach(async () => {
    await removeDir(dir);
    dir = undefined;
  });

  async function caseFile(name: string, content: string): Promise<string> {
    dir ??= await makeTempDir();
    const path = join(dir, name);
    await writeFile(path, content);
    return path;
  }

  it('returns a default case without a path', async () => {
    expect(await parseEvalCase()).toEqual({ name: 'default' });
  });

  it('reads a YAML case and normalizes scalar lists', async () => {
    const path = await caseFile(
      'smoke.yaml',
      [
        'name: smoke',
        'evidence_coverage_min: 0.0',
        'evidence_coverage_max: 0.5',
        'verification_status_in: [fail, needs_review]',
        'release_decision_in: hold',
        '',
      ].join('\n')
    );

    expect(await parseEvalCase(path)).toEqual({
      name: 'smoke',
      path,
      evidence_coverage_min: 0,
      evidence_coverage_max: 0.5,
      verification_status_in: ['fail', 'needs_review'],
      release_decision_in: ['hold'],
    });
  });

  it('reads a JSON case and names it after the file', async () => {
    const path = await caseFile('strict.json', JSON.stringify({ release_decision_in: ['proceed'] }));

    expect(await parseEvalCase(path)).toEqual({ name: 'strict', path, release_decision_in: ['proceed'] });
  });

  it('records a missing file as a parse error', async () => {
    const evalCase = await parseEvalCase('/nonexistent/praxis/missing.yaml');

    expect(evalCase.name).toBe('missing');
    expect(evalCase.parse_error?.startsWith('Case file not found: /nonexistent/praxis/missing.yaml')).toBe(true);
  });

  it('records malformed documents as parse errors', async () => {
    const broken = await parseEvalCase(await caseFile('broken.yaml', 'name: [unclosed\n'));
    const list = await parseEvalCase(await caseFile('list.yaml', '- a\n- b\n'));
    const badValue = await parseEvalCase(await caseFile('bad.yaml', 'evidence_coverage_min: high\n'));

    expect(broken.parse_error?.startsWith('Case parse failed: ')).toBe(true);
    expect(list.parse_error).toBe('Case root was not a mapping');
    expect(badValue.parse_error?.startsWith('Invalid case: evidence_coverage_min: ')).toBe(true);
  });
});

describe('evaluateCase', () => {
  it('passes when every stated expectation holds', () => {
    const evaluation = evaluateCase(
      {
        name: 'hold',
        evidence_coverage_min: 0,
        evidence_coverage_max: 0.5,
        verification_status_in: ['needs_review', 'fail', 'needs_review'],
        release_decision_in: ['hold'],
      },
      HOLD_OUTPUTS
    );

    expect(evaluation).toEqual({
      expectations: {
        evidence_coverage_min: 0,
        evidence_coverage_max: 0.5,
        verification_status_in: ['fail', 'needs_review'],
        release_decision_in: ['hold'],
      },
      verdicts: {
        evidence_coverage_min_ok: true,
        evidence_coverage_max_ok: true,
        verification_status_ok: true,
        release_decision_ok: true,
      },
      pass: true,
    });
  });

  it('fails when any verdict fails', () => {
    const evaluation = evaluateCase({ name: 'strict', release_decision_in: ['proceed'] }, HOLD_OUTPUTS);

    expect(evaluation.verdicts).toEqual({ release_decision_ok: false });
    expect(evaluation.pass).toBe(false);
  });

  it('fails coverage bounds when coverage is unknown', () => {
    const evaluation = evaluateCase(
      { name: 'empty', evidence_coverage_min: 0 },
      { evidence_coverage: null, verification_status: 'needs_review', release_decision: 'hold' }
    );

    expect(evaluation.verdicts.evidence_coverage_min_ok).toBe(false);
  });

  it('has no verdict without expectations', () => {
    expect(evaluateCase({ name: 'default' }, HOLD_OUTPUTS)).toEqual({ expectations: {}, verdicts: {}, pass: null });
  });

  it('never passes a case that failed to parse', () => {
    expect(evaluateCase({ name: 'broken', parse_error: 'Case root was not a mapping' }, HOLD_OUTPUTS).pass).toBe(false);
  });
});

describe('runEvaluation', () => {
  let dir: string | undefined;

  afterEach(async () => {
    await removeDir(dir);
    dir = undefined;
  });

  it('runs the gate and checks the case against its outputs', () => {
    const result = runEvaluation(
      { name: 'hold', verification_status_in: ['needs_review'], release_decision_in: ['hold'] },
      { claims: HALF_ATTRIBUTED, revision: 'abc1234', now: NOW }
    );

    expect(result.timestamp_utc).toBe('2024-01-31T09:05:07.000Z');
    expect(result.git_head).toBe('abc1234');
    expect(result.env.node).toBe(process.version);
    expect(result.outputs).toEqual({
      verification_status: 'needs_review',
      evidence_coverage: 0.5,
      summary: 'evidence_coverage=0.500 (1/2), threshold=1.0',
      checks: [
        { claim_id: 'rev_total', status: 'pass', reason: 'Evidence present.' },
        { claim_id: 'profit_positive', status: 'fail', reason: 'Missing evidence.' },
      ],
      release_decision: 'hold',
      release_reason: 'Verification incomplete; human review or additional evidence required.',
    });
    expect(result.pass).toBe(true);
  });

  it('honors the coverage threshold', () => {
    const result = runEvaluation(
      { name: 'lenient' },
      { claims: HALF_ATTRIBUTED, minAttributionCoverage: 0.5, revision: 'abc1234', now: NOW }
    );

    expect(result.outputs.release_decision).toBe('proceed');
    expect(result.pass).toBeNull();
  });

  it('writes the latest and timestamped result files', async () => {
    dir = await makeTempDir();
    const outDir = join(dir, 'eval');
    const result = runEvaluation({ name: 'default' }, { claims: HALF_ATTRIBUTED, revision: 'abc1234', now: NOW });

    const paths = await writeEvaluationResult(result, outDir, NOW);

    expect(paths).toEqual({ latestPath: join(outDir, 'latest.json'), runPath: join(outDir, 'run_20240131_090507.json') });
    const latest: unknown = JSON.parse(await readFile(paths.latestPath, 'utf8'));
    expect(latest).toEqual(JSON.parse(JSON.stringify(result)));
    expect(await readFile(paths.runPath, 'utf8')).toBe(await readFile(paths.latestPath, 'utf8'));
    expect((await readdir(outDir)).sort()).toEqual(['latest.json', 'run_20240131_090507.json']);
  });

  it('keeps the previous latest.json when the new one cannot land', async () => {
    dir = await makeTempDir();
    const outDir = join(dir, 'eval');
    await mkdir(join(outDir, 'latest.json'), { recursive: true });
    const result = runEvaluation({ name: 'default' }, { claims: HALF_ATTRIBUTED, revision: 'abc1234', now: NOW });

    await expect(writeEvaluationResult(result, outDir, NOW)).rejects.toThrow();

    expect((await readdir(outDir)).sort()).toEqual(['latest.json', 'run_20240131_090507.json']);
    expect(await readdir(join(outDir, 'latest.json'))).toEqual([]);
  });
});
