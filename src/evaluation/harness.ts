/**
 * @fileoverview Evaluation harness for the verification gate
 *
 * A case file (YAML or JSON) states what a run must produce:
 *
 * ```yaml
 * name: smoke
 * evidence_coverage_min: 0.0
 * evidence_coverage_max: 0.5
 * verification_status_in: [fail, needs_review]
 * release_decision_in: [hold, block]
 * ```
 *
 * The harness runs the engine, checks each stated expectation and writes
 * the result document next to its predecessors.
 *
 * @packageDocumentation
 */

import { mkdir, readFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import type { Claim } from '../claims/types.js';
import { formatRunTimestamp } from '../artifacts/run_artifact.js';
import { decideRelease } from '../release/decision.js';
import { writeFileAtomic } from '../utils/atomic_write.js';
import { getErrorMessage } from '../utils/errors.js';
import { parseCoverageSummary, verifyEvidencePresence } from '../verification/evidence_presence.js';
import { claimCheckToJSON, type ClaimCheckJSON } from '../verification/types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface EvalCase {
  name: string;
  path?: string;
  /** Set when the case file is missing or malformed; such a case never passes. */
  parse_error?: string;
  evidence_coverage_min?: number;
  evidence_coverage_max?: number;
  verification_status_in?: string[];
  release_decision_in?: string[];
}

export interface EvaluationOutputs {
  verification_status: string | null;
  evidence_coverage: number | null;
  summary: string | null;
  checks: ClaimCheckJSON[];
  release_decision: string | null;
  release_reason: string | null;
}

export interface CaseExpectations {
  evidence_coverage_min?: number;
  evidence_coverage_max?: number;
  verification_status_in?: string[];
  release_decision_in?: string[];
}

export interface CaseVerdicts {
  evidence_coverage_min_ok?: boolean;
  evidence_coverage_max_ok?: boolean;
  verification_status_ok?: boolean;
  release_decision_ok?: boolean;
}

export interface CaseEvaluation {
  expectations: CaseExpectations;
  verdicts: CaseVerdicts;
  /** null when the case states no expectations */
  pass: boolean | null;
}

export interface EvaluationResult extends CaseEvaluation {
  case: EvalCase;
  timestamp_utc: string;
  git_head: string;
  env: { node: string; platform: string; cwd: string };
  outputs: EvaluationOutputs;
}

// ============================================================================
// CASE PARSING
// ============================================================================

const StringListSchema = z.union([
  z.array(z.union([z.string(), z.number()])).transform((items) => items.map((item) => String(item).trim())),
  z.string().transform((item) => [item.trim()]),
]);

const CaseFileSchema = z.object({
  name: z.union([z.string(), z.number()]).transform(String).optional(),
  evidence_coverage_min: z.coerce.number().finite().optional(),
  evidence_coverage_max: z.coerce.number().finite().optional(),
  verification_status_in: StringListSchema.optional(),
  release_decision_in: StringListSchema.optional(),
});

function caseName(path: string): string {
  return basename(path, extname(path));
}

/**
 * Read a case file. Problems with the file are recorded on the case as
 * `parse_error` rather than thrown, so one broken case does not abort a
 * batch.
 */
export async function parseEvalCase(path?: string | null): Promise<EvalCase> {
  if (!path) {
    return { name: 'default' };
  }

  const base: EvalCase = { name: caseName(path), path };

  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    return { ...base, parse_error: `Case file not found: ${path} (${getErrorMessage(error)})` };
  }

  let document: unknown;
  try {
    document = YAML.parse(text);
  } catch (error) {
    return { ...base, parse_error: `Case parse failed: ${getErrorMessage(error)}` };
  }

  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    return { ...base, parse_error: 'Case root was not a mapping' };
  }

  const parsed = CaseFileSchema.safeParse(document);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ...base, parse_error: `Invalid case: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown'}` };
  }

  const { name, ...expectations } = parsed.data;
  return { ...base, ...expectations, name: name ?? base.name };
}

// ============================================================================
// EXPECTATIONS
// ============================================================================

export function evaluateCase(
  evalCase: EvalCase,
  outputs: Pick<EvaluationOutputs, 'evidence_coverage' | 'verification_status' | 'release_decision'>
): CaseEvaluation {
  const expectations: CaseExpectations = {};
  const verdicts: CaseVerdicts = {};
  const coverage = outputs.evidence_coverage;

  if (evalCase.evidence_coverage_min !== undefined) {
    expectations.evidence_coverage_min = evalCase.evidence_coverage_min;
    verdicts.evidence_coverage_min_ok = coverage !== null && coverage >= evalCase.evidence_coverage_min;
  }
  if (evalCase.evidence_coverage_max !== undefined) {
    expectations.evidence_coverage_max = evalCase.evidence_coverage_max;
    verdicts.evidence_coverage_max_ok = coverage !== null && coverage <= evalCase.evidence_coverage_max;
  }
  if (evalCase.verification_status_in !== undefined) {
    const allowed = [...new Set(evalCase.verification_status_in)].sort();
    expectations.verification_status_in = allowed;
    verdicts.verification_status_ok =
      outputs.verification_status !== null && allowed.includes(outputs.verification_status);
  }
  if (evalCase.release_decision_in !== undefined) {
    const allowed = [...new Set(evalCase.release_decision_in)].sort();
    expectations.release_decision_in = allowed;
    verdicts.release_decision_ok = outputs.release_decision !== null && allowed.includes(outputs.release_decision);
  }

  if (evalCase.parse_error !== undefined) {
    return { expectations, verdicts, pass: false };
  }
  const outcomes = Object.values(verdicts);
  return { expectations, verdicts, pass: outcomes.length > 0 ? outcomes.every(Boolean) : null };
}

// ============================================================================
// RUN
// ============================================================================

export interface RunEvaluationOptions {
  claims: readonly Claim[];
  minAttributionCoverage?: number;
  revision: string;
  now?: Date;
}

export function runEvaluation(evalCase: EvalCase, options: RunEvaluationOptions): EvaluationResult {
  const verification = verifyEvidencePresence(options.claims, {
    minAttributionCoverage: options.minAttributionCoverage,
  });
  const release = decideRelease(verification);

  const outputs: EvaluationOutputs = {
    verification_status: verification.status,
    evidence_coverage: parseCoverageSummary(verification.summary),
    summary: verification.summary,
    checks: verification.checks.map(claimCheckToJSON),
    release_decision: release.decision,
    release_reason: release.reason,
  };

  return {
    case: evalCase,
    timestamp_utc: (options.now ?? new Date()).toISOString(),
    git_head: options.revision,
    env: { node: process.version, platform: process.platform, cwd: process.cwd() },
    outputs,
    ...evaluateCase(evalCase, outputs),
  };
}

/**
 * Write a timestamped result under `outDir`, then repoint `latest.json` at
 * the same document. Both files land via rename.
 */
export async function writeEvaluationResult(
  result: EvaluationResult,
  outDir: string,
  now: Date = new Date()
): Promise<{ latestPath: string; runPath: string }> {
  await mkdir(outDir, { recursive: true });
  const content = JSON.stringify(result, null, 2) + '\n';
  const latestPath = join(outDir, 'latest.json');
  const runPath = join(outDir, `run_${formatRunTimestamp(now)}.json`);
  await writeFileAtomic(runPath, content);
  await writeFileAtomic(latestPath, content);
  return { latestPath, runPath };
}
