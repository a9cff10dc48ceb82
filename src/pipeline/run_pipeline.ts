/**
 * @fileoverview Verification pipeline entry point
 *
 * claims -> evidence-presence gate -> numeric agreement (informational)
 * -> release decision -> run artifact.
 *
 * The artifact stage runs last, after every decision is final, and cannot
 * change them: a failure there is logged and reported in the result.
 */

import { resolveGitRevision } from '../artifacts/git_revision.js';
import { buildRunArtifact, writeRunArtifact } from '../artifacts/run_artifact.js';
import type { Claim } from '../claims/types.js';
import type { PipelineConfig } from '../config/pipeline_config.js';
import { generateSampleClaims } from '../generator/dataset_claims.js';
import { decideRelease, type ReleaseOutcome } from '../release/decision.js';
import { logDebug, logInfo, logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { verifyEvidencePresence } from '../verification/evidence_presence.js';
import { verifyNumericClaims, type NumericClaimsReport } from '../verification/numeric_claims.js';
import { verificationReportToJSON, type VerificationReport } from '../verification/types.js';

export interface PipelineOptions {
  /** Label for the run artifact, e.g. `cli`, `harness`, `gui`. */
  runSource: string;
  /** Supplied claims; generated from the configured dataset when absent. */
  claims?: readonly Claim[];
  plannerOutput?: string | null;
  controllerOutput?: string | null;
  extra?: Record<string, unknown>;
  /** Skip the git lookup. */
  revision?: string;
  now?: Date;
  /** Repository used for the revision lookup. */
  cwd?: string;
}

export type ArtifactStatus =
  | { readonly written: true; readonly path: string }
  | { readonly written: false; readonly skipped: true }
  | { readonly written: false; readonly skipped: false; readonly error: string };

export interface PipelineResult {
  readonly claims: readonly Claim[];
  readonly verification: VerificationReport;
  readonly numeric: NumericClaimsReport;
  readonly release: ReleaseOutcome;
  readonly artifact: ArtifactStatus;
}

async function recordArtifact(
  config: PipelineConfig,
  options: PipelineOptions,
  claims: readonly Claim[],
  verification: VerificationReport,
  numeric: NumericClaimsReport,
  release: ReleaseOutcome
): Promise<ArtifactStatus> {
  try {
    const revision = options.revision ?? (await resolveGitRevision({ cwd: options.cwd }));
    const artifact = buildRunArtifact(
      {
        runSource: options.runSource,
        datasetRoot: config.datasetRoot,
        minAttributionCoverage: config.minAttributionCoverage,
        plannerOutput: options.plannerOutput,
        controllerOutput: options.controllerOutput,
        claims,
        verification,
        release,
        extra: {
          numeric_agreement: verificationReportToJSON(numeric.report),
          numeric_tolerances: { abs_tol: config.numericAbsTol, rel_tol: config.numericRelTol },
          ...options.extra,
        },
      },
      { revision, now: options.now }
    );
    const written = await writeRunArtifact(artifact, { runsDir: config.runsDir });
    if (!written.ok) {
      logWarning('Run artifact not written; release decision stands', written.error.toJSON().details);
      return { written: false, skipped: false, error: written.error.message };
    }
    logDebug('Run artifact written', { path: written.value });
    return { written: true, path: written.value };
  } catch (error) {
    const message = getErrorMessage(error);
    logWarning('Run artifact could not be built; release decision stands', { error: message });
    return { written: false, skipped: false, error: message };
  }
}

export async function runPipeline(config: PipelineConfig, options: PipelineOptions): Promise<PipelineResult> {
  const claims = options.claims ?? (await generateSampleClaims(config.datasetRoot));

  const verification = verifyEvidencePresence(claims, {
    minAttributionCoverage: config.minAttributionCoverage,
  });
  const numeric = verifyNumericClaims(claims, {
    absTol: config.numericAbsTol,
    relTol: config.numericRelTol,
  });
  const release = decideRelease(verification);

  logInfo('Verification complete', {
    status: verification.status,
    summary: verification.summary,
    decision: release.decision,
  });

  const artifact: ArtifactStatus = config.writeArtifacts
    ? await recordArtifact(config, options, claims, verification, numeric, release)
    : { written: false, skipped: true };

  return { claims, verification, numeric, release, artifact };
}
