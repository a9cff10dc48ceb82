/**
 * @fileoverview Run artifacts
 *
 * One immutable JSON record per pipeline run: inputs, agent text, claim
 * snapshots, verification report and release outcome. Written as
 * `run_<timestamp>_<rev>.json` plus an overwritten `latest.json` pointer.
 *
 * Writes never throw. A failed write comes back as an Err and leaves the
 * already-computed release decision untouched.
 */

import { mkdir, readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { CLAIM_SCHEMA_VERSION, claimToJSON, type ClaimJSON } from '../claims/serialization.js';
import { CLAIM_TYPES, type Claim } from '../claims/types.js';
import { Errors, type ArtifactWriteError } from '../core/errors.js';
import { Err, Ok, safeAsync, type Result } from '../core/result.js';
import { RELEASE_DECISIONS, releaseOutcomeToJSON, type ReleaseOutcome, type ReleaseOutcomeJSON } from '../release/decision.js';
import {
  VERIFICATION_STATUSES,
  verificationReportToJSON,
  type VerificationReport,
  type VerificationReportJSON,
} from '../verification/types.js';
import { writeFileAtomic } from '../utils/atomic_write.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { sanitizeRevision } from './git_revision.js';

export const RUN_ARTIFACT_SCHEMA = 'praxis.run_artifact.v1';
export const DEFAULT_RUNS_DIR = 'praxis_runs';
export const LATEST_ARTIFACT_FILE = 'latest.json';
const RUN_FILE_PATTERN = /^run_.+\.json$/;

// ============================================================================
// TYPES
// ============================================================================

export interface AgentOutputSnapshot {
  readonly enabled: boolean;
  readonly output: string;
  readonly output_len: number;
}

export interface ClaimSnapshot extends ClaimJSON {
  evidence_count: number;
}

export interface RunArtifact {
  readonly schema: typeof RUN_ARTIFACT_SCHEMA;
  /** UTC, `YYYYMMDD_HHMMSS` */
  readonly timestamp: string;
  readonly created_at: string;
  readonly git_rev: string;
  readonly run_source: string;
  readonly inputs: {
    readonly dataset_root: string | null;
    readonly min_attribution_coverage: number;
  };
  readonly planner: AgentOutputSnapshot;
  readonly controller: AgentOutputSnapshot;
  readonly claims: {
    readonly schema: string;
    readonly count: number;
    readonly items: readonly ClaimSnapshot[];
  };
  readonly verification: VerificationReportJSON;
  readonly release: ReleaseOutcomeJSON;
  readonly extra: Readonly<Record<string, unknown>>;
}

export interface RunArtifactInput {
  runSource: string;
  datasetRoot: string | null;
  minAttributionCoverage: number;
  /** null/undefined when the planner did not run */
  plannerOutput?: string | null;
  controllerOutput?: string | null;
  claims: readonly Claim[];
  verification: VerificationReport;
  release: ReleaseOutcome;
  extra?: Record<string, unknown>;
}

export interface RunArtifactContext {
  revision: string;
  now?: Date;
}

// ============================================================================
// BUILD
// ============================================================================

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatRunTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad2(date.getUTCMonth() + 1)}${pad2(date.getUTCDate())}_` +
    `${pad2(date.getUTCHours())}${pad2(date.getUTCMinutes())}${pad2(date.getUTCSeconds())}`
  );
}

function agentSnapshot(output: string | null | undefined): AgentOutputSnapshot {
  const text = output ?? '';
  return { enabled: output !== null && output !== undefined, output: text, output_len: text.length };
}

function claimSnapshot(claim: Claim): ClaimSnapshot {
  return { ...claimToJSON(claim), evidence_count: claim.evidence.length };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function buildRunArtifact(input: RunArtifactInput, context: RunArtifactContext): RunArtifact {
  const now = context.now ?? new Date();
  const artifact: RunArtifact = {
    schema: RUN_ARTIFACT_SCHEMA,
    timestamp: formatRunTimestamp(now),
    created_at: now.toISOString(),
    git_rev: sanitizeRevision(context.revision),
    run_source: input.runSource,
    inputs: {
      dataset_root: input.datasetRoot,
      min_attribution_coverage: input.minAttributionCoverage,
    },
    planner: agentSnapshot(input.plannerOutput),
    controller: agentSnapshot(input.controllerOutput),
    claims: {
      schema: CLAIM_SCHEMA_VERSION,
      count: input.claims.length,
      items: input.claims.map(claimSnapshot),
    },
    verification: verificationReportToJSON(input.verification),
    release: releaseOutcomeToJSON(input.release),
    extra: structuredClone(input.extra ?? {}),
  };
  return deepFreeze(artifact);
}

export function runArtifactFileName(artifact: Pick<RunArtifact, 'timestamp' | 'git_rev'>): string {
  return `run_${artifact.timestamp}_${sanitizeRevision(artifact.git_rev)}.json`;
}

// ============================================================================
// WRITE
// ============================================================================

export interface WriteRunArtifactOptions {
  runsDir?: string;
}

/**
 * Persist the artifact and repoint latest.json at it. The full document is
 * serialized before anything touches disk, and each file lands via rename,
 * so readers never see partial JSON.
 */
export async function writeRunArtifact(
  artifact: RunArtifact,
  options: WriteRunArtifactOptions = {}
): Promise<Result<string, ArtifactWriteError>> {
  const runsDir = options.runsDir ?? DEFAULT_RUNS_DIR;
  const path = join(runsDir, runArtifactFileName(artifact));

  let content: string;
  try {
    content = JSON.stringify(artifact, null, 2) + '\n';
  } catch (error) {
    return Err(Errors.artifactWrite(path, `serialization failed: ${getErrorMessage(error)}`, toError(error)));
  }

  const written = await safeAsync(async () => {
    await mkdir(runsDir, { recursive: true });
    await writeFileAtomic(path, content);
    await writeFileAtomic(join(runsDir, LATEST_ARTIFACT_FILE), content);
  });
  if (!written.ok) {
    return Err(Errors.artifactWrite(path, written.error.message, written.error));
  }
  return Ok(path);
}

// ============================================================================
// READ
// ============================================================================

const EvidenceSnapshotSchema = z.object({
  source_id: z.string(),
  locator: z.string(),
  content_hash: z.string().nullable(),
  snippet: z.string().nullable(),
  data_row: z.record(z.string()).nullable(),
});

const ClaimSnapshotSchema = z.object({
  id: z.string(),
  type: z.enum(CLAIM_TYPES),
  text: z.string(),
  value: z.number().nullable(),
  unit: z.string().nullable(),
  evidence: z.array(EvidenceSnapshotSchema),
  source_meta: z.record(z.unknown()),
  evidence_count: z.number().int().min(0),
});

const AgentOutputSchema = z.object({
  enabled: z.boolean(),
  output: z.string(),
  output_len: z.number().int().min(0),
});

export const RunArtifactSchema = z.object({
  schema: z.literal(RUN_ARTIFACT_SCHEMA),
  timestamp: z.string(),
  created_at: z.string(),
  git_rev: z.string(),
  run_source: z.string(),
  inputs: z.object({
    dataset_root: z.string().nullable(),
    min_attribution_coverage: z.number(),
  }),
  planner: AgentOutputSchema,
  controller: AgentOutputSchema,
  claims: z.object({
    schema: z.string(),
    count: z.number().int().min(0),
    items: z.array(ClaimSnapshotSchema),
  }),
  verification: z.object({
    status: z.enum(VERIFICATION_STATUSES),
    checks: z.array(
      z.object({
        claim_id: z.string(),
        status: z.enum(VERIFICATION_STATUSES),
        reason: z.string(),
      })
    ),
    summary: z.string(),
  }),
  release: z.object({
    decision: z.enum(RELEASE_DECISIONS),
    reason: z.string(),
  }),
  extra: z.record(z.unknown()),
});

export function parseRunArtifact(input: unknown, source = 'run artifact'): RunArtifact {
  const parsed = RunArtifactSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw Errors.parse('run artifact', issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid document', source);
  }
  return deepFreeze(parsed.data);
}

export async function readRunArtifact(path: string): Promise<Result<RunArtifact, Error>> {
  return safeAsync(async () => {
    const raw = await readFile(path, 'utf8');
    return parseRunArtifact(JSON.parse(raw), path);
  });
}

export async function readLatestRunArtifact(runsDir: string = DEFAULT_RUNS_DIR): Promise<Result<RunArtifact, Error>> {
  return readRunArtifact(join(runsDir, LATEST_ARTIFACT_FILE));
}

/**
 * Run file names in chronological order; an absent directory has no history.
 */
export async function listRunArtifacts(runsDir: string = DEFAULT_RUNS_DIR): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(runsDir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
  return entries.filter((name) => RUN_FILE_PATTERN.test(name)).sort();
}
