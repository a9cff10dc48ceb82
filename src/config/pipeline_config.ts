/**
 * @fileoverview Pipeline configuration
 *
 * The only module that reads environment variables. Everything downstream
 * receives the frozen PipelineConfig as a parameter.
 *
 * | Variable                         | Default       |
 * |----------------------------------|---------------|
 * | PRAXIS_DATASET_ROOT              | (none)        |
 * | PRAXIS_RUNS_DIR                  | praxis_runs   |
 * | PRAXIS_MIN_ATTRIBUTION_COVERAGE  | 1.0           |
 * | PRAXIS_NUMERIC_ABS_TOL           | 0.01          |
 * | PRAXIS_NUMERIC_REL_TOL           | 0.01          |
 * | PRAXIS_WRITE_ARTIFACTS           | true          |
 */

import { z } from 'zod';
import { DEFAULT_RUNS_DIR } from '../artifacts/run_artifact.js';
import { Errors } from '../core/errors.js';
import { DEFAULT_MIN_ATTRIBUTION_COVERAGE } from '../verification/evidence_presence.js';
import { DEFAULT_ABS_TOL, DEFAULT_REL_TOL } from '../verification/numeric_agreement.js';

export interface PipelineConfig {
  readonly datasetRoot: string | null;
  readonly runsDir: string;
  readonly minAttributionCoverage: number;
  readonly numericAbsTol: number;
  readonly numericRelTol: number;
  readonly writeArtifacts: boolean;
}

export type PipelineConfigOverrides = Partial<PipelineConfig>;

export const ENV_KEYS = {
  datasetRoot: 'PRAXIS_DATASET_ROOT',
  runsDir: 'PRAXIS_RUNS_DIR',
  minAttributionCoverage: 'PRAXIS_MIN_ATTRIBUTION_COVERAGE',
  numericAbsTol: 'PRAXIS_NUMERIC_ABS_TOL',
  numericRelTol: 'PRAXIS_NUMERIC_REL_TOL',
  writeArtifacts: 'PRAXIS_WRITE_ARTIFACTS',
} as const satisfies Record<keyof PipelineConfig, string>;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = Object.freeze({
  datasetRoot: null,
  runsDir: DEFAULT_RUNS_DIR,
  minAttributionCoverage: DEFAULT_MIN_ATTRIBUTION_COVERAGE,
  numericAbsTol: DEFAULT_ABS_TOL,
  numericRelTol: DEFAULT_REL_TOL,
  writeArtifacts: true,
});

const PipelineConfigSchema = z.object({
  datasetRoot: z.string().min(1).nullable(),
  runsDir: z.string().min(1),
  minAttributionCoverage: z.number().finite().gt(0).max(1),
  numericAbsTol: z.number().finite().min(0),
  numericRelTol: z.number().finite().min(0),
  writeArtifacts: z.boolean(),
});

type Env = Readonly<Record<string, string | undefined>>;

function readString(env: Env, key: string): string | undefined {
  const raw = env[key];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readNumber(env: Env, key: string): number | undefined {
  const raw = readString(env, key);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw Errors.config(key, `expected a number, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, key: string): boolean | undefined {
  const raw = readString(env, key);
  if (raw === undefined) return undefined;
  const lowered = raw.toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(lowered)) return true;
  if (['0', 'false', 'no', 'off'].includes(lowered)) return false;
  throw Errors.config(key, `expected a boolean, got "${raw}"`);
}

function fromEnv(env: Env): PipelineConfigOverrides {
  const overrides: { -readonly [K in keyof PipelineConfig]?: PipelineConfig[K] } = {};
  const datasetRoot = readString(env, ENV_KEYS.datasetRoot);
  if (datasetRoot !== undefined) overrides.datasetRoot = datasetRoot;
  const runsDir = readString(env, ENV_KEYS.runsDir);
  if (runsDir !== undefined) overrides.runsDir = runsDir;
  const minCoverage = readNumber(env, ENV_KEYS.minAttributionCoverage);
  if (minCoverage !== undefined) overrides.minAttributionCoverage = minCoverage;
  const absTol = readNumber(env, ENV_KEYS.numericAbsTol);
  if (absTol !== undefined) overrides.numericAbsTol = absTol;
  const relTol = readNumber(env, ENV_KEYS.numericRelTol);
  if (relTol !== undefined) overrides.numericRelTol = relTol;
  const writeArtifacts = readBoolean(env, ENV_KEYS.writeArtifacts);
  if (writeArtifacts !== undefined) overrides.writeArtifacts = writeArtifacts;
  return overrides;
}

function isConfigField(field: unknown): field is keyof PipelineConfig {
  return typeof field === 'string' && Object.hasOwn(ENV_KEYS, field);
}

/**
 * Explicit overrides (CLI flags, tests) win over the environment, which wins
 * over defaults. An undefined override falls through.
 */
export function resolvePipelineConfig(
  env: Env = process.env,
  overrides: PipelineConfigOverrides = {}
): PipelineConfig {
  const fromEnvironment = fromEnv(env);
  const defaults = DEFAULT_PIPELINE_CONFIG;
  const merged: PipelineConfig = {
    datasetRoot: overrides.datasetRoot ?? fromEnvironment.datasetRoot ?? defaults.datasetRoot,
    runsDir: overrides.runsDir ?? fromEnvironment.runsDir ?? defaults.runsDir,
    minAttributionCoverage:
      overrides.minAttributionCoverage ?? fromEnvironment.minAttributionCoverage ?? defaults.minAttributionCoverage,
    numericAbsTol: overrides.numericAbsTol ?? fromEnvironment.numericAbsTol ?? defaults.numericAbsTol,
    numericRelTol: overrides.numericRelTol ?? fromEnvironment.numericRelTol ?? defaults.numericRelTol,
    writeArtifacts: overrides.writeArtifacts ?? fromEnvironment.writeArtifacts ?? defaults.writeArtifacts,
  };

  const parsed = PipelineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path[0];
    const key = isConfigField(field) ? ENV_KEYS[field] : 'pipeline';
    throw Errors.config(key, issue?.message ?? 'invalid configuration');
  }
  return Object.freeze(parsed.data);
}
