/**
 * @fileoverview praxis-gate - claims verification and release gating
 *
 * Every claim an agent produces must point at evidence in the dataset it
 * was derived from. The gate measures attribution coverage, turns the
 * verification status into a release decision, and records each run as an
 * immutable artifact.
 *
 * ```typescript
 * import { resolvePipelineConfig, runPipeline } from 'praxis-gate';
 *
 * const config = resolvePipelineConfig(process.env, { datasetRoot: 'data/q3' });
 * const result = await runPipeline(config, { runSource: 'ci' });
 * if (result.release.decision !== 'proceed') process.exitCode = 2;
 * ```
 *
 * @packageDocumentation
 */

export { PRAXIS_VERSION } from './version.js';

export * from './claims/index.js';
export * from './evidence/index.js';
export * from './verification/index.js';
export * from './release/index.js';
export * from './artifacts/index.js';
export * from './config/index.js';
export * from './generator/index.js';
export * from './pipeline/index.js';
export * from './evaluation/index.js';

export {
  ArtifactWriteError,
  ConfigurationError,
  DatasetError,
  Errors,
  EvidenceNotFoundError,
  ExecutionError,
  NoNumericFieldError,
  ParseError,
  PraxisError,
  ValidationError,
  isDatasetError,
  isEvidenceMiss,
  isPraxisError,
  type ErrorJSON,
  type EvidenceMiss,
  type ExecutionFailureReason,
} from './core/errors.js';
export { Err, Ok, safeAsync, type Result } from './core/result.js';
export { isDebugLogging, setDebugLogging } from './telemetry/logger.js';
