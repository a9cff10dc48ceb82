/**
 * @fileoverview Evaluation module
 *
 * Metrics over claim batches, the case-file harness, and the bridge to an
 * external evaluation process.
 *
 * @packageDocumentation
 */

export {
  attributionCoverageMetric,
  numericAgreementMetric,
  placeholderFactscore,
  type EvalResult,
  type MetricClaim,
} from './metrics.js';

export { claimsToMetricShape } from './adapters.js';

export {
  evaluateCase,
  parseEvalCase,
  runEvaluation,
  writeEvaluationResult,
  type CaseEvaluation,
  type CaseExpectations,
  type CaseVerdicts,
  type EvalCase,
  type EvaluationOutputs,
  type EvaluationResult,
  type RunEvaluationOptions,
} from './harness.js';

export {
  DEFAULT_EXTERNAL_TIMEOUT_MS,
  runExternalMetrics,
  type ExternalMetrics,
  type ExternalMetricsOptions,
} from './external.js';
