/**
 * @fileoverview Praxis configuration
 *
 * Environment lookups are collected in `pipeline_config.ts`; the engine
 * modules take thresholds and paths as parameters.
 */

export {
  DEFAULT_PIPELINE_CONFIG,
  ENV_KEYS,
  resolvePipelineConfig,
  type PipelineConfig,
  type PipelineConfigOverrides,
} from './pipeline_config.js';
