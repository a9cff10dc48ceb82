export {
  runPipeline,
  type ArtifactStatus,
  type PipelineOptions,
  type PipelineResult,
} from './run_pipeline.js';
