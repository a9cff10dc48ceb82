export { UNKNOWN_REVISION, resolveGitRevision, sanitizeRevision, type GitRevisionOptions } from './git_revision.js';
export {
  DEFAULT_RUNS_DIR,
  LATEST_ARTIFACT_FILE,
  RUN_ARTIFACT_SCHEMA,
  RunArtifactSchema,
  buildRunArtifact,
  formatRunTimestamp,
  listRunArtifacts,
  parseRunArtifact,
  readLatestRunArtifact,
  readRunArtifact,
  runArtifactFileName,
  writeRunArtifact,
  type AgentOutputSnapshot,
  type ClaimSnapshot,
  type RunArtifact,
  type RunArtifactContext,
  type RunArtifactInput,
  type WriteRunArtifactOptions,
} from './run_artifact.js';
