export {
  RELEASE_DECISIONS,
  RELEASE_REASONS,
  decideRelease,
  decisionForStatus,
  isReleaseDecision,
  releaseOutcomeToJSON,
  type ReleaseDecision,
  type ReleaseOutcome,
  type ReleaseOutcomeJSON,
} from './decision.js';
