export {
  DEFAULT_SCORING_OPTIONS,
  calculateReadiness,
  countBySeverity,
  resolveScoringOptions,
} from "./score-calculator.js";
export type {
  ReadinessResult,
  ScoringOptions,
  ScoringOverrides,
} from "./types.js";
export {
  DEFAULT_READINESS_THRESHOLD,
  DEFAULT_SEVERITY_PENALTIES,
  MAX_SCORE,
} from "./weights.js";
export type { SeverityPenalties } from "./weights.js";
