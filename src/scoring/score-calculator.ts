import { ConfigError } from "../errors/errors.js";
import type { Finding, SeverityCounts } from "../scanner/types.js";
import { SEVERITY_ORDER, Severity } from "../taxonomy/types.js";
import type { ReadinessResult, ScoringOptions, ScoringOverrides } from "./types.js";
import {
  DEFAULT_READINESS_THRESHOLD,
  DEFAULT_SEVERITY_PENALTIES,
  MAX_SCORE,
} from "./weights.js";

export const DEFAULT_SCORING_OPTIONS: ScoringOptions = {
  penalties: DEFAULT_SEVERITY_PENALTIES,
  threshold: DEFAULT_READINESS_THRESHOLD,
};

/**
 * Merges overrides onto the defaults. Negative penalties and thresholds
 * outside [0, 100] are rejected so that adding a finding can never raise
 * the score.
 */
export function resolveScoringOptions(
  overrides: ScoringOverrides = {},
): ScoringOptions {
  const penalties: Record<Severity, number> = { ...DEFAULT_SEVERITY_PENALTIES };
  for (const severity of SEVERITY_ORDER) {
    const value = overrides.penalties?.[severity];
    if (value === undefined) {
      continue;
    }
    if (!Number.isFinite(value) || value < 0) {
      throw new ConfigError(
        `Penalty for ${severity} must be a non-negative number, got ${value}`,
      );
    }
    penalties[severity] = value;
  }

  const threshold = overrides.threshold ?? DEFAULT_READINESS_THRESHOLD;
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > MAX_SCORE) {
    throw new ConfigError(
      `Readiness threshold must be between 0 and ${MAX_SCORE}, got ${threshold}`,
    );
  }
  return { penalties, threshold };
}

export function countBySeverity(findings: readonly Finding[]): SeverityCounts {
  const tally: Record<Severity, number> = {
    [Severity.Critical]: 0,
    [Severity.High]: 0,
    [Severity.Medium]: 0,
    [Severity.Low]: 0,
    [Severity.Info]: 0,
  };
  for (const finding of findings) {
    tally[finding.severity] += 1;
  }
  return {
    critical: tally[Severity.Critical],
    high: tally[Severity.High],
    medium: tally[Severity.Medium],
    low: tally[Severity.Low],
    info: tally[Severity.Info],
    total: findings.length,
  };
}

export function calculateReadiness(
  findings: readonly Finding[],
  options: ScoringOptions = DEFAULT_SCORING_OPTIONS,
): ReadinessResult {
  let score = MAX_SCORE;
  for (const finding of findings) {
    score = clamp(score - options.penalties[finding.severity]);
  }

  const counts = countBySeverity(findings);
  const hasBlocking = counts.critical > 0 || counts.high > 0;
  return {
    score,
    isProductionReady: !hasBlocking && score >= options.threshold,
    counts,
  };
}

function clamp(score: number): number {
  return Math.min(Math.max(score, 0), MAX_SCORE);
}
