import { createFinding } from "../../src/scanner/finding-factory.js";
import type { ScanResult } from "../../src/scanner/types.js";
import { OperationalRiskCategory, Severity } from "../../src/taxonomy/types.js";

export const RATE_LIMIT_FINDING = createFinding({
  category: OperationalRiskCategory.UnsafeRetryLoop,
  severity: Severity.Low,
  title: "No rate limit configuration",
  description: "Tool 'search' does not specify rate limits.",
  provider: "heuristic",
  rule_id: "HEUR-013",
});

export const TIMEOUT_FINDING = createFinding({
  category: OperationalRiskCategory.MissingTimeoutGuard,
  severity: Severity.High,
  title: "No timeout configuration",
  description: "Tool 'search' does not specify a timeout.",
  location: "tool.search",
  evidence: { checked_fields: ["timeout", "timeoutMs"] },
  provider: "heuristic",
  remediation: "Add a timeout",
  rule_id: "HEUR-001",
});

export const VERSION_FINDING = createFinding({
  category: OperationalRiskCategory.NoObservabilityHooks,
  severity: Severity.Low,
  title: "No version information",
  description: "Tool 'search' does not specify a version.",
  provider: "heuristic",
  rule_id: "HEUR-014",
});

export function sampleResult(overrides: Partial<ScanResult> = {}): ScanResult {
  return {
    target: "tools/search.json",
    kind: "tool",
    timestamp: "2026-01-15T12:00:00.000Z",
    findings: [RATE_LIMIT_FINDING, TIMEOUT_FINDING],
    suppressed: [VERSION_FINDING],
    providers_used: ["heuristic"],
    counts: { critical: 0, high: 1, medium: 0, low: 1, info: 0, total: 2 },
    readiness_score: 82,
    is_production_ready: false,
    ...overrides,
  };
}

export const CLEAN_RESULT = sampleResult({
  findings: [],
  suppressed: [],
  counts: { critical: 0, high: 0, medium: 0, low: 0, info: 0, total: 0 },
  readiness_score: 100,
  is_production_ready: true,
});
