export const enum Severity {
  Critical = "critical",
  High = "high",
  Medium = "medium",
  Low = "low",
  Info = "info",
}

export const enum OperationalRiskCategory {
  MissingTimeoutGuard = "missing-timeout-guard",
  UnsafeRetryLoop = "unsafe-retry-loop",
  MissingErrorSchema = "missing-error-schema",
  OverloadedToolScope = "overloaded-tool-scope",
  SilentFailurePath = "silent-failure-path",
  NonDeterministicResponse = "non-deterministic-response",
  NoObservabilityHooks = "no-observability-hooks",
}

export interface CategoryInfo {
  readonly name: string;
  readonly shortDescription: string;
  readonly longDescription: string;
  readonly defaultSeverity: Severity;
  readonly remediation: string;
}

/** Highest first. */
export const SEVERITY_ORDER: readonly Severity[] = [
  Severity.Critical,
  Severity.High,
  Severity.Medium,
  Severity.Low,
  Severity.Info,
];

export function severityRank(severity: Severity): number {
  const index = SEVERITY_ORDER.indexOf(severity);
  return index < 0 ? SEVERITY_ORDER.length : index;
}

export function compareSeverity(a: Severity, b: Severity): number {
  return severityRank(a) - severityRank(b);
}

export function parseSeverity(value: unknown): Severity | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return SEVERITY_ORDER.find((severity) => severity === normalized);
}
