import {
  OperationalRiskCategory,
  Severity,
  type CategoryInfo,
} from "./types.js";

/** Declared order doubles as the SARIF rule index. */
export const RISK_CATEGORIES: readonly OperationalRiskCategory[] = [
  OperationalRiskCategory.MissingTimeoutGuard,
  OperationalRiskCategory.UnsafeRetryLoop,
  OperationalRiskCategory.MissingErrorSchema,
  OperationalRiskCategory.OverloadedToolScope,
  OperationalRiskCategory.SilentFailurePath,
  OperationalRiskCategory.NonDeterministicResponse,
  OperationalRiskCategory.NoObservabilityHooks,
];

const CATEGORY_DESCRIPTIONS: Readonly<
  Record<OperationalRiskCategory, CategoryInfo>
> = {
  [OperationalRiskCategory.MissingTimeoutGuard]: {
    name: "Missing Timeout Guard",
    shortDescription: "Operation can block without an upper time bound",
    longDescription:
      "The tool or server does not declare a timeout, or declares one that is unusable. " +
      "Calls that depend on slow or unresponsive dependencies can hang an agent indefinitely " +
      "and hold connections, workers and context budget while they wait.",
    defaultSeverity: Severity.High,
    remediation:
      "Declare an explicit timeout (for example timeoutMs: 30000) and keep it well under five minutes.",
  },
  [OperationalRiskCategory.UnsafeRetryLoop]: {
    name: "Unsafe Retry Loop",
    shortDescription: "Retry behaviour can amplify failures",
    longDescription:
      "Retries are unbounded, excessive, missing a backoff strategy or missing a rate limit, " +
      "or the tool can invoke itself. Under an outage such tools multiply load on the failing " +
      "dependency and can loop without terminating.",
    defaultSeverity: Severity.Medium,
    remediation:
      "Bound retries (3-5), add exponential backoff with jitter, declare a rate limit and guard recursion with a depth limit.",
  },
  [OperationalRiskCategory.MissingErrorSchema]: {
    name: "Missing Error Schema",
    shortDescription: "Responses and failures have no declared structure",
    longDescription:
      "The tool does not describe the shape of its successful output or of its errors. " +
      "Agents then have to guess whether a call failed and why, which turns recoverable " +
      "errors into confused follow-up calls.",
    defaultSeverity: Severity.Medium,
    remediation:
      "Add outputSchema and errorSchema definitions; include a machine-readable error code.",
  },
  [OperationalRiskCategory.OverloadedToolScope]: {
    name: "Overloaded Tool Scope",
    shortDescription: "Tool purpose is vague, too broad or destructive",
    longDescription:
      "The description is missing, generic or claims many unrelated capabilities, or the tool " +
      "performs destructive operations. Agents select tools from their descriptions, so broad " +
      "or vague tools get called for the wrong task.",
    defaultSeverity: Severity.High,
    remediation:
      "Split the tool into focused tools with specific descriptions and add safeguards to destructive operations.",
  },
  [OperationalRiskCategory.SilentFailurePath]: {
    name: "Silent Failure Path",
    shortDescription: "Failures can go unnoticed",
    longDescription:
      "Inputs are not validated, resources are not released, authentication requirements are " +
      "undocumented, servers cannot start, or the tool admits to swallowing errors. These " +
      "paths fail without a signal the agent or operator can act on.",
    defaultSeverity: Severity.Medium,
    remediation:
      "Validate inputs, document cleanup and authentication, and surface every failure as a structured error.",
  },
  [OperationalRiskCategory.NonDeterministicResponse]: {
    name: "Non-Deterministic Response",
    shortDescription: "Repeated calls may not produce the same effect",
    longDescription:
      "The tool changes state but does not say whether it is idempotent. Retrying such a " +
      "call after a timeout can create duplicates or apply a change twice.",
    defaultSeverity: Severity.Low,
    remediation:
      "Document idempotency, set annotations.idempotentHint, or accept an idempotency key.",
  },
  [OperationalRiskCategory.NoObservabilityHooks]: {
    name: "No Observability Hooks",
    shortDescription: "Behaviour cannot be traced in production",
    longDescription:
      "The tool has no version, logging, metrics or tracing configuration, or handles " +
      "sensitive values that must be kept out of logs. Production incidents are then hard " +
      "to attribute and debug.",
    defaultSeverity: Severity.Low,
    remediation:
      "Version the tool, enable logging/metrics/tracing and keep secrets out of emitted telemetry.",
  },
};

export function getCategoryInfo(category: OperationalRiskCategory): CategoryInfo {
  return CATEGORY_DESCRIPTIONS[category];
}

export function isRiskCategory(
  value: unknown,
): value is OperationalRiskCategory {
  return RISK_CATEGORIES.some((category) => category === value);
}

export function categoryIndex(category: OperationalRiskCategory): number {
  return RISK_CATEGORIES.indexOf(category);
}
