import { isRiskCategory } from "../taxonomy/registry.js";
import { parseSeverity } from "../taxonomy/types.js";
import type { Evidence, EvidenceValue, Finding } from "./types.js";

export function createFinding(input: Finding): Finding {
  if (!isRiskCategory(input.category)) {
    throw new Error(`Unknown risk category: ${String(input.category)}`);
  }
  const severity = parseSeverity(input.severity);
  if (!severity) {
    throw new Error(`Unknown severity: ${String(input.severity)}`);
  }

  const finding: {
    -readonly [K in keyof Finding]: Finding[K];
  } = {
    category: input.category,
    severity,
    title: input.title,
    description: input.description,
    provider: input.provider,
  };
  if (input.location !== undefined) {
    finding.location = input.location;
  }
  if (input.evidence !== undefined) {
    finding.evidence = freezeEvidence(input.evidence);
  }
  if (input.remediation !== undefined) {
    finding.remediation = input.remediation;
  }
  if (input.rule_id !== undefined) {
    finding.rule_id = input.rule_id;
  }
  return Object.freeze(finding);
}

/**
 * Rebuilds a finding from untrusted data (plugin output, subprocess JSON).
 * Severity spelling is normalised. Returns null when the shape cannot be a
 * finding, including evidence that is present but not an object.
 */
export function parseFinding(value: unknown, provider: string): Finding | null {
  if (!isRecord(value)) {
    return null;
  }
  const severity = parseSeverity(value.severity);
  const category = value.category;
  if (!severity || !isRiskCategory(category)) {
    return null;
  }
  if (typeof value.title !== "string" || typeof value.description !== "string") {
    return null;
  }

  const evidence = toEvidence(value.evidence);
  if (value.evidence !== undefined && !evidence) {
    return null;
  }
  return createFinding({
    category,
    severity,
    title: value.title,
    description: value.description,
    provider:
      typeof value.provider === "string" && value.provider
        ? value.provider
        : provider,
    location: optionalString(value.location),
    evidence: evidence ?? undefined,
    remediation: optionalString(value.remediation),
    rule_id: optionalString(value.rule_id) ?? optionalString(value.ruleId),
  });
}

export function isFinding(value: unknown): value is Finding {
  if (!isRecord(value)) {
    return false;
  }
  return (
    isRiskCategory(value.category) &&
    parseSeverity(value.severity) === value.severity &&
    typeof value.title === "string" &&
    typeof value.description === "string" &&
    typeof value.provider === "string"
  );
}

function freezeEvidence(evidence: Evidence): Evidence {
  const copy: Record<string, EvidenceValue> = {};
  for (const [key, value] of Object.entries(evidence)) {
    copy[key] = Array.isArray(value) ? Object.freeze([...value]) : value;
  }
  return Object.freeze(copy);
}

function toEvidence(value: unknown): Evidence | null {
  if (!isRecord(value)) {
    return null;
  }
  const evidence: Record<string, EvidenceValue> = {};
  for (const [key, entry] of Object.entries(value)) {
    const converted = toEvidenceValue(entry);
    if (converted !== undefined) {
      evidence[key] = converted;
    }
  }
  return evidence;
}

function toEvidenceValue(value: unknown): EvidenceValue | undefined {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    const items: EvidenceValue[] = [];
    for (const item of value) {
      const converted = toEvidenceValue(item);
      if (converted !== undefined) {
        items.push(converted);
      }
    }
    return items;
  }
  if (isRecord(value)) {
    return toEvidence(value) ?? undefined;
  }
  return undefined;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
