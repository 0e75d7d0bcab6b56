import type { Evidence, Finding, ScanResult, SeverityCounts } from "../scanner/types.js";
import {
  RISK_CATEGORIES,
  categoryIndex,
  getCategoryInfo,
} from "../taxonomy/registry.js";
import { Severity, parseSeverity } from "../taxonomy/types.js";
import { INFORMATION_URI, TOOL_NAME } from "./report-utils.js";
import type { RenderOptions } from "./types.js";

export const SARIF_VERSION = "2.1.0";
export const SARIF_SCHEMA =
  "https://raw.githubusercontent.com/oasis-tcs/sarif-spec/main/sarif-2.1/schema/sarif-schema-2.1.0.json";

export type SarifLevel = "error" | "warning" | "note" | "none";

export interface SarifRule {
  readonly id: string;
  readonly name: string;
  readonly shortDescription: { readonly text: string };
  readonly fullDescription: { readonly text: string };
  readonly helpUri: string;
  readonly help: { readonly text: string; readonly markdown: string };
  readonly defaultConfiguration: { readonly level: SarifLevel };
  readonly properties: {
    readonly tags: readonly string[];
    readonly "security-severity": string;
  };
}

export interface SarifLocation {
  readonly physicalLocation: {
    readonly artifactLocation: { readonly uri: string; readonly uriBaseId: string };
  };
  readonly logicalLocations: readonly { readonly name: string; readonly kind: string }[];
}

export interface SarifResult {
  readonly ruleId: string;
  readonly ruleIndex: number;
  readonly level: SarifLevel;
  readonly message: { readonly text: string };
  readonly locations: readonly SarifLocation[];
  readonly properties: {
    readonly provider: string;
    readonly severity: Severity;
    readonly ruleId?: string;
    readonly evidence?: Evidence;
  };
  readonly fixes?: readonly { readonly description: { readonly text: string } }[];
}

export interface SarifDriver {
  readonly name: string;
  readonly version: string;
  readonly informationUri?: string;
  readonly rules?: readonly SarifRule[];
  readonly properties?: { readonly tags: readonly string[] };
}

export interface SarifRunProperties {
  readonly readinessScore: number;
  readonly isProductionReady: boolean;
  readonly target?: string;
  readonly providersUsed?: readonly string[];
  readonly findingsCount?: number;
  readonly findingsBySeverity?: Omit<SeverityCounts, "total">;
}

export interface SarifRun {
  readonly tool: { readonly driver: SarifDriver };
  readonly results: readonly SarifResult[];
  readonly invocations?: readonly {
    readonly executionSuccessful: boolean;
    readonly endTimeUtc: string;
  }[];
  readonly properties: SarifRunProperties;
}

export interface SarifLog {
  readonly $schema?: string;
  readonly version: typeof SARIF_VERSION;
  readonly runs: readonly SarifRun[];
}

const SARIF_LEVELS: Readonly<Record<Severity, SarifLevel>> = {
  [Severity.Critical]: "error",
  [Severity.High]: "error",
  [Severity.Medium]: "warning",
  [Severity.Low]: "note",
  [Severity.Info]: "none",
};

/** GitHub code scanning buckets: >= 9.0 critical, >= 7.0 high, >= 4.0 medium, else low. */
const SECURITY_SEVERITY: Readonly<Record<Severity, string>> = {
  [Severity.Critical]: "9.5",
  [Severity.High]: "8.0",
  [Severity.Medium]: "5.5",
  [Severity.Low]: "3.0",
  [Severity.Info]: "0.0",
};

/** Unknown severities map to "warning". */
export function toSarifLevel(severity: unknown): SarifLevel {
  const parsed = parseSeverity(severity);
  return parsed ? SARIF_LEVELS[parsed] : "warning";
}

export function buildSarifLog(result: ScanResult, options: RenderOptions): SarifLog {
  return {
    $schema: SARIF_SCHEMA,
    version: SARIF_VERSION,
    runs: [
      {
        tool: {
          driver: {
            name: TOOL_NAME,
            version: options.toolVersion,
            informationUri: INFORMATION_URI,
            rules: buildRules(),
            properties: { tags: ["mcp", "operational-readiness", "agentic-ai"] },
          },
        },
        results: result.findings.map(buildResult),
        invocations: [{ executionSuccessful: true, endTimeUtc: result.timestamp }],
        properties: {
          readinessScore: result.readiness_score,
          isProductionReady: result.is_production_ready,
          target: result.target,
          providersUsed: result.providers_used,
        },
      },
    ],
  };
}

/** Status-only log for CI gates: no rules, no results. */
export function buildSarifSummary(result: ScanResult, options: RenderOptions): SarifLog {
  const { total, ...bySeverity } = result.counts;
  return {
    version: SARIF_VERSION,
    runs: [
      {
        tool: { driver: { name: TOOL_NAME, version: options.toolVersion } },
        results: [],
        properties: {
          readinessScore: result.readiness_score,
          isProductionReady: result.is_production_ready,
          findingsCount: total,
          findingsBySeverity: bySeverity,
        },
      },
    ],
  };
}

export function renderSarifReport(result: ScanResult, options: RenderOptions): string {
  return JSON.stringify(buildSarifLog(result, options), null, 2);
}

export function renderSarifSummary(result: ScanResult, options: RenderOptions): string {
  return JSON.stringify(buildSarifSummary(result, options), null, 2);
}

function buildRules(): SarifRule[] {
  return RISK_CATEGORIES.map((category) => {
    const info = getCategoryInfo(category);
    return {
      id: category,
      name: info.name,
      shortDescription: { text: info.shortDescription },
      fullDescription: { text: info.longDescription.trim().slice(0, 1000) },
      helpUri: `${INFORMATION_URI}/blob/main/docs/taxonomy.md#${category}`,
      help: { text: info.remediation, markdown: info.remediation },
      defaultConfiguration: { level: SARIF_LEVELS[info.defaultSeverity] },
      properties: {
        tags: ["operational-readiness", category],
        "security-severity": SECURITY_SEVERITY[info.defaultSeverity],
      },
    };
  });
}

function buildResult(finding: Finding): SarifResult {
  const locations: SarifLocation[] = finding.location
    ? [
        {
          physicalLocation: {
            artifactLocation: { uri: finding.location, uriBaseId: "%SRCROOT%" },
          },
          logicalLocations: [{ name: finding.location, kind: "object" }],
        },
      ]
    : [];

  return {
    ruleId: finding.category,
    ruleIndex: categoryIndex(finding.category),
    level: toSarifLevel(finding.severity),
    message: { text: `${finding.title}: ${finding.description}` },
    locations,
    properties: {
      provider: finding.provider,
      severity: finding.severity,
      ...(finding.rule_id ? { ruleId: finding.rule_id } : {}),
      ...(finding.evidence ? { evidence: finding.evidence } : {}),
    },
    ...(finding.remediation
      ? { fixes: [{ description: { text: finding.remediation } }] }
      : {}),
  };
}
