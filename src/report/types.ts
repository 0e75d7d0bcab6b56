import type {
  Finding,
  SeverityCounts,
  TargetKind,
} from "../scanner/types.js";

export interface ToolInfo {
  readonly name: "mcp-readiness-scanner";
  readonly version: string;
}

export type ReadinessLevel = "ready" | "needs-work" | "not-ready";

export interface SummaryInfo {
  readonly readiness_score: number;
  readonly is_production_ready: boolean;
  readonly readiness_level: ReadinessLevel;
  readonly counts: SeverityCounts;
  readonly suppressed: number;
}

export interface JsonReport {
  readonly tool: ToolInfo;
  readonly target: string;
  readonly kind: TargetKind;
  readonly timestamp: string;
  readonly providers_used: readonly string[];
  readonly summary: SummaryInfo;
  readonly findings: readonly Finding[];
  readonly suppressed: readonly Finding[];
}

export interface RenderOptions {
  readonly toolVersion: string;
}

export type ReportFormat = "json" | "md" | "sarif" | "sarif-summary";

export const REPORT_FORMATS: readonly ReportFormat[] = [
  "json",
  "md",
  "sarif",
  "sarif-summary",
];
