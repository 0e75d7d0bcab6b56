import type { OperationalRiskCategory, Severity } from "../taxonomy/types.js";

export type EvidenceValue =
  | string
  | number
  | boolean
  | null
  | readonly EvidenceValue[]
  | { readonly [key: string]: EvidenceValue };

export type Evidence = Readonly<Record<string, EvidenceValue>>;

export interface Finding {
  readonly category: OperationalRiskCategory;
  readonly severity: Severity;
  readonly title: string;
  readonly description: string;
  readonly location?: string;
  readonly evidence?: Evidence;
  readonly provider: string;
  readonly remediation?: string;
  readonly rule_id?: string;
}

export interface SeverityCounts {
  readonly critical: number;
  readonly high: number;
  readonly medium: number;
  readonly low: number;
  readonly info: number;
  readonly total: number;
}

export type TargetKind = "tool" | "config";

export interface ScanResult {
  readonly target: string;
  readonly kind: TargetKind;
  readonly timestamp: string;
  readonly findings: readonly Finding[];
  readonly suppressed: readonly Finding[];
  readonly providers_used: readonly string[];
  readonly counts: SeverityCounts;
  readonly readiness_score: number;
  readonly is_production_ready: boolean;
}

/** A tool definition or server configuration as loaded from disk. */
export type TargetDocument = Readonly<Record<string, unknown>>;
