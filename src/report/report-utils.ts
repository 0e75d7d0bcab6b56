import type { Finding, ScanResult } from "../scanner/types.js";
import { compareSeverity } from "../taxonomy/types.js";
import type { ReadinessLevel } from "./types.js";

export const TOOL_NAME = "mcp-readiness-scanner";
export const INFORMATION_URI = "https://github.com/mcp-readiness/scanner";

export function readinessLevel(result: ScanResult): ReadinessLevel {
  if (result.is_production_ready) {
    return "ready";
  }
  if (result.counts.critical > 0 || result.counts.high > 0) {
    return "not-ready";
  }
  return "needs-work";
}

/** Highest severity first; ties keep merge order. */
export function sortFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort((a, b) => compareSeverity(a.severity, b.severity));
}
