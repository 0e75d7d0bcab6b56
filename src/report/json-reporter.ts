import type { ScanResult } from "../scanner/types.js";
import { readinessLevel, sortFindings, TOOL_NAME } from "./report-utils.js";
import type { JsonReport, RenderOptions } from "./types.js";

export function buildJsonReport(
  result: ScanResult,
  options: RenderOptions,
): JsonReport {
  return {
    tool: { name: TOOL_NAME, version: options.toolVersion },
    target: result.target,
    kind: result.kind,
    timestamp: result.timestamp,
    providers_used: result.providers_used,
    summary: {
      readiness_score: result.readiness_score,
      is_production_ready: result.is_production_ready,
      readiness_level: readinessLevel(result),
      counts: result.counts,
      suppressed: result.suppressed.length,
    },
    findings: sortFindings(result.findings),
    suppressed: result.suppressed,
  };
}

export function renderJsonReport(
  result: ScanResult,
  options: RenderOptions,
): string {
  return JSON.stringify(buildJsonReport(result, options), null, 2);
}
