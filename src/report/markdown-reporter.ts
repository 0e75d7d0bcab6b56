import type { Finding, ScanResult } from "../scanner/types.js";
import { readinessLevel, sortFindings } from "./report-utils.js";
import type { ReadinessLevel } from "./types.js";

export interface MarkdownRenderOptions {
  readonly showSummary?: boolean;
  readonly showFindings?: boolean;
  readonly maxFindings?: number;
  readonly showEvidence?: boolean;
  readonly titleWidth?: number;
}

export function renderMarkdownReport(
  result: ScanResult,
  options: MarkdownRenderOptions = {},
): string {
  const showSummary = options.showSummary ?? true;
  const showFindings = options.showFindings ?? true;
  const showEvidence = options.showEvidence ?? false;
  const titleWidth = options.titleWidth ?? 60;
  const lines: string[] = [];

  if (showSummary) {
    lines.push(renderHeaderBlock(result));
    lines.push("");
    lines.push(
      renderAsciiTable(
        [
          ["Critical", String(result.counts.critical)],
          ["High", String(result.counts.high)],
          ["Medium", String(result.counts.medium)],
          ["Low", String(result.counts.low)],
          ["Info", String(result.counts.info)],
        ],
        ["Severity", "Findings"],
      ),
    );
  }

  if (!showFindings) {
    return lines.join("\n");
  }

  const sorted = sortFindings(result.findings);
  const findings = applyFindingLimit(sorted, options.maxFindings);
  lines.push("");
  lines.push("### Findings");
  lines.push("");
  if (findings.length === 0) {
    lines.push("No findings detected.");
  } else {
    lines.push(
      renderAsciiTable(
        findings.map((finding) => [
          finding.severity,
          finding.rule_id ?? "-",
          finding.category,
          truncateText(finding.location ?? "-", 40),
          truncateText(finding.title, titleWidth),
        ]),
        ["Severity", "Rule", "Category", "Location", "Title"],
      ),
    );
    if (sorted.length > findings.length) {
      lines.push("");
      lines.push(
        `Showing ${findings.length} of ${sorted.length} findings.`,
      );
    }
    lines.push("");
    lines.push("### Details");
    for (const finding of findings) {
      lines.push("");
      lines.push(...renderFindingDetail(finding, showEvidence));
    }
  }

  if (result.suppressed.length > 0) {
    lines.push("");
    lines.push(
      `${result.suppressed.length} finding(s) suppressed: ${suppressedRuleIds(result).join(", ")}`,
    );
  }

  return lines.join("\n");
}

function renderHeaderBlock(result: ScanResult): string {
  return renderAsciiBox([
    "MCP Readiness Report",
    `Readiness Score: ${result.readiness_score}/100`,
    `Status: ${formatStatus(readinessLevel(result))}`,
    `Target: ${result.target} (${result.kind})`,
    `Providers: ${result.providers_used.join(", ") || "none"}`,
  ]);
}

function renderFindingDetail(finding: Finding, showEvidence: boolean): string[] {
  const heading = finding.rule_id
    ? `#### [${finding.severity.toUpperCase()}] ${finding.rule_id}: ${finding.title}`
    : `#### [${finding.severity.toUpperCase()}] ${finding.title}`;
  const lines = [heading, "", finding.description];
  if (finding.location) {
    lines.push("", `Location: \`${finding.location}\``);
  }
  if (finding.remediation) {
    lines.push("", `Remediation: ${finding.remediation}`);
  }
  if (showEvidence && finding.evidence) {
    lines.push("", "```json", JSON.stringify(finding.evidence, null, 2), "```");
  }
  return lines;
}

function renderAsciiBox(content: readonly string[]): string {
  const width = Math.max(...content.map((line) => line.length));
  const top = `+${"-".repeat(width + 2)}+`;
  const body = content.map((line) => {
    const padding = " ".repeat(width - line.length);
    return `| ${line}${padding} |`;
  });
  return [top, ...body, top].join("\n");
}

function renderAsciiTable(
  rows: readonly string[][],
  headers: readonly string[],
): string {
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => row[index]?.length ?? 0)),
  );
  const border = `+${widths.map((w) => "-".repeat(w + 2)).join("+")}+`;
  const headerLine = `| ${headers
    .map((header, index) => header.padEnd(widths[index] ?? 0))
    .join(" | ")} |`;
  const body = rows.map(
    (row) =>
      `| ${row
        .map((cell, index) => cell.padEnd(widths[index] ?? 0))
        .join(" | ")} |`,
  );
  return [border, headerLine, border, ...body, border].join("\n");
}

function suppressedRuleIds(result: ScanResult): string[] {
  const ids = result.suppressed.map((finding) => finding.rule_id ?? "-");
  return [...new Set(ids)];
}

function formatStatus(level: ReadinessLevel): string {
  switch (level) {
    case "ready":
      return "Production ready";
    case "needs-work":
      return "Needs work";
    default:
      return "Not production ready";
  }
}

function truncateText(input: string, max: number): string {
  if (input.length <= max) {
    return input;
  }
  return `${input.slice(0, Math.max(0, max - 3))}...`;
}

function applyFindingLimit<T>(items: readonly T[], limit?: number): T[] {
  if (!limit || limit <= 0) {
    return [...items];
  }
  return items.slice(0, limit);
}
