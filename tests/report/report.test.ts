import { describe, expect, it } from "vitest";
import { buildJsonReport } from "../../src/report/json-reporter.js";
import { renderMarkdownReport } from "../../src/report/markdown-reporter.js";
import { renderReport } from "../../src/report/render.js";
import { readinessLevel, sortFindings } from "../../src/report/report-utils.js";
import { CLEAN_RESULT, RATE_LIMIT_FINDING, TIMEOUT_FINDING, sampleResult } from "./fixtures.js";

const OPTIONS = { toolVersion: "1.2.3" };

describe("report utils", () => {
  it("sorts by severity and keeps ties in order", () => {
    expect(sortFindings([RATE_LIMIT_FINDING, TIMEOUT_FINDING, RATE_LIMIT_FINDING])).toEqual([
      TIMEOUT_FINDING,
      RATE_LIMIT_FINDING,
      RATE_LIMIT_FINDING,
    ]);
  });

  it("derives the readiness level", () => {
    expect(readinessLevel(CLEAN_RESULT)).toBe("ready");
    expect(readinessLevel(sampleResult())).toBe("not-ready");
    expect(
      readinessLevel(
        sampleResult({
          counts: { critical: 0, high: 0, medium: 5, low: 0, info: 0, total: 5 },
          readiness_score: 65,
        }),
      ),
    ).toBe("needs-work");
  });
});

describe("json report", () => {
  it("summarizes the scan and sorts findings", () => {
    const report = buildJsonReport(sampleResult(), OPTIONS);

    expect(report.tool).toEqual({ name: "mcp-readiness-scanner", version: "1.2.3" });
    expect(report.summary).toEqual({
      readiness_score: 82,
      is_production_ready: false,
      readiness_level: "not-ready",
      counts: { critical: 0, high: 1, medium: 0, low: 1, info: 0, total: 2 },
      suppressed: 1,
    });
    expect(report.findings.map((finding) => finding.rule_id)).toEqual(["HEUR-001", "HEUR-013"]);
    expect(report.suppressed.map((finding) => finding.rule_id)).toEqual(["HEUR-014"]);
  });

  it("renders through renderReport", () => {
    const parsed: unknown = JSON.parse(renderReport(sampleResult(), "json", OPTIONS));
    expect(parsed).toMatchObject({ target: "tools/search.json", kind: "tool" });
  });
});

describe("markdown report", () => {
  it("renders the header box", () => {
    const lines = renderMarkdownReport(sampleResult()).split("\n");

    const row = (text: string): string => `| ${text.padEnd(32)} |`;

    expect(lines.slice(0, 7)).toEqual([
      `+${"-".repeat(34)}+`,
      row("MCP Readiness Report"),
      row("Readiness Score: 82/100"),
      row("Status: Not production ready"),
      "| Target: tools/search.json (tool) |",
      row("Providers: heuristic"),
      `+${"-".repeat(34)}+`,
    ]);
  });

  it("lists findings highest severity first with details", () => {
    const output = renderMarkdownReport(sampleResult());

    expect(output).toContain("#### [HIGH] HEUR-001: No timeout configuration");
    expect(output).toContain("Location: `tool.search`");
    expect(output).toContain("Remediation: Add a timeout");
    expect(output.indexOf("[HIGH]")).toBeLessThan(output.indexOf("[LOW]"));
    expect(output).not.toContain("```json");
    expect(output.split("\n").at(-1)).toBe("1 finding(s) suppressed: HEUR-014");
  });

  it("includes evidence on request", () => {
    const output = renderMarkdownReport(sampleResult(), { showEvidence: true });
    expect(output).toContain('```json\n{\n  "checked_fields": [\n    "timeout",\n    "timeoutMs"\n  ]\n}\n```');
  });

  it("limits the number of findings", () => {
    const output = renderMarkdownReport(sampleResult(), { maxFindings: 1 });
    expect(output).toContain("Showing 1 of 2 findings.");
    expect(output).not.toContain("HEUR-013");
  });

  it("says so when there are no findings", () => {
    const output = renderReport(CLEAN_RESULT, "md", OPTIONS);
    expect(output).toContain("| Status: Production ready");
    expect(output.split("\n").at(-1)).toBe("No findings detected.");
  });

  it("can omit the summary", () => {
    const output = renderMarkdownReport(sampleResult(), { showSummary: false });
    expect(output.startsWith("\n### Findings")).toBe(true);
  });
});
