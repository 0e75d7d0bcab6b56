import { describe, expect, it } from "vitest";
import {
  createFinding,
  isFinding,
  parseFinding,
} from "../../src/scanner/finding-factory.js";
import { OperationalRiskCategory, Severity } from "../../src/taxonomy/types.js";

describe("createFinding", () => {
  it("returns a frozen finding without undefined optional fields", () => {
    const finding = createFinding({
      category: OperationalRiskCategory.UnsafeRetryLoop,
      severity: Severity.Medium,
      title: "No retry limit configured",
      description: "desc",
      provider: "heuristic",
      location: undefined,
      rule_id: "HEUR-003",
    });

    expect(Object.isFrozen(finding)).toBe(true);
    expect(Object.keys(finding)).toEqual([
      "category",
      "severity",
      "title",
      "description",
      "provider",
      "rule_id",
    ]);
  });

  it("freezes evidence and copies arrays", () => {
    const fields = ["timeout", "timeoutMs"];
    const finding = createFinding({
      category: OperationalRiskCategory.MissingTimeoutGuard,
      severity: Severity.High,
      title: "t",
      description: "d",
      provider: "heuristic",
      evidence: { checked_fields: fields },
    });
    fields.push("changed");

    expect(Object.isFrozen(finding.evidence)).toBe(true);
    expect(finding.evidence?.checked_fields).toEqual(["timeout", "timeoutMs"]);
  });
});

describe("parseFinding", () => {
  it("rebuilds untrusted data and accepts ruleId spelling", () => {
    const finding = parseFinding(
      {
        category: "silent-failure-path",
        severity: "LOW",
        title: "Policy violation",
        description: "Tool lacks a fallback",
        ruleId: "POL-7",
        evidence: { nested: { ok: true }, dropped: () => 1 },
      },
      "opa",
    );

    expect(finding).toEqual({
      category: "silent-failure-path",
      severity: "low",
      title: "Policy violation",
      description: "Tool lacks a fallback",
      provider: "opa",
      evidence: { nested: { ok: true } },
      rule_id: "POL-7",
    });
  });

  it("keeps the finding's own provider name", () => {
    const finding = parseFinding(
      {
        category: "unsafe-retry-loop",
        severity: "high",
        title: "t",
        description: "d",
        provider: "custom",
      },
      "opa",
    );
    expect(finding?.provider).toBe("custom");
  });

  it("returns null for unknown categories, severities or missing text", () => {
    const base = { category: "unsafe-retry-loop", severity: "high", title: "t", description: "d" };
    expect(parseFinding({ ...base, category: "shell" }, "p")).toBeNull();
    expect(parseFinding({ ...base, severity: "severe" }, "p")).toBeNull();
    expect(parseFinding({ ...base, title: 3 }, "p")).toBeNull();
    expect(parseFinding("finding", "p")).toBeNull();
  });

  it("returns null for evidence that is present but not an object", () => {
    const base = { category: "unsafe-retry-loop", severity: "high", title: "t", description: "d" };
    expect(parseFinding({ ...base, evidence: null }, "p")).toBeNull();
    expect(parseFinding({ ...base, evidence: ["a"] }, "p")).toBeNull();
    expect(parseFinding(base, "p")).not.toHaveProperty("evidence");
  });

  it("rebuilds a frozen finding with an upper-case severity", () => {
    const frozen = Object.freeze({
      category: "unsafe-retry-loop",
      severity: "HIGH",
      title: "t",
      description: "d",
      provider: "plug",
    });
    expect(parseFinding(frozen, "p")?.severity).toBe("high");
  });
});

describe("isFinding", () => {
  it("requires provider and known enums", () => {
    const finding = {
      category: "unsafe-retry-loop",
      severity: "high",
      title: "t",
      description: "d",
      provider: "p",
    };
    expect(isFinding(finding)).toBe(true);
    expect(isFinding({ ...finding, provider: undefined })).toBe(false);
    expect(isFinding({ ...finding, severity: "urgent" })).toBe(false);
    expect(isFinding({ ...finding, severity: "HIGH" })).toBe(false);
  });
});
