import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "../../src/errors/errors.js";
import { createFinding } from "../../src/scanner/finding-factory.js";
import type { Finding } from "../../src/scanner/types.js";
import {
  SuppressionManager,
  inlineRuleIds,
  loadIgnoreFile,
  parseIgnoreFile,
} from "../../src/suppression/suppression-manager.js";
import { OperationalRiskCategory, Severity } from "../../src/taxonomy/types.js";

function finding(ruleId?: string): Finding {
  return createFinding({
    category: OperationalRiskCategory.MissingTimeoutGuard,
    severity: Severity.High,
    title: "No timeout configuration",
    description: "Tool 'search' does not specify a timeout.",
    provider: "heuristic",
    rule_id: ruleId,
  });
}

describe("SuppressionManager", () => {
  it("suppresses rule ids from the command line and the ignore file", () => {
    const manager = new SuppressionManager({
      ignoreRules: ["HEUR-001"],
      fileRules: ["HEUR-013"],
    });
    expect(manager.isSuppressed(finding("HEUR-001"))).toBe(true);
    expect(manager.isSuppressed(finding("HEUR-013"))).toBe(true);
    expect(manager.isSuppressed(finding("HEUR-014"))).toBe(false);
  });

  it("never suppresses findings without a rule id", () => {
    const manager = new SuppressionManager({ ignoreRules: ["HEUR-001"] });
    expect(manager.isSuppressed(finding())).toBe(false);
  });

  it("matches rule ids exactly", () => {
    const manager = new SuppressionManager({ ignoreRules: [" heur-001 ", "HEUR-00"] });
    expect(manager.isSuppressed(finding("HEUR-001"))).toBe(false);
    expect([...manager.allSuppressedRules()]).toEqual(["heur-001", "HEUR-00"]);
  });

  it("honours inline ignores per target", () => {
    const manager = new SuppressionManager();
    const target = { name: "search", "mcp-readiness-ignore": ["HEUR-001", 7] };
    expect(manager.isSuppressed(finding("HEUR-001"), target)).toBe(true);
    expect(manager.isSuppressed(finding("HEUR-001"), { name: "other" })).toBe(false);
    expect(manager.isSuppressed(finding("HEUR-001"))).toBe(false);
  });

  it("partitions findings and keeps their order", () => {
    const manager = new SuppressionManager({ ignoreRules: ["HEUR-003"] });
    const findings = [finding("HEUR-001"), finding("HEUR-003"), finding("HEUR-006"), finding("HEUR-003")];

    const { active, suppressed } = manager.filterFindings(findings);

    expect(active.map((item) => item.rule_id)).toEqual(["HEUR-001", "HEUR-006"]);
    expect(suppressed.map((item) => item.rule_id)).toEqual(["HEUR-003", "HEUR-003"]);
    expect(active.length + suppressed.length).toBe(findings.length);
  });

  it("reports the union of configured rule ids", () => {
    const manager = new SuppressionManager({
      ignoreRules: ["HEUR-001", "HEUR-002"],
      fileRules: ["HEUR-002", "HEUR-003"],
    });
    expect([...manager.allSuppressedRules()]).toEqual(["HEUR-001", "HEUR-002", "HEUR-003"]);
  });
});

describe("inlineRuleIds", () => {
  it("ignores a field that is not a list", () => {
    expect(inlineRuleIds({ "mcp-readiness-ignore": "HEUR-001" })).toEqual([]);
    expect(inlineRuleIds({})).toEqual([]);
  });
});

describe("ignore files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "mcp-readiness-ignore-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("parses one rule per line, skipping comments and blanks", () => {
    expect(parseIgnoreFile("# accepted risks\nHEUR-001\r\n\n  HEUR-013  \n#HEUR-014\n")).toEqual([
      "HEUR-001",
      "HEUR-013",
    ]);
  });

  it("treats a missing file as empty", async () => {
    expect(await loadIgnoreFile(path.join(dir, ".mcp-readiness-ignore"))).toEqual([]);
  });

  it("loads rules through create()", async () => {
    const file = path.join(dir, ".mcp-readiness-ignore");
    await fs.writeFile(file, "HEUR-015\n", "utf8");

    const manager = await SuppressionManager.create({ ignoreRules: ["HEUR-001"], ignoreFile: file });

    expect([...manager.allSuppressedRules()]).toEqual(["HEUR-001", "HEUR-015"]);
  });

  it("raises a ConfigError for unreadable files", async () => {
    await expect(loadIgnoreFile(dir)).rejects.toBeInstanceOf(ConfigError);
  });
});
