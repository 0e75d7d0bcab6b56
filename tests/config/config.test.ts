import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig } from "../../src/config/config-loader.js";
import { emptyConfig, validateConfig } from "../../src/config/config-validator.js";
import { ConfigError } from "../../src/errors/errors.js";

describe("validateConfig", () => {
  it("treats an empty document as the empty config", () => {
    expect(validateConfig(undefined, "test.yaml")).toEqual(emptyConfig());
    expect(validateConfig(null, "test.yaml")).toEqual(emptyConfig());
  });

  it("normalizes every supported field", () => {
    const config = validateConfig(
      {
        providerTimeoutMs: 5000,
        scoring: { threshold: 80, penalties: { HIGH: 20, low: 1 } },
        ignore: ["HEUR-013"],
        ignoreFile: "ops/ignore",
        plugins: { license: "./checks.js#LicenseProvider" },
        heuristic: { maxCapabilities: 5, minDescriptionLength: 30 },
        opa: { policyDir: "policies", binary: "opa-0.68" },
      },
      "test.yaml",
    );

    expect(config).toEqual({
      providerTimeoutMs: 5000,
      scoring: { threshold: 80, penalties: { high: 20, low: 1 } },
      ignore: ["HEUR-013"],
      ignoreFile: "ops/ignore",
      plugins: { license: "./checks.js#LicenseProvider" },
      heuristic: { maxCapabilities: 5, minDescriptionLength: 30 },
      opa: { policyDir: "policies", binary: "opa-0.68" },
    });
  });

  it("collects every problem into one error", () => {
    expect(() =>
      validateConfig(
        {
          providerTimeoutMs: 0,
          scoring: { threshold: 150, penalties: { severe: 5 } },
          ignore: "HEUR-001",
          extra: true,
        },
        "test.yaml",
      ),
    ).toThrow(
      "Invalid config test.yaml: config contains unsupported field 'extra'; " +
        "providerTimeoutMs must be a positive number; " +
        "scoring.threshold must be a number between 0 and 100; " +
        "scoring.penalties contains unknown severity 'severe'; " +
        "ignore must be a list of rule ids",
    );
  });

  it("rejects a document that is not a mapping", () => {
    expect(() => validateConfig(["a"], "test.yaml")).toThrow(
      "Invalid config test.yaml: config must be a mapping",
    );
  });

  it("rejects fractional heuristic limits and blank plugin specifiers", () => {
    expect(() =>
      validateConfig({ heuristic: { maxCapabilities: 2.5 }, plugins: { x: " " } }, "test.yaml"),
    ).toThrow(
      "Invalid config test.yaml: plugins.x must be a module specifier; " +
        "heuristic.maxCapabilities must be a non-negative integer",
    );
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "mcp-readiness-config-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("returns the empty config when no default file exists", async () => {
    expect(await loadConfig(undefined, dir)).toEqual({ config: emptyConfig(), baseDir: dir });
  });

  it("requires an explicitly named file", async () => {
    await expect(loadConfig("missing.yaml", dir)).rejects.toBeInstanceOf(ConfigError);
  });

  it("reads the default file and resolves paths against it", async () => {
    await fs.writeFile(
      path.join(dir, ".mcp-readiness.yaml"),
      "ignore:\n  - HEUR-013\nignoreFile: ops/ignore\nopa:\n  policyDir: policies\n",
      "utf8",
    );

    const loaded = await loadConfig(undefined, dir);

    expect(loaded.path).toBe(path.join(dir, ".mcp-readiness.yaml"));
    expect(loaded.baseDir).toBe(dir);
    expect(loaded.config.ignore).toEqual(["HEUR-013"]);
    expect(loaded.config.ignoreFile).toBe(path.join(dir, "ops", "ignore"));
    expect(loaded.config.opa.policyDir).toBe(path.join(dir, "policies"));
  });

  it("uses the directory of an explicit file as base", async () => {
    await fs.mkdir(path.join(dir, "ci"));
    await fs.writeFile(path.join(dir, "ci", "scanner.yml"), "scoring:\n  threshold: 90\n", "utf8");

    const loaded = await loadConfig("ci/scanner.yml", dir);

    expect(loaded.baseDir).toBe(path.join(dir, "ci"));
    expect(loaded.config.scoring.threshold).toBe(90);
  });

  it("reports invalid YAML as a ConfigError", async () => {
    await fs.writeFile(path.join(dir, ".mcp-readiness.yaml"), "ignore: [HEUR-001\n", "utf8");
    await expect(loadConfig(undefined, dir)).rejects.toThrow(/is not valid YAML/);
  });
});
