import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "../../src/errors/errors.js";
import { loadTargetFile, parseTargetDocument } from "../../src/ingest/target-loader.js";

describe("parseTargetDocument", () => {
  it("parses JSON by default", () => {
    expect(parseTargetDocument('{"name":"search","timeout":30000}', "tool.json")).toEqual({
      name: "search",
      timeout: 30000,
    });
  });

  it("parses YAML by extension", () => {
    const yaml = "name: search\ninputSchema:\n  type: object\n";
    expect(parseTargetDocument(yaml, "tool.YML")).toEqual({
      name: "search",
      inputSchema: { type: "object" },
    });
  });

  it("rejects documents that are not objects", () => {
    expect(() => parseTargetDocument("[1, 2]", "tool.json")).toThrow(
      "tool.json must contain an object at the top level",
    );
    expect(() => parseTargetDocument("", "tool.yaml")).toThrow(
      "tool.yaml must contain an object at the top level",
    );
  });

  it("reports the syntax it expected", () => {
    expect(() => parseTargetDocument("{name:", "tool.json")).toThrow(/^tool\.json is not valid JSON: /);
    expect(() => parseTargetDocument("name: [", "tool.yaml")).toThrow(/^tool\.yaml is not valid YAML: /);
  });
});

describe("loadTargetFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "mcp-readiness-target-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("returns the resolved path with the document", async () => {
    const file = path.join(dir, "search.json");
    await fs.writeFile(file, '{"name":"search"}', "utf8");

    expect(await loadTargetFile(file)).toEqual({ path: file, document: { name: "search" } });
  });

  it("wraps read failures in a ConfigError", async () => {
    await expect(loadTargetFile(path.join(dir, "missing.json"))).rejects.toBeInstanceOf(ConfigError);
  });
});
