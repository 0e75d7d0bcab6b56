import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  inputs: new Map<string, string>(),
  outputs: new Map<string, unknown>(),
  setFailed: vi.fn(),
  summary: new Array<string>(),
}));

vi.mock("@actions/core", () => ({
  getInput: (name: string) => mocks.inputs.get(name) ?? "",
  setOutput: (name: string, value: unknown) => {
    mocks.outputs.set(name, value);
  },
  setFailed: mocks.setFailed,
  summary: {
    addRaw(text: string) {
      mocks.summary.push(text);
      return this;
    },
    write: async () => undefined,
  },
}));

const { parseList, run } = await import("../../github-action/run.js");

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "mcp-readiness-action-"));
  mocks.inputs.clear();
  mocks.outputs.clear();
  mocks.summary.length = 0;
  mocks.setFailed.mockReset();
});

afterEach(async () => {
  await fs.rm(tempDir, { recursive: true, force: true });
});

async function writeTool(tool: Record<string, unknown>): Promise<string> {
  const file = path.join(tempDir, "tool.json");
  await fs.writeFile(file, JSON.stringify(tool), "utf8");
  return file;
}

describe("github action", () => {
  it("writes SARIF, sets outputs and fails a target that is not ready", async () => {
    const sarifFile = path.join(tempDir, "out.sarif");
    mocks.inputs.set("target", await writeTool({ name: "t", description: "A test tool", timeout: 30000 }));
    mocks.inputs.set("sarif-file", sarifFile);

    await run();

    expect(Object.fromEntries(mocks.outputs)).toEqual({
      "readiness-score": 57,
      "production-ready": false,
      "sarif-file": sarifFile,
    });
    const log: unknown = JSON.parse(await fs.readFile(sarifFile, "utf8"));
    expect(log).toMatchObject({ version: "2.1.0" });
    expect(mocks.summary[0]).toContain("Readiness Score: 57/100");
    expect(mocks.setFailed).toHaveBeenCalledTimes(1);
    expect(mocks.setFailed).toHaveBeenCalledWith(
      expect.stringContaining("is not production ready (score 57)"),
    );
  });

  it("passes when failing is disabled", async () => {
    mocks.inputs.set("target", await writeTool({}));
    mocks.inputs.set("sarif-file", path.join(tempDir, "out.sarif"));
    mocks.inputs.set("fail-on-not-ready", "false");
    mocks.inputs.set("ignore", "HEUR-001,\nHEUR-003");

    await run();

    expect(mocks.outputs.get("readiness-score")).toBe(71);
    expect(mocks.setFailed).not.toHaveBeenCalled();
  });

  it("reports invalid inputs through setFailed", async () => {
    mocks.inputs.set("target", await writeTool({}));
    mocks.inputs.set("kind", "server");

    await run();

    expect(mocks.setFailed).toHaveBeenCalledWith("Unsupported kind: server (expected tool|config)");
  });
});

describe("parseList", () => {
  it("splits on commas and newlines", () => {
    expect(parseList(" HEUR-001, HEUR-002\nHEUR-003\n\n")).toEqual(["HEUR-001", "HEUR-002", "HEUR-003"]);
    expect(parseList("")).toEqual([]);
  });
});
