import path from "node:path";
import * as core from "@actions/core";
import { loadVersion } from "../src/cli/runtime-paths.js";
import { exitCodeFor, parseNumberOption, runScanCommand } from "../src/cli/scan-command.js";
import { renderMarkdownReport } from "../src/report/markdown-reporter.js";
import type { TargetKind } from "../src/scanner/types.js";

export async function run(): Promise<void> {
  try {
    const target = core.getInput("target", { required: true });
    const kind = parseKind(core.getInput("kind") || "tool");
    const sarifFile = core.getInput("sarif-file") || "mcp-readiness.sarif";
    const thresholdInput = core.getInput("threshold");
    const failOnNotReady = core.getInput("fail-on-not-ready").toLowerCase() !== "false";
    const toolVersion = await loadVersion();

    const { result } = await runScanCommand(
      {
        kind,
        target,
        format: "sarif",
        out: sarifFile,
        ignore: parseList(core.getInput("ignore")),
        ignoreFile: core.getInput("ignore-file") || undefined,
        configPath: core.getInput("config") || undefined,
        threshold: thresholdInput
          ? parseNumberOption(thresholdInput, "threshold")
          : undefined,
      },
      toolVersion,
    );

    core.setOutput("readiness-score", result.readiness_score);
    core.setOutput("production-ready", result.is_production_ready);
    core.setOutput("sarif-file", path.resolve(sarifFile));
    await core.summary
      .addRaw(renderMarkdownReport(result, { showEvidence: false }))
      .write();

    if (exitCodeFor(result, failOnNotReady) !== 0) {
      core.setFailed(
        `${result.target} is not production ready (score ${result.readiness_score})`,
      );
    }
  } catch (error) {
    core.setFailed(error instanceof Error ? error.message : String(error));
  }
}

function parseKind(value: string): TargetKind {
  if (value === "tool" || value === "config") {
    return value;
  }
  throw new Error(`Unsupported kind: ${value} (expected tool|config)`);
}

/** Comma or newline separated. */
export function parseList(value: string): string[] {
  return value
    .split(/[\n,]/)
    .map((item) => item.trim())
    .filter(Boolean);
}
