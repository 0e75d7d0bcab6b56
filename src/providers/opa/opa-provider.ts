import { accessSync, constants, statSync } from "node:fs";
import path from "node:path";
import { createLogger, type Logger } from "../../logger/logger.js";
import { parseFinding } from "../../scanner/finding-factory.js";
import type { Finding, TargetDocument, TargetKind } from "../../scanner/types.js";
import type { AnalysisOptions, InspectionProvider } from "../types.js";
import { execFileRunner, type CommandRunner } from "./command-runner.js";

export const OPA_PROVIDER_NAME = "opa";
export const OPA_QUERY_PACKAGE = "data.mcp_readiness";

export interface OpaProviderOptions {
  /** Directory of user-supplied Rego policies. Unset means unavailable. */
  readonly policyDir?: string;
  readonly binary?: string;
  readonly runner?: CommandRunner;
  /** PATH lookup; replaced in tests. */
  readonly resolveBinary?: (binary: string) => string | undefined;
  readonly logger?: Logger;
}

/**
 * Evaluates user policies with the `opa` binary. Policies publish findings
 * under `data.mcp_readiness.<tool|config>.findings`; the document under
 * test is the policy input.
 */
export class OpaProvider implements InspectionProvider {
  readonly name = OPA_PROVIDER_NAME;
  readonly description = "Open Policy Agent evaluation of user-supplied Rego policies";

  private readonly policyDir?: string;
  private readonly binary: string;
  private readonly runner: CommandRunner;
  private readonly resolveBinary: (binary: string) => string | undefined;
  private readonly logger: Logger;

  constructor(options: OpaProviderOptions = {}) {
    this.policyDir = options.policyDir;
    this.binary = options.binary ?? "opa";
    this.runner = options.runner ?? execFileRunner;
    this.resolveBinary = options.resolveBinary ?? findExecutable;
    this.logger = options.logger ?? createLogger("[opa] ");
  }

  isAvailable(): boolean {
    if (!this.policyDir || !isDirectory(this.policyDir)) {
      return false;
    }
    return this.resolveBinary(this.binary) !== undefined;
  }

  analyzeTool(
    tool: TargetDocument,
    options?: AnalysisOptions,
  ): Promise<readonly Finding[]> {
    return this.evaluate("tool", tool, options);
  }

  analyzeConfig(
    config: TargetDocument,
    options?: AnalysisOptions,
  ): Promise<readonly Finding[]> {
    return this.evaluate("config", config, options);
  }

  private async evaluate(
    kind: TargetKind,
    target: TargetDocument,
    options: AnalysisOptions = {},
  ): Promise<readonly Finding[]> {
    if (!this.policyDir) {
      return [];
    }
    const query = `${OPA_QUERY_PACKAGE}.${kind}.findings`;
    const result = await this.runner(
      this.binary,
      ["eval", "--format", "json", "--stdin-input", "--data", this.policyDir, query],
      { input: JSON.stringify(target), signal: options.signal },
    );
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || `exit code ${result.exitCode}`;
      throw new Error(`opa eval failed: ${detail}`);
    }

    const findings: Finding[] = [];
    for (const value of extractValues(JSON.parse(result.stdout))) {
      const finding = parseFinding(value, this.name);
      if (finding) {
        findings.push(finding);
      } else {
        this.logger.warn(`dropping malformed finding from ${query}`);
      }
    }
    return findings;
  }
}

/** Values of the first expression of the first result; empty when undefined. */
function extractValues(output: unknown): unknown[] {
  if (!isRecord(output) || !Array.isArray(output.result)) {
    return [];
  }
  const [first] = output.result;
  if (!isRecord(first) || !Array.isArray(first.expressions)) {
    return [];
  }
  const [expression] = first.expressions;
  if (!isRecord(expression) || !Array.isArray(expression.value)) {
    return [];
  }
  return expression.value;
}

function isDirectory(dir: string): boolean {
  try {
    return statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

export function findExecutable(binary: string): string | undefined {
  const candidates = binary.includes(path.sep)
    ? [binary]
    : (process.env["PATH"] ?? "")
        .split(path.delimiter)
        .filter(Boolean)
        .map((dir) => path.join(dir, binary));
  return candidates.find((candidate) => {
    try {
      accessSync(candidate, constants.X_OK);
      return true;
    } catch {
      return false;
    }
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
