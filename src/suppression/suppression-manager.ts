import { readFile } from "node:fs/promises";
import { ConfigError, errorMessage, isNodeError } from "../errors/errors.js";
import type { Finding, TargetDocument } from "../scanner/types.js";

export const DEFAULT_IGNORE_FILE = ".mcp-readiness-ignore";
/** Target field listing rule ids to suppress for that target only. */
export const INLINE_IGNORE_FIELD = "mcp-readiness-ignore";

export interface SuppressionOptions {
  /** Rule ids from `--ignore`. */
  readonly ignoreRules?: Iterable<string>;
  /** Rule ids read from an ignore file. */
  readonly fileRules?: Iterable<string>;
}

export interface FilteredFindings {
  readonly active: readonly Finding[];
  readonly suppressed: readonly Finding[];
}

/**
 * Partitions findings by rule id. The CLI and ignore-file sets are fixed at
 * construction; inline ids are read from the target on every call.
 * Findings without a rule id are never suppressed.
 */
export class SuppressionManager {
  private readonly cliRules: ReadonlySet<string>;
  private readonly fileRules: ReadonlySet<string>;

  constructor(options: SuppressionOptions = {}) {
    this.cliRules = new Set(normalizeRuleIds(options.ignoreRules ?? []));
    this.fileRules = new Set(normalizeRuleIds(options.fileRules ?? []));
  }

  static async create(options: {
    ignoreRules?: Iterable<string>;
    ignoreFile?: string;
  }): Promise<SuppressionManager> {
    const fileRules = options.ignoreFile
      ? await loadIgnoreFile(options.ignoreFile)
      : [];
    return new SuppressionManager({ ignoreRules: options.ignoreRules, fileRules });
  }

  isSuppressed(finding: Finding, target?: TargetDocument): boolean {
    const ruleId = finding.rule_id;
    if (!ruleId) {
      return false;
    }
    if (this.cliRules.has(ruleId) || this.fileRules.has(ruleId)) {
      return true;
    }
    return target !== undefined && inlineRuleIds(target).includes(ruleId);
  }

  filterFindings(
    findings: readonly Finding[],
    target?: TargetDocument,
  ): FilteredFindings {
    const active: Finding[] = [];
    const suppressed: Finding[] = [];
    for (const finding of findings) {
      if (this.isSuppressed(finding, target)) {
        suppressed.push(finding);
      } else {
        active.push(finding);
      }
    }
    return { active, suppressed };
  }

  allSuppressedRules(): Set<string> {
    return new Set([...this.cliRules, ...this.fileRules]);
  }
}

/** One rule id per line; blank lines and `#` comments are skipped. */
export function parseIgnoreFile(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"));
}

/** A missing file is an empty set; any other read failure is a ConfigError. */
export async function loadIgnoreFile(file: string): Promise<string[]> {
  try {
    return parseIgnoreFile(await readFile(file, "utf8"));
  } catch (error) {
    if (isNodeError(error, "ENOENT")) {
      return [];
    }
    throw new ConfigError(
      `Cannot read ignore file ${file}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
}

export function inlineRuleIds(target: TargetDocument): string[] {
  const declared = target[INLINE_IGNORE_FIELD];
  if (!Array.isArray(declared)) {
    return [];
  }
  return declared.filter((value): value is string => typeof value === "string");
}

function normalizeRuleIds(ids: Iterable<string>): string[] {
  return [...ids].map((id) => id.trim()).filter((id) => id !== "");
}
