import { ConfigError } from "../errors/errors.js";
import { parseSeverity, type Severity } from "../taxonomy/types.js";
import type { ScannerConfig } from "./types.js";

const ROOT_KEYS = new Set([
  "providerTimeoutMs",
  "scoring",
  "ignore",
  "ignoreFile",
  "plugins",
  "heuristic",
  "opa",
]);
const SCORING_KEYS = new Set(["threshold", "penalties"]);
const HEURISTIC_KEYS = new Set(["maxCapabilities", "minDescriptionLength"]);
const OPA_KEYS = new Set(["policyDir", "binary"]);

export function emptyConfig(): ScannerConfig {
  return {
    scoring: { penalties: {} },
    ignore: [],
    plugins: {},
    heuristic: {},
    opa: {},
  };
}

/**
 * Validate and normalize a parsed config document. Every problem is
 * collected before a single ConfigError is thrown.
 */
export function validateConfig(input: unknown, source: string): ScannerConfig {
  if (input === undefined || input === null) {
    return emptyConfig();
  }
  const errors: string[] = [];
  const config = parseConfig(input, errors);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid config ${source}: ${errors.join("; ")}`);
  }
  return config;
}

function parseConfig(input: unknown, errors: string[]): ScannerConfig {
  if (!isRecord(input)) {
    errors.push("config must be a mapping");
    return emptyConfig();
  }
  assertNoExtraKeys(input, ROOT_KEYS, "config", errors);

  return {
    providerTimeoutMs: positiveNumber(input.providerTimeoutMs, "providerTimeoutMs", errors),
    scoring: parseScoring(input.scoring, errors),
    ignore: stringList(input.ignore, "ignore", errors),
    ignoreFile: optionalString(input.ignoreFile, "ignoreFile", errors),
    plugins: parsePlugins(input.plugins, errors),
    heuristic: parseHeuristic(input.heuristic, errors),
    opa: parseOpa(input.opa, errors),
  };
}

function parseScoring(input: unknown, errors: string[]): ScannerConfig["scoring"] {
  if (input === undefined) {
    return { penalties: {} };
  }
  if (!isRecord(input)) {
    errors.push("scoring must be a mapping");
    return { penalties: {} };
  }
  assertNoExtraKeys(input, SCORING_KEYS, "scoring", errors);

  let threshold: number | undefined;
  if (input.threshold !== undefined) {
    if (!isNumber(input.threshold) || input.threshold < 0 || input.threshold > 100) {
      errors.push("scoring.threshold must be a number between 0 and 100");
    } else {
      threshold = input.threshold;
    }
  }

  const penalties: Partial<Record<Severity, number>> = {};
  if (input.penalties !== undefined) {
    if (!isRecord(input.penalties)) {
      errors.push("scoring.penalties must be a mapping of severity to penalty");
    } else {
      for (const [key, value] of Object.entries(input.penalties)) {
        const severity = parseSeverity(key);
        if (!severity) {
          errors.push(`scoring.penalties contains unknown severity '${key}'`);
          continue;
        }
        if (!isNumber(value) || value < 0) {
          errors.push(`scoring.penalties.${key} must be a non-negative number`);
          continue;
        }
        penalties[severity] = value;
      }
    }
  }
  return { threshold, penalties };
}

function parsePlugins(input: unknown, errors: string[]): Record<string, string> {
  if (input === undefined) {
    return {};
  }
  if (!isRecord(input)) {
    errors.push("plugins must be a mapping of name to module specifier");
    return {};
  }
  const plugins: Record<string, string> = {};
  for (const [name, specifier] of Object.entries(input)) {
    if (typeof specifier !== "string" || specifier.trim() === "") {
      errors.push(`plugins.${name} must be a module specifier`);
      continue;
    }
    plugins[name] = specifier;
  }
  return plugins;
}

function parseHeuristic(
  input: unknown,
  errors: string[],
): ScannerConfig["heuristic"] {
  if (input === undefined) {
    return {};
  }
  if (!isRecord(input)) {
    errors.push("heuristic must be a mapping");
    return {};
  }
  assertNoExtraKeys(input, HEURISTIC_KEYS, "heuristic", errors);
  const heuristic: { maxCapabilities?: number; minDescriptionLength?: number } = {};
  for (const key of HEURISTIC_KEYS) {
    const value = input[key];
    if (value === undefined) {
      continue;
    }
    if (!isNumber(value) || !Number.isInteger(value) || value < 0) {
      errors.push(`heuristic.${key} must be a non-negative integer`);
      continue;
    }
    if (key === "maxCapabilities") {
      heuristic.maxCapabilities = value;
    } else {
      heuristic.minDescriptionLength = value;
    }
  }
  return heuristic;
}

function parseOpa(input: unknown, errors: string[]): ScannerConfig["opa"] {
  if (input === undefined) {
    return {};
  }
  if (!isRecord(input)) {
    errors.push("opa must be a mapping");
    return {};
  }
  assertNoExtraKeys(input, OPA_KEYS, "opa", errors);
  return {
    policyDir: optionalString(input.policyDir, "opa.policyDir", errors),
    binary: optionalString(input.binary, "opa.binary", errors),
  };
}

function positiveNumber(
  value: unknown,
  path: string,
  errors: string[],
): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isNumber(value) || value <= 0) {
    errors.push(`${path} must be a positive number`);
    return undefined;
  }
  return value;
}

function optionalString(
  value: unknown,
  path: string,
  errors: string[],
): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string" || value.trim() === "") {
    errors.push(`${path} must be a non-empty string`);
    return undefined;
  }
  return value;
}

function stringList(value: unknown, path: string, errors: string[]): string[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    errors.push(`${path} must be a list of rule ids`);
    return [];
  }
  const items: string[] = [];
  value.forEach((item: unknown, index) => {
    if (typeof item !== "string") {
      errors.push(`${path}[${index}] must be a string`);
      return;
    }
    items.push(item);
  });
  return items;
}

function assertNoExtraKeys(
  input: Record<string, unknown>,
  allowed: ReadonlySet<string>,
  path: string,
  errors: string[],
): void {
  for (const key of Object.keys(input)) {
    if (!allowed.has(key)) {
      errors.push(`${path} contains unsupported field '${key}'`);
    }
  }
}

function isNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
