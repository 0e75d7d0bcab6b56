import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { ConfigError, errorMessage } from "../errors/errors.js";
import type { TargetDocument } from "../scanner/types.js";

const YAML_EXTENSIONS = new Set([".yaml", ".yml"]);

export interface LoadedTarget {
  readonly path: string;
  readonly document: TargetDocument;
}

/** Parses a tool definition or MCP config; YAML by extension, JSON otherwise. */
export function parseTargetDocument(raw: string, file: string): TargetDocument {
  const isYaml = YAML_EXTENSIONS.has(path.extname(file).toLowerCase());
  let parsed: unknown;
  try {
    parsed = isYaml ? yaml.load(raw, { filename: file }) : JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(
      `${file} is not valid ${isYaml ? "YAML" : "JSON"}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${file} must contain an object at the top level`);
  }
  return parsed;
}

export async function loadTargetFile(file: string): Promise<LoadedTarget> {
  const resolved = path.resolve(file);
  let raw: string;
  try {
    raw = await fs.readFile(resolved, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read ${resolved}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return { path: resolved, document: parseTargetDocument(raw, resolved) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
