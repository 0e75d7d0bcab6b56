import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { ConfigError, errorMessage, isNodeError } from "../errors/errors.js";
import { validateConfig, emptyConfig } from "./config-validator.js";
import { DEFAULT_CONFIG_FILE, type LoadedConfig, type ScannerConfig } from "./types.js";

/**
 * Reads the config file named by `--config`, or `.mcp-readiness.yaml` in
 * `cwd` when present. An explicitly named file must exist.
 */
export async function loadConfig(
  explicitPath: string | undefined,
  cwd: string = process.cwd(),
): Promise<LoadedConfig> {
  const file = path.resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILE);
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (error) {
    if (!explicitPath && isNodeError(error, "ENOENT")) {
      return { config: emptyConfig(), baseDir: cwd };
    }
    throw new ConfigError(`Cannot read config file ${file}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw, { filename: file });
  } catch (error) {
    throw new ConfigError(`Config file ${file} is not valid YAML: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const baseDir = path.dirname(file);
  return {
    config: resolvePaths(validateConfig(parsed, file), baseDir),
    path: file,
    baseDir,
  };
}

function resolvePaths(config: ScannerConfig, baseDir: string): ScannerConfig {
  return {
    ...config,
    ignoreFile: config.ignoreFile ? path.resolve(baseDir, config.ignoreFile) : undefined,
    opa: {
      ...config.opa,
      policyDir: config.opa.policyDir
        ? path.resolve(baseDir, config.opa.policyDir)
        : undefined,
    },
  };
}
