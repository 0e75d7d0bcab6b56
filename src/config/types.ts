import type { HeuristicOptions } from "../providers/heuristic/types.js";
import type { Severity } from "../taxonomy/types.js";

export const DEFAULT_CONFIG_FILE = ".mcp-readiness.yaml";

export interface ScannerConfig {
  readonly providerTimeoutMs?: number;
  readonly scoring: {
    readonly threshold?: number;
    readonly penalties: Readonly<Partial<Record<Severity, number>>>;
  };
  readonly ignore: readonly string[];
  /** Resolved against the config file's directory. */
  readonly ignoreFile?: string;
  readonly plugins: Readonly<Record<string, string>>;
  readonly heuristic: Readonly<Partial<HeuristicOptions>>;
  readonly opa: {
    /** Resolved against the config file's directory. */
    readonly policyDir?: string;
    readonly binary?: string;
  };
}

export interface LoadedConfig {
  readonly config: ScannerConfig;
  /** The file read, undefined when none was found. */
  readonly path?: string;
  /** Directory relative paths and plugin specifiers resolve from. */
  readonly baseDir: string;
}
