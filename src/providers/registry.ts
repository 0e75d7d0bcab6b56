import { createLogger, type Logger } from "../logger/logger.js";
import { HeuristicProvider } from "./heuristic/heuristic-provider.js";
import type { HeuristicOptions } from "./heuristic/types.js";
import type { CommandRunner } from "./opa/command-runner.js";
import { OpaProvider } from "./opa/opa-provider.js";
import {
  discoverPluginProviders,
  manifestSource,
  packageJsonSource,
  type PluginSource,
} from "./plugin-loader.js";
import type { InspectionProvider } from "./types.js";

export interface ProviderSettings {
  readonly heuristic?: Partial<HeuristicOptions>;
  readonly opa?: {
    readonly policyDir?: string;
    readonly binary?: string;
    readonly runner?: CommandRunner;
  };
  /** Plugin name → module specifier, from the config file. */
  readonly plugins?: Readonly<Record<string, string>>;
  /** Directory plugin specifiers and package.json are resolved from. */
  readonly baseDir?: string;
  /** Replaces the package.json and config sources. */
  readonly pluginSources?: readonly PluginSource[];
  readonly logger?: Logger;
}

/** Built-ins in registration order: heuristic, then opa. */
export function createBuiltinProviders(
  settings: ProviderSettings = {},
): InspectionProvider[] {
  return [
    new HeuristicProvider(settings.heuristic),
    new OpaProvider({
      policyDir: settings.opa?.policyDir,
      binary: settings.opa?.binary,
      runner: settings.opa?.runner,
    }),
  ];
}

export function defaultPluginSources(
  settings: ProviderSettings = {},
): PluginSource[] {
  const baseDir = settings.baseDir ?? process.cwd();
  const sources = [packageJsonSource(baseDir)];
  if (settings.plugins && Object.keys(settings.plugins).length > 0) {
    sources.push(manifestSource("config plugins", baseDir, settings.plugins));
  }
  return sources;
}

/** Built-ins followed by discovered plugins. Availability is not filtered here. */
export async function loadProviders(
  settings: ProviderSettings = {},
): Promise<InspectionProvider[]> {
  const logger = settings.logger ?? createLogger("[plugins] ");
  const builtins = createBuiltinProviders(settings);
  const plugins = await discoverPluginProviders(
    settings.pluginSources ?? defaultPluginSources(settings),
    { reservedNames: builtins.map((provider) => provider.name), logger },
  );
  return [...builtins, ...plugins];
}
