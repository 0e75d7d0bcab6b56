import { readFile } from "node:fs/promises";
import { createRequire } from "node:module";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { errorMessage, isNodeError } from "../errors/errors.js";
import type { Logger } from "../logger/logger.js";
import { isInspectionProvider, isProviderConstructor } from "./contract.js";
import type { InspectionProvider } from "./types.js";

/** Field of package.json that declares provider plugins. */
export const PLUGIN_GROUP = "mcp-readiness.providers";

export interface PluginEntry {
  readonly name: string;
  /** Where the entry was declared, for diagnostics. */
  readonly origin: string;
  /** Resolves to the exported provider class. */
  load(): Promise<unknown>;
}

export interface PluginSource {
  readonly origin: string;
  discover(): Promise<readonly PluginEntry[]>;
}

export interface PluginSpecifier {
  readonly module: string;
  /** Named export; the default export when absent. */
  readonly exportName?: string;
}

/** `"./providers.js#MyProvider"` → module plus export name. */
export function parsePluginSpecifier(value: string): PluginSpecifier {
  const hash = value.lastIndexOf("#");
  if (hash <= 0) {
    return { module: value };
  }
  const exportName = value.slice(hash + 1).trim();
  return {
    module: value.slice(0, hash),
    exportName: exportName === "" ? undefined : exportName,
  };
}

/** Relative specifiers resolve against `baseDir`, bare ones through its node_modules. */
export async function importPlugin(
  specifier: string,
  baseDir: string,
): Promise<unknown> {
  const { module, exportName } = parsePluginSpecifier(specifier);
  const namespace: unknown = await import(resolveModuleUrl(module, baseDir));
  if (!namespace || typeof namespace !== "object") {
    throw new Error(`module '${module}' did not load as an ES module namespace`);
  }
  const name = exportName ?? "default";
  if (!Reflect.has(namespace, name)) {
    throw new Error(`module '${module}' has no export '${name}'`);
  }
  return Reflect.get(namespace, name);
}

function resolveModuleUrl(module: string, baseDir: string): string {
  if (module.startsWith(".") || path.isAbsolute(module)) {
    return pathToFileURL(path.resolve(baseDir, module)).href;
  }
  const require = createRequire(path.join(baseDir, "package.json"));
  return pathToFileURL(require.resolve(module)).href;
}

/** Plugins declared as a name → specifier map, e.g. the config file's `plugins`. */
export function manifestSource(
  origin: string,
  baseDir: string,
  plugins: Readonly<Record<string, string>>,
): PluginSource {
  return {
    origin,
    discover: async () =>
      Object.entries(plugins).map(([name, specifier]) => ({
        name,
        origin,
        load: () => importPlugin(specifier, baseDir),
      })),
  };
}

/** Plugins declared under the `mcp-readiness.providers` field of `<dir>/package.json`. */
export function packageJsonSource(dir: string): PluginSource {
  const file = path.join(dir, "package.json");
  return {
    origin: file,
    discover: async () => {
      const plugins = await readPackagePlugins(file);
      return manifestSource(file, dir, plugins).discover();
    },
  };
}

export async function readPackagePlugins(
  file: string,
): Promise<Record<string, string>> {
  let raw: string;
  try {
    raw = await readFile(file, "utf8");
  } catch (error) {
    if (isNodeError(error, "ENOENT")) {
      return {};
    }
    throw error;
  }

  const manifest: unknown = JSON.parse(raw);
  const declared = isRecord(manifest) ? manifest[PLUGIN_GROUP] : undefined;
  if (declared === undefined) {
    return {};
  }
  if (!isRecord(declared)) {
    throw new Error(`"${PLUGIN_GROUP}" in ${file} must be an object`);
  }
  const plugins: Record<string, string> = {};
  for (const [name, specifier] of Object.entries(declared)) {
    if (typeof specifier !== "string" || specifier.trim() === "") {
      throw new Error(`"${PLUGIN_GROUP}.${name}" in ${file} must be a module specifier`);
    }
    plugins[name] = specifier;
  }
  return plugins;
}

export interface DiscoveryOptions {
  /** Names already taken, normally the built-in providers. */
  readonly reservedNames?: Iterable<string>;
  readonly logger: Logger;
}

/**
 * Loads, instantiates and validates every plugin the sources declare, in
 * source order then declaration order. A plugin that fails any step is
 * logged and skipped.
 */
export async function discoverPluginProviders(
  sources: readonly PluginSource[],
  options: DiscoveryOptions,
): Promise<InspectionProvider[]> {
  const { logger } = options;
  const names = new Set(options.reservedNames ?? []);
  const providers: InspectionProvider[] = [];

  for (const source of sources) {
    let entries: readonly PluginEntry[];
    try {
      entries = await source.discover();
    } catch (error) {
      logger.warn(`failed to read plugins from ${source.origin}: ${errorMessage(error)}`);
      continue;
    }

    for (const entry of entries) {
      const provider = await instantiate(entry, logger);
      if (!provider) {
        continue;
      }
      if (names.has(provider.name)) {
        logger.warn(
          `plugin '${entry.name}' (${entry.origin}) skipped: provider name '${provider.name}' is already registered`,
        );
        continue;
      }
      names.add(provider.name);
      providers.push(provider);
      logger.debug(`loaded plugin provider '${provider.name}' from ${entry.origin}`);
    }
  }
  return providers;
}

async function instantiate(
  entry: PluginEntry,
  logger: Logger,
): Promise<InspectionProvider | undefined> {
  const label = `plugin '${entry.name}' (${entry.origin})`;
  try {
    const exported = await entry.load();
    if (!isProviderConstructor(exported)) {
      logger.warn(`${label} skipped: export is not an InspectionProvider class`);
      return undefined;
    }
    const instance: unknown = new exported();
    if (!isInspectionProvider(instance)) {
      logger.warn(`${label} skipped: instance does not satisfy the provider contract`);
      return undefined;
    }
    return instance;
  } catch (error) {
    logger.warn(`${label} failed to load: ${errorMessage(error)}`);
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
