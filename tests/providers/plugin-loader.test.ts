import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MemoryLogger } from "../../src/logger/logger.js";
import {
  PLUGIN_GROUP,
  discoverPluginProviders,
  parsePluginSpecifier,
  readPackagePlugins,
  type PluginEntry,
  type PluginSource,
} from "../../src/providers/plugin-loader.js";
import { loadProviders } from "../../src/providers/registry.js";
import type { Finding } from "../../src/scanner/types.js";

class LicenseProvider {
  readonly name: string = "license";
  readonly description = "Checks license metadata";
  isAvailable(): boolean {
    return true;
  }
  async analyzeTool(): Promise<Finding[]> {
    return [];
  }
  async analyzeConfig(): Promise<Finding[]> {
    return [];
  }
}

class ShadowingProvider extends LicenseProvider {
  override readonly name = "heuristic";
}

class NamelessProvider extends LicenseProvider {
  override readonly name = "";
}

class ExplodingProvider extends LicenseProvider {
  constructor() {
    super();
    throw new Error("needs credentials");
  }
}

function entry(name: string, exported: unknown): PluginEntry {
  return { name, origin: "test", load: async () => exported };
}

function source(...entries: PluginEntry[]): PluginSource {
  return { origin: "test", discover: async () => entries };
}

describe("parsePluginSpecifier", () => {
  it("splits module and export name", () => {
    expect(parsePluginSpecifier("./providers.js#LicenseProvider")).toEqual({
      module: "./providers.js",
      exportName: "LicenseProvider",
    });
    expect(parsePluginSpecifier("@acme/mcp-checks#Checks")).toEqual({
      module: "@acme/mcp-checks",
      exportName: "Checks",
    });
  });

  it("falls back to the default export", () => {
    expect(parsePluginSpecifier("mcp-checks")).toEqual({ module: "mcp-checks" });
    expect(parsePluginSpecifier("mcp-checks#")).toEqual({
      module: "mcp-checks",
      exportName: undefined,
    });
  });
});

describe("discoverPluginProviders", () => {
  it("instantiates valid provider classes in declaration order", async () => {
    class SecondProvider extends LicenseProvider {
      override readonly name = "second";
    }
    const providers = await discoverPluginProviders(
      [source(entry("license", LicenseProvider)), source(entry("second", SecondProvider))],
      { logger: new MemoryLogger() },
    );
    expect(providers.map((provider) => provider.name)).toEqual(["license", "second"]);
  });

  it("skips plugins whose name is already registered", async () => {
    const logger = new MemoryLogger();
    const providers = await discoverPluginProviders(
      [source(entry("shadow", ShadowingProvider), entry("license", LicenseProvider), entry("again", LicenseProvider))],
      { reservedNames: ["heuristic", "opa"], logger },
    );

    expect(providers.map((provider) => provider.name)).toEqual(["license"]);
    expect(logger.messages("warn")).toEqual([
      "plugin 'shadow' (test) skipped: provider name 'heuristic' is already registered",
      "plugin 'again' (test) skipped: provider name 'license' is already registered",
    ]);
  });

  it("skips exports that are not provider classes", async () => {
    const logger = new MemoryLogger();
    const providers = await discoverPluginProviders(
      [source(entry("object", { name: "x" }), entry("nameless", NamelessProvider))],
      { logger },
    );

    expect(providers).toEqual([]);
    expect(logger.messages("warn")).toEqual([
      "plugin 'object' (test) skipped: export is not an InspectionProvider class",
      "plugin 'nameless' (test) skipped: instance does not satisfy the provider contract",
    ]);
  });

  it("isolates load and constructor failures", async () => {
    const logger = new MemoryLogger();
    const broken: PluginEntry = {
      name: "missing",
      origin: "test",
      load: async () => {
        throw new Error("Cannot find module 'mcp-missing'");
      },
    };
    const providers = await discoverPluginProviders(
      [source(broken, entry("exploding", ExplodingProvider), entry("license", LicenseProvider))],
      { logger },
    );

    expect(providers.map((provider) => provider.name)).toEqual(["license"]);
    expect(logger.messages("warn")).toEqual([
      "plugin 'missing' (test) failed to load: Cannot find module 'mcp-missing'",
      "plugin 'exploding' (test) failed to load: needs credentials",
    ]);
  });

  it("keeps going when a source cannot be read", async () => {
    const logger = new MemoryLogger();
    const unreadable: PluginSource = {
      origin: "/repo/package.json",
      discover: async () => {
        throw new Error("Unexpected token");
      },
    };
    const providers = await discoverPluginProviders(
      [unreadable, source(entry("license", LicenseProvider))],
      { logger },
    );

    expect(providers).toHaveLength(1);
    expect(logger.messages("warn")).toEqual([
      "failed to read plugins from /repo/package.json: Unexpected token",
    ]);
  });
});

describe("loadProviders", () => {
  it("lists built-ins before plugins", async () => {
    const providers = await loadProviders({
      pluginSources: [source(entry("license", LicenseProvider))],
      logger: new MemoryLogger(),
    });
    expect(providers.map((provider) => provider.name)).toEqual(["heuristic", "opa", "license"]);
  });
});

describe("readPackagePlugins", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "mcp-readiness-plugins-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeManifest(manifest: unknown): Promise<string> {
    const file = path.join(dir, "package.json");
    await fs.writeFile(file, JSON.stringify(manifest), "utf8");
    return file;
  }

  it("returns nothing when package.json is missing", async () => {
    expect(await readPackagePlugins(path.join(dir, "package.json"))).toEqual({});
  });

  it("returns nothing when the field is absent", async () => {
    expect(await readPackagePlugins(await writeManifest({ name: "demo" }))).toEqual({});
  });

  it("reads the declared plugins", async () => {
    const file = await writeManifest({
      name: "demo",
      [PLUGIN_GROUP]: { license: "./checks.js#LicenseProvider" },
    });
    expect(await readPackagePlugins(file)).toEqual({ license: "./checks.js#LicenseProvider" });
  });

  it("rejects a malformed field", async () => {
    const file = await writeManifest({ [PLUGIN_GROUP]: ["./checks.js"] });
    await expect(readPackagePlugins(file)).rejects.toThrow(
      `"${PLUGIN_GROUP}" in ${file} must be an object`,
    );

    const blank = await writeManifest({ [PLUGIN_GROUP]: { license: "" } });
    await expect(readPackagePlugins(blank)).rejects.toThrow(
      `"${PLUGIN_GROUP}.license" in ${blank} must be a module specifier`,
    );
  });
});
