import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

export const PACKAGE_NAME = "mcp-readiness-scanner";

/**
 * Walks up from this module to the scanner's own package.json. Works from
 * src/ under a TypeScript loader, from dist/ and from a bundled action.
 */
export async function resolvePackageRoot(
  startDir: string = path.dirname(fileURLToPath(import.meta.url)),
): Promise<string | undefined> {
  let dir = startDir;
  for (;;) {
    const manifest = await readManifest(path.join(dir, "package.json"));
    if (manifest?.name === PACKAGE_NAME) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return undefined;
    }
    dir = parent;
  }
}

export async function loadVersion(): Promise<string> {
  const root = await resolvePackageRoot();
  if (!root) {
    return "0.0.0";
  }
  const manifest = await readManifest(path.join(root, "package.json"));
  return manifest?.version ?? "0.0.0";
}

async function readManifest(
  file: string,
): Promise<{ name?: string; version?: string } | undefined> {
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch {
    return undefined;
  }
  const parsed: unknown = JSON.parse(raw);
  if (!parsed || typeof parsed !== "object") {
    return undefined;
  }
  const name: unknown = Reflect.get(parsed, "name");
  const version: unknown = Reflect.get(parsed, "version");
  return {
    name: typeof name === "string" ? name : undefined,
    version: typeof version === "string" ? version : undefined,
  };
}
