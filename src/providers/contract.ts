import type { InspectionProvider, ProviderConstructor } from "./types.js";

const CONTRACT_METHODS = ["isAvailable", "analyzeTool", "analyzeConfig"];

export function isInspectionProvider(
  value: unknown,
): value is InspectionProvider {
  if (!isRecord(value)) {
    return false;
  }
  const candidate = value;
  if (typeof candidate.name !== "string" || candidate.name.trim() === "") {
    return false;
  }
  if (typeof candidate.description !== "string") {
    return false;
  }
  return CONTRACT_METHODS.every(
    (method) => typeof candidate[method] === "function",
  );
}

/** Checks the prototype before anything is instantiated. */
export function isProviderConstructor(
  value: unknown,
): value is ProviderConstructor {
  if (typeof value !== "function") {
    return false;
  }
  const prototype: unknown = value.prototype;
  if (!prototype || typeof prototype !== "object") {
    return false;
  }
  return CONTRACT_METHODS.every(
    (method) => typeof Reflect.get(prototype, method) === "function",
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
