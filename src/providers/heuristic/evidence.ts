import type { EvidenceValue } from "../../scanner/types.js";

/** Raw target values are recorded as-is when they are JSON scalars, otherwise serialized. */
export function evidenceValue(value: unknown): EvidenceValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  ) {
    return value;
  }
  if (value === undefined) {
    return null;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

export function toolLocation(toolName: string, field?: string): string {
  return field ? `tool.${toolName}.${field}` : `tool.${toolName}`;
}

export function serverLocation(serverName: string, field?: string): string {
  return field ? `mcpServers.${serverName}.${field}` : `mcpServers.${serverName}`;
}
