const EMPTY: Readonly<Record<string, unknown>> = Object.freeze({});

/**
 * Tool definition reduced to the handful of structural fields the rules
 * navigate. Everything else stays in `fields` and is reached through the
 * alias table.
 */
export interface ToolTarget {
  /** Display name, "unknown" when the definition has none. */
  readonly name: string;
  /** The declared name, only when it is a non-empty string. */
  readonly declaredName?: string;
  readonly description: string;
  readonly fields: Readonly<Record<string, unknown>>;
  readonly config: Readonly<Record<string, unknown>>;
  readonly retryPolicy: Readonly<Record<string, unknown>>;
  readonly inputSchema?: Readonly<Record<string, unknown>>;
  readonly annotations: Readonly<Record<string, unknown>>;
}

export function toToolTarget(raw: unknown): ToolTarget {
  const fields = isRecord(raw) ? raw : EMPTY;
  const declaredName =
    typeof fields.name === "string" && fields.name.trim() !== ""
      ? fields.name
      : undefined;
  const config = asRecord(fields.config);
  const retryPolicy = isRecord(fields.retryPolicy)
    ? fields.retryPolicy
    : asRecord(config.retryPolicy);

  return {
    name: declaredName ?? "unknown",
    declaredName,
    description:
      typeof fields.description === "string" ? fields.description : "",
    fields,
    config,
    retryPolicy,
    inputSchema: isRecord(fields.inputSchema) ? fields.inputSchema : undefined,
    annotations: asRecord(fields.annotations),
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function asRecord(value: unknown): Readonly<Record<string, unknown>> {
  return isRecord(value) ? value : EMPTY;
}
