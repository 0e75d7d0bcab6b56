
/** Anything the alias table can be resolved against. */
export interface AliasSource {
  readonly fields: Readonly<Record<string, unknown>>;
  readonly config: Readonly<Record<string, unknown>>;
  readonly retryPolicy: Readonly<Record<string, unknown>>;
}

export type FieldScope = "top" | "config" | "retryPolicy";

export interface FieldAlias {
  readonly name: string;
  /** Multiplier that brings the value to the group's canonical unit. */
  readonly scale?: number;
}

export interface AliasGroup {
  readonly aliases: readonly FieldAlias[];
  readonly scopes: readonly FieldScope[];
}

export interface ResolvedField {
  readonly field: string;
  readonly scope: FieldScope;
  readonly value: unknown;
  readonly scale: number;
}

const TOP_AND_CONFIG: readonly FieldScope[] = ["top", "config"];
const WITH_RETRY_POLICY: readonly FieldScope[] = ["top", "config", "retryPolicy"];

function names(...values: string[]): FieldAlias[] {
  return values.map((name) => ({ name }));
}

/**
 * Historical spellings of the fields the heuristic rules look for, in
 * resolution priority. Adding a spelling here is enough for every rule
 * that consults the group.
 */
export const FIELD_ALIASES = {
  timeout: {
    aliases: [
      { name: "timeout" },
      { name: "timeoutMs" },
      { name: "timeout_ms" },
      { name: "timeoutSeconds", scale: 1000 },
    ],
    scopes: TOP_AND_CONFIG,
  },
  retryLimit: {
    aliases: names(
      "maxRetries",
      "retries",
      "max_retries",
      "retryCount",
      "retryLimit",
      "retry_limit",
    ),
    scopes: WITH_RETRY_POLICY,
  },
  backoff: {
    aliases: names(
      "backoff",
      "backoffMs",
      "exponentialBackoff",
      "backoffStrategy",
      "retryDelay",
      "retryBackoff",
    ),
    scopes: WITH_RETRY_POLICY,
  },
  errorSchema: {
    aliases: names("errorSchema", "error_schema", "errors", "errorResponse"),
    scopes: TOP_AND_CONFIG,
  },
  outputSchema: {
    aliases: names(
      "outputSchema",
      "output_schema",
      "responseSchema",
      "response_schema",
    ),
    scopes: TOP_AND_CONFIG,
  },
  rateLimit: {
    aliases: names(
      "rateLimit",
      "rate_limit",
      "rateLimitPerMinute",
      "throttle",
      "maxCallsPerSecond",
    ),
    scopes: TOP_AND_CONFIG,
  },
  version: {
    aliases: names("version", "apiVersion", "api_version", "schemaVersion"),
    scopes: TOP_AND_CONFIG,
  },
  observability: {
    aliases: names(
      "observability",
      "logging",
      "metrics",
      "telemetry",
      "tracing",
      "monitoring",
      "instrumentation",
      "logger",
    ),
    scopes: TOP_AND_CONFIG,
  },
  auth: {
    aliases: names(
      "auth",
      "authentication",
      "credentials",
      "apiKey",
      "api_key",
      "token",
    ),
    scopes: TOP_AND_CONFIG,
  },
  idempotency: {
    aliases: names("idempotent", "isIdempotent", "idempotency", "idempotencyKey"),
    scopes: TOP_AND_CONFIG,
  },
} satisfies Record<string, AliasGroup>;

export type AliasGroupName = keyof typeof FIELD_ALIASES;

/**
 * Every alias of the group that is present, each at the first scope that
 * holds it. Order follows the alias priority list.
 */
export function resolveAll(
  target: AliasSource,
  group: AliasGroupName,
): ResolvedField[] {
  const { aliases, scopes }: AliasGroup = FIELD_ALIASES[group];
  const resolved: ResolvedField[] = [];
  for (const alias of aliases) {
    for (const scope of scopes) {
      const container = containerFor(target, scope);
      if (container && Object.hasOwn(container, alias.name)) {
        resolved.push({
          field: alias.name,
          scope,
          value: container[alias.name],
          scale: alias.scale ?? 1,
        });
        break;
      }
    }
  }
  return resolved;
}

export function resolveFirst(
  target: AliasSource,
  group: AliasGroupName,
): ResolvedField | undefined {
  return resolveAll(target, group)[0];
}

export function hasAlias(target: AliasSource, group: AliasGroupName): boolean {
  return resolveFirst(target, group) !== undefined;
}

export interface NumericField extends ResolvedField {
  readonly value: number;
  /** Value in the group's canonical unit. */
  readonly canonical: number;
}

export function numericValue(resolved: ResolvedField): NumericField | undefined {
  const value = resolved.value;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return undefined;
  }
  return { ...resolved, value, canonical: value * resolved.scale };
}

export function aliasNames(group: AliasGroupName): string[] {
  const { aliases }: AliasGroup = FIELD_ALIASES[group];
  return aliases.map((alias) => alias.name);
}

export function fieldPath(resolved: ResolvedField): string {
  switch (resolved.scope) {
    case "config":
      return `config.${resolved.field}`;
    case "retryPolicy":
      return `retryPolicy.${resolved.field}`;
    default:
      return resolved.field;
  }
}

function containerFor(
  target: AliasSource,
  scope: FieldScope,
): Readonly<Record<string, unknown>> | undefined {
  switch (scope) {
    case "top":
      return target.fields;
    case "config":
      return target.config;
    case "retryPolicy":
      return target.retryPolicy;
  }
}
