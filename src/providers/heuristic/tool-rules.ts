import {
  OperationalRiskCategory,
  Severity,
} from "../../taxonomy/types.js";
import {
  aliasNames,
  fieldPath,
  hasAlias,
  numericValue,
  resolveAll,
  type ResolvedField,
} from "./aliases.js";
import { evidenceValue, toolLocation } from "./evidence.js";
import {
  ACTION_VERBS,
  CIRCULAR_PHRASES,
  CLEANUP_VERBS,
  DANGEROUS_OPERATIONS,
  EXTERNAL_SERVICE_WORDS,
  FAILURE_HIDING_PHRASES,
  GENERIC_WORDS,
  IDEMPOTENCY_PHRASES,
  RESOURCE_NOUNS,
  SCOPE_OVERLOAD_WORDS,
  STATE_CHANGING_VERBS,
  VALIDATION_KEYWORDS,
  matchKeywords,
} from "./keywords.js";
import { asRecord, isRecord, type ToolTarget } from "./target.js";
import type { HeuristicRule, RuleHit } from "./types.js";

export const TIMEOUT_LIMIT_MS = 300_000;
export const RETRY_LIMIT = 10;
const UNLIMITED_RETRIES = -1;
const MAX_ACTION_VERBS = 5;
const MIN_SPECIFIC_WORDS = 3;

type ToolRule = HeuristicRule<ToolTarget>;

const missingTimeout: ToolRule = {
  id: "HEUR-001",
  category: OperationalRiskCategory.MissingTimeoutGuard,
  severity: Severity.High,
  summary: "No timeout configuration",
  check: (tool) => {
    if (hasAlias(tool, "timeout")) {
      return [];
    }
    return [
      {
        title: "No timeout configuration",
        description:
          `Tool '${tool.name}' does not specify a timeout. ` +
          "Operations may hang indefinitely if external services become unresponsive.",
        location: toolLocation(tool.name),
        evidence: { checked_fields: aliasNames("timeout") },
        remediation:
          "Add a 'timeout' or 'timeoutMs' field with a reasonable value (e.g., 30000 for 30 seconds)",
      },
    ];
  },
};

const timeoutBounds: ToolRule = {
  id: "HEUR-002",
  category: OperationalRiskCategory.MissingTimeoutGuard,
  severity: Severity.Medium,
  summary: "Timeout longer than 5 minutes, or not positive",
  check: (tool) =>
    resolveAll(tool, "timeout").flatMap((resolved): RuleHit[] => {
      const timeout = numericValue(resolved);
      if (!timeout) {
        return [];
      }
      const path = fieldPath(resolved);
      const evidence = {
        field: path,
        value: timeout.value,
        value_ms: timeout.canonical,
      };
      if (timeout.canonical <= 0) {
        return [
          {
            severity: Severity.High,
            title: "Invalid timeout value",
            description:
              `Tool '${tool.name}' has ${path}=${timeout.value}. ` +
              "A zero or negative timeout either disables the guard or fails every call.",
            location: toolLocation(tool.name, path),
            evidence,
            remediation: "Set a positive timeout, typically 30-60 seconds",
          },
        ];
      }
      if (timeout.canonical > TIMEOUT_LIMIT_MS) {
        return [
          {
            title: "Timeout too long",
            description:
              `Tool '${tool.name}' has ${path}=${timeout.value} ` +
              `(${timeout.canonical}ms, over 5 minutes). ` +
              "Long timeouts can cause extended hangs and poor user experience.",
            location: toolLocation(tool.name, path),
            evidence,
            remediation:
              "Consider reducing timeout to 30-60 seconds for better responsiveness",
          },
        ];
      }
      return [];
    }),
};

const noRetryLimit: ToolRule = {
  id: "HEUR-003",
  category: OperationalRiskCategory.UnsafeRetryLoop,
  severity: Severity.Medium,
  summary: "No retry limit configured",
  check: (tool) => {
    if (hasAlias(tool, "retryLimit")) {
      return [];
    }
    return [
      {
        title: "No retry limit configured",
        description:
          `Tool '${tool.name}' does not specify a retry limit. ` +
          "Without limits, retry logic may cause resource exhaustion or infinite loops.",
        location: toolLocation(tool.name),
        evidence: { checked_fields: aliasNames("retryLimit") },
        remediation:
          "Add a 'maxRetries' or 'retryLimit' field with a reasonable value (e.g., 3)",
      },
    ];
  },
};

const retryBounds: ToolRule = {
  id: "HEUR-004",
  category: OperationalRiskCategory.UnsafeRetryLoop,
  severity: Severity.High,
  summary: "Unlimited (-1) or excessive (>10) retries",
  check: (tool) =>
    resolveAll(tool, "retryLimit").flatMap((resolved): RuleHit[] => {
      const retries = numericValue(resolved);
      if (!retries) {
        return [];
      }
      const path = fieldPath(resolved);
      const evidence = { field: path, value: retries.value };
      if (retries.value === UNLIMITED_RETRIES) {
        return [
          {
            title: "Unlimited retries configured",
            description:
              `Tool '${tool.name}' has ${path}=-1, indicating unlimited retries. ` +
              "This can cause infinite loops and resource exhaustion.",
            location: toolLocation(tool.name, path),
            evidence,
            remediation: "Set a finite retry limit (recommended: 3-5 retries)",
          },
        ];
      }
      if (retries.value > RETRY_LIMIT) {
        return [
          {
            title: "Excessive retry limit",
            description:
              `Tool '${tool.name}' has ${path}=${retries.value}. ` +
              "Very high retry limits may cause extended delays during outages.",
            location: toolLocation(tool.name, path),
            evidence,
            remediation: "Consider reducing retry limit to 3-5",
          },
        ];
      }
      return [];
    }),
};

const noBackoff: ToolRule = {
  id: "HEUR-005",
  category: OperationalRiskCategory.UnsafeRetryLoop,
  severity: Severity.Low,
  summary: "Retries without a backoff strategy",
  check: (tool) => {
    const retry = resolveAll(tool, "retryLimit").find(retriesEnabled);
    if (!retry || hasAlias(tool, "backoff")) {
      return [];
    }
    return [
      {
        title: "No backoff strategy for retries",
        description:
          `Tool '${tool.name}' has retry logic but no backoff strategy. ` +
          "Without backoff, rapid retries can overwhelm failing services.",
        location: toolLocation(tool.name),
        evidence: {
          retry_field: fieldPath(retry),
          retry_value: evidenceValue(retry.value),
          checked_fields: aliasNames("backoff"),
        },
        remediation:
          "Add exponential backoff configuration (e.g., backoffMs, exponentialBackoff) to avoid thundering herd problems",
      },
    ];
  },
};

const missingErrorSchema: ToolRule = {
  id: "HEUR-006",
  category: OperationalRiskCategory.MissingErrorSchema,
  severity: Severity.Medium,
  summary: "No error response schema",
  check: (tool) => {
    if (hasAlias(tool, "errorSchema")) {
      return [];
    }
    return [
      {
        title: "No error response schema",
        description:
          `Tool '${tool.name}' does not define an error response schema. ` +
          "Without structured error responses, agents cannot programmatically handle failures.",
        location: toolLocation(tool.name),
        evidence: { checked_fields: aliasNames("errorSchema") },
        remediation:
          "Add an 'errorSchema' field defining the structure of error responses with error codes and messages",
      },
    ];
  },
};

const errorSchemaWithoutCode: ToolRule = {
  id: "HEUR-007",
  category: OperationalRiskCategory.MissingErrorSchema,
  severity: Severity.Low,
  summary: "Error schema without an error code field",
  check: (tool) => {
    const schema = resolveAll(tool, "errorSchema").find((resolved) =>
      isRecord(resolved.value),
    );
    if (!schema || !isRecord(schema.value)) {
      return [];
    }
    const properties = asRecord(schema.value.properties);
    if (Object.hasOwn(properties, "code") || Object.hasOwn(properties, "errorCode")) {
      return [];
    }
    const path = fieldPath(schema);
    return [
      {
        title: "Error schema missing error code field",
        description:
          `Tool '${tool.name}' has an error schema but it doesn't include a 'code' or ` +
          "'errorCode' property. Error codes are essential for programmatic error handling.",
        location: toolLocation(tool.name, `${path}.properties`),
        evidence: { field: path, properties: Object.keys(properties) },
        remediation:
          "Add a 'code' property to the error schema (e.g., string enum of error codes)",
      },
    ];
  },
};

const missingOutputSchema: ToolRule = {
  id: "HEUR-008",
  category: OperationalRiskCategory.MissingErrorSchema,
  severity: Severity.Low,
  summary: "No output schema defined",
  check: (tool) => {
    if (hasAlias(tool, "outputSchema")) {
      return [];
    }
    return [
      {
        title: "No output schema defined",
        description:
          `Tool '${tool.name}' does not define an output schema. ` +
          "Agents cannot reliably parse responses without knowing the expected structure.",
        location: toolLocation(tool.name),
        evidence: { checked_fields: aliasNames("outputSchema") },
        remediation:
          "Add an 'outputSchema' field defining the structure of successful responses",
      },
    ];
  },
};

const vagueDescription: ToolRule = {
  id: "HEUR-009",
  category: OperationalRiskCategory.OverloadedToolScope,
  severity: Severity.Medium,
  summary: "Missing, short or generic description",
  check: (tool, options) => {
    const description = tool.description.trim();
    const location = toolLocation(tool.name, "description");
    if (description === "") {
      return [
        {
          title: "Missing description",
          description:
            `Tool '${tool.name}' has no description. Agents rely on descriptions to ` +
            "understand tool capabilities and select the appropriate tool for tasks.",
          location,
          evidence: { length: 0, minimum: options.minDescriptionLength },
          remediation:
            "Add a clear, detailed description explaining what the tool does",
        },
      ];
    }
    if (description.length < options.minDescriptionLength) {
      return [
        {
          title: "Vague description",
          description:
            `Tool '${tool.name}' has a very short description (${description.length} ` +
            `characters, minimum ${options.minDescriptionLength} recommended). ` +
            "Brief descriptions may not provide enough context for agents.",
          location,
          evidence: {
            length: description.length,
            minimum: options.minDescriptionLength,
          },
          remediation:
            "Expand the description to explain the tool's purpose, inputs, and expected outputs",
        },
      ];
    }
    const specificWords = description
      .toLowerCase()
      .split(/\s+/)
      .filter((word) => word !== "" && !GENERIC_WORDS.has(word));
    if (specificWords.length < MIN_SPECIFIC_WORDS) {
      return [
        {
          title: "Generic description",
          description:
            `Tool '${tool.name}' description contains only generic words. ` +
            "Add specific details about what the tool does.",
          location,
          evidence: { specific_words: specificWords },
          remediation:
            "Replace generic terms with specific details about functionality",
        },
      ];
    }
    return [];
  },
};

const overloadedScope: ToolRule = {
  id: "HEUR-010",
  category: OperationalRiskCategory.OverloadedToolScope,
  severity: Severity.High,
  summary: "Scope-overload words or too many action verbs",
  check: (tool) => {
    const hits: RuleHit[] = [];
    const location = toolLocation(tool.name, "description");
    const overload = matchKeywords(tool.description, SCOPE_OVERLOAD_WORDS);
    if (overload.length > 0) {
      hits.push({
        title: "Overloaded tool scope indicated",
        description:
          `Tool '${tool.name}' description contains scope-overload keywords: ` +
          `${overload.join(", ")}. Tools that do 'everything' are difficult to test, ` +
          "maintain, and use reliably.",
        location,
        evidence: { keywords: overload },
        remediation:
          "Split into multiple focused tools, each with a specific, well-defined purpose",
      });
    }

    const verbs = matchKeywords(tool.description, ACTION_VERBS);
    if (verbs.length > MAX_ACTION_VERBS) {
      hits.push({
        title: "Too many capabilities",
        description:
          `Tool '${tool.name}' description mentions ${verbs.length} action verbs ` +
          `(found: ${verbs.slice(0, MAX_ACTION_VERBS).join(", ")}...). Tools with many ` +
          "capabilities are harder to test, secure, and maintain.",
        location,
        evidence: { verb_count: verbs.length, verbs },
        remediation:
          "Consider splitting into multiple focused tools with specific responsibilities",
      });
    }
    return hits;
  },
};

const noRequiredFields: ToolRule = {
  id: "HEUR-011",
  category: OperationalRiskCategory.SilentFailurePath,
  severity: Severity.Low,
  summary: "Input schema without required fields",
  check: (tool) => {
    if (!tool.inputSchema) {
      return [];
    }
    const propertyCount = Object.keys(asRecord(tool.inputSchema.properties)).length;
    const required = tool.inputSchema.required;
    if (propertyCount === 0 || (Array.isArray(required) && required.length > 0)) {
      return [];
    }
    return [
      {
        title: "No required fields specified",
        description:
          `Tool '${tool.name}' has an input schema with ${propertyCount} properties but ` +
          "doesn't specify which fields are required. This may lead to missing input " +
          "errors at runtime.",
        location: toolLocation(tool.name, "inputSchema.required"),
        evidence: { property_count: propertyCount },
        remediation: "Add a 'required' array listing mandatory input fields",
      },
    ];
  },
};

const noValidationHints: ToolRule = {
  id: "HEUR-012",
  category: OperationalRiskCategory.SilentFailurePath,
  severity: Severity.Info,
  summary: "Input properties without validation constraints",
  check: (tool) => {
    if (!tool.inputSchema) {
      return [];
    }
    const properties = Object.entries(asRecord(tool.inputSchema.properties));
    const unconstrained = properties
      .filter(
        ([, definition]) =>
          isRecord(definition) &&
          !VALIDATION_KEYWORDS.some((keyword) => Object.hasOwn(definition, keyword)),
      )
      .map(([name]) => name);
    if (unconstrained.length === 0 || unconstrained.length < properties.length * 0.5) {
      return [];
    }
    return [
      {
        title: "Missing input validation hints",
        description:
          `Tool '${tool.name}' input schema has ${unconstrained.length} properties ` +
          `(out of ${properties.length}) without validation constraints ` +
          "(pattern, minLength, enum, etc.). This may allow invalid inputs.",
        location: toolLocation(tool.name, "inputSchema.properties"),
        evidence: {
          properties_without_validation: unconstrained.slice(0, 5),
          total_properties: properties.length,
        },
        remediation:
          "Add validation constraints to input properties (e.g., pattern for strings, " +
          "minimum/maximum for numbers, enum for limited choices)",
      },
    ];
  },
};

const noRateLimit: ToolRule = {
  id: "HEUR-013",
  category: OperationalRiskCategory.UnsafeRetryLoop,
  severity: Severity.Low,
  summary: "No rate limit configuration",
  check: (tool) => {
    if (hasAlias(tool, "rateLimit")) {
      return [];
    }
    return [
      {
        title: "No rate limit configuration",
        description:
          `Tool '${tool.name}' does not specify rate limits. Without rate limits, rapid ` +
          "repeated calls may overwhelm external services or exhaust resources.",
        location: toolLocation(tool.name),
        evidence: { checked_fields: aliasNames("rateLimit") },
        remediation:
          "Add a 'rateLimit' field specifying maximum calls per time period",
      },
    ];
  },
};

const noVersion: ToolRule = {
  id: "HEUR-014",
  category: OperationalRiskCategory.NoObservabilityHooks,
  severity: Severity.Low,
  summary: "No version information",
  check: (tool) => {
    if (hasAlias(tool, "version")) {
      return [];
    }
    return [
      {
        title: "No version information",
        description:
          `Tool '${tool.name}' does not specify a version. Versioning helps track ` +
          "changes and ensure compatibility when tools evolve over time.",
        location: toolLocation(tool.name),
        evidence: { checked_fields: aliasNames("version") },
        remediation:
          "Add a 'version' field (e.g., '1.0.0') following semantic versioning",
      },
    ];
  },
};

const noObservability: ToolRule = {
  id: "HEUR-015",
  category: OperationalRiskCategory.NoObservabilityHooks,
  severity: Severity.Low,
  summary: "No observability configuration",
  check: (tool) => {
    if (hasAlias(tool, "observability")) {
      return [];
    }
    return [
      {
        title: "No observability configuration",
        description:
          `Tool '${tool.name}' does not configure observability hooks (logging, metrics, ` +
          "tracing). Without observability, debugging production issues becomes " +
          "extremely difficult.",
        location: toolLocation(tool.name),
        evidence: { checked_fields: aliasNames("observability") },
        remediation:
          "Add logging, metrics, or tracing configuration to enable monitoring and debugging in production",
      },
    ];
  },
};

const undocumentedCleanup: ToolRule = {
  id: "HEUR-016",
  category: OperationalRiskCategory.SilentFailurePath,
  severity: Severity.Medium,
  summary: "Resources used without documented cleanup",
  check: (tool) => {
    const resources = matchKeywords(tool.description, RESOURCE_NOUNS);
    if (
      resources.length === 0 ||
      matchKeywords(tool.description, CLEANUP_VERBS).length > 0
    ) {
      return [];
    }
    return [
      {
        title: "Resource cleanup not documented",
        description:
          `Tool '${tool.name}' appears to use resources (${resources.slice(0, 3).join(", ")}) ` +
          "but doesn't document cleanup procedures. Resource leaks can cause production " +
          "instability.",
        location: toolLocation(tool.name, "description"),
        evidence: { resources },
        remediation:
          "Document how resources are cleaned up (e.g., 'connections are automatically " +
          "closed', 'call cleanup() to release resources')",
      },
    ];
  },
};

const noIdempotency: ToolRule = {
  id: "HEUR-017",
  category: OperationalRiskCategory.NonDeterministicResponse,
  severity: Severity.Info,
  summary: "State-changing tool without idempotency indication",
  check: (tool) => {
    const verbs = matchKeywords(tool.description, STATE_CHANGING_VERBS);
    if (verbs.length === 0) {
      return [];
    }
    const documented =
      matchKeywords(tool.description, IDEMPOTENCY_PHRASES).length > 0 ||
      hasAlias(tool, "idempotency") ||
      typeof tool.annotations.idempotentHint === "boolean";
    if (documented) {
      return [];
    }
    return [
      {
        title: "No idempotency indication",
        description:
          `Tool '${tool.name}' appears to perform state-changing operations but doesn't ` +
          "indicate whether it's idempotent. This is important for retry logic - " +
          "non-idempotent operations may cause duplicates.",
        location: toolLocation(tool.name, "description"),
        evidence: { verbs },
        remediation:
          "Document whether the operation is idempotent and safe to retry. If not " +
          "idempotent, consider adding idempotency keys or documenting this clearly.",
      },
    ];
  },
};

const dangerousOperations: ToolRule = {
  id: "HEUR-018",
  category: OperationalRiskCategory.OverloadedToolScope,
  severity: Severity.High,
  summary: "Dangerous operation keywords in name or description",
  check: (tool) => {
    const combined = `${tool.declaredName ?? ""} ${tool.description}`.toLowerCase();
    const found = DANGEROUS_OPERATIONS.filter(({ keyword }) =>
      combined.includes(keyword),
    );
    if (found.length === 0) {
      return [];
    }
    const keywords = found.map(({ keyword }) => keyword);
    return [
      {
        title: "Dangerous operation keywords detected",
        description:
          `Tool '${tool.name}' contains dangerous operation keywords: ` +
          `${keywords.map((keyword) => keyword.trim()).join(", ")}. ` +
          "Tools performing destructive operations require extra safeguards.",
        location: toolLocation(tool.name),
        evidence: {
          keywords,
          meanings: found.map(({ meaning }) => meaning),
        },
        remediation:
          "Add safeguards: require explicit confirmation, implement dry-run mode, add " +
          "audit logging, or provide undo/rollback mechanisms",
      },
    ];
  },
};

const noAuthContext: ToolRule = {
  id: "HEUR-019",
  category: OperationalRiskCategory.SilentFailurePath,
  severity: Severity.Info,
  summary: "External service use without authentication context",
  check: (tool) => {
    const indicators = matchKeywords(tool.description, EXTERNAL_SERVICE_WORDS);
    if (indicators.length === 0 || hasAlias(tool, "auth")) {
      return [];
    }
    return [
      {
        title: "No authentication context documented",
        description:
          `Tool '${tool.name}' appears to interact with external services but does not ` +
          "document authentication requirements. This may lead to authorization failures " +
          "at runtime.",
        location: toolLocation(tool.name),
        evidence: { indicators, checked_fields: aliasNames("auth") },
        remediation:
          "Document authentication requirements (e.g., 'requires API_KEY environment " +
          "variable', 'auth' field, or credential configuration)",
      },
    ];
  },
};

const circularDependency: ToolRule = {
  id: "HEUR-020",
  category: OperationalRiskCategory.UnsafeRetryLoop,
  severity: Severity.Medium,
  summary: "Self-reference or circular phrasing in description",
  check: (tool) => {
    const hits: RuleHit[] = [];
    const description = tool.description.toLowerCase();
    const location = toolLocation(tool.name, "description");
    const name = tool.declaredName?.toLowerCase();
    if (name && description.includes(name)) {
      hits.push({
        title: "Potential circular dependency",
        description:
          `Tool '${tool.name}' references itself in its description. ` +
          "Self-referencing tools can cause infinite loops in agent workflows.",
        location,
        evidence: { name: tool.name },
        remediation:
          "Ensure the tool does not call itself recursively. If recursive calls are " +
          "necessary, implement depth limits and termination conditions.",
      });
    }

    const pattern = CIRCULAR_PHRASES.find(({ keyword }) =>
      description.includes(keyword),
    );
    if (pattern) {
      hits.push({
        title: "Circular dependency risk pattern detected",
        description:
          `Tool '${tool.name}' description mentions ${pattern.meaning}. ` +
          "Ensure proper termination conditions to avoid infinite loops.",
        location,
        evidence: { pattern: pattern.keyword, meaning: pattern.meaning },
        remediation:
          "Add explicit termination conditions, maximum iteration counts, or depth " +
          "limits to prevent infinite loops",
      });
    }
    return hits;
  },
};

const missingInputSchema: ToolRule = {
  id: "HEUR-021",
  category: OperationalRiskCategory.SilentFailurePath,
  severity: Severity.Low,
  summary: "No input schema defined",
  check: (tool) => {
    if (tool.inputSchema) {
      return [];
    }
    return [
      {
        title: "No input schema defined",
        description:
          `Tool '${tool.name}' does not define an inputSchema object. ` +
          "Agents have to guess argument names and types, and malformed calls reach the tool unchecked.",
        location: toolLocation(tool.name, "inputSchema"),
        evidence: { field: "inputSchema", value: evidenceValue(tool.fields.inputSchema) },
        remediation:
          "Add an 'inputSchema' JSON Schema object describing every argument",
      },
    ];
  },
};

const failureHidingPhrases: ToolRule = {
  id: "HEUR-022",
  category: OperationalRiskCategory.SilentFailurePath,
  severity: Severity.Medium,
  summary: "Description admits to hiding failures",
  check: (tool) => {
    const phrases = matchKeywords(tool.description, FAILURE_HIDING_PHRASES);
    if (phrases.length === 0) {
      return [];
    }
    return [
      {
        title: "Dangerous phrase in description",
        description:
          `Tool '${tool.name}' description contains ${phrases.join(", ")}. ` +
          "Failures of this tool may never reach the caller.",
        location: toolLocation(tool.name, "description"),
        evidence: { phrases },
        remediation:
          "Report failures as structured errors instead of dropping them, and document the delivery guarantee",
      },
    ];
  },
};

const tooManyCapabilities: ToolRule = {
  id: "HEUR-023",
  category: OperationalRiskCategory.OverloadedToolScope,
  severity: Severity.High,
  summary: "More declared capabilities than allowed",
  check: (tool, options) => {
    const capabilities = tool.fields.capabilities;
    if (!Array.isArray(capabilities) || capabilities.length <= options.maxCapabilities) {
      return [];
    }
    return [
      {
        title: "Too many declared capabilities",
        description:
          `Tool '${tool.name}' declares ${capabilities.length} capabilities ` +
          `(maximum ${options.maxCapabilities}). Broad tools are harder to test, secure, and select correctly.`,
        location: toolLocation(tool.name, "capabilities"),
        evidence: {
          capability_count: capabilities.length,
          maximum: options.maxCapabilities,
        },
        remediation: "Split the capabilities across several focused tools",
      },
    ];
  },
};

function retriesEnabled(resolved: ResolvedField): boolean {
  return (
    resolved.value !== 0 &&
    resolved.value !== false &&
    resolved.value !== null &&
    resolved.value !== undefined
  );
}

export const TOOL_RULES: readonly ToolRule[] = [
  missingTimeout,
  timeoutBounds,
  noRetryLimit,
  retryBounds,
  noBackoff,
  missingErrorSchema,
  errorSchemaWithoutCode,
  missingOutputSchema,
  vagueDescription,
  overloadedScope,
  noRequiredFields,
  noValidationHints,
  noRateLimit,
  noVersion,
  noObservability,
  undocumentedCleanup,
  noIdempotency,
  dangerousOperations,
  noAuthContext,
  circularDependency,
  missingInputSchema,
  failureHidingPhrases,
  tooManyCapabilities,
];
