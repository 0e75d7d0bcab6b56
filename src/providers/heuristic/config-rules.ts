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
  type AliasSource,
} from "./aliases.js";
import { serverLocation } from "./evidence.js";
import { SENSITIVE_ENV_TERMS } from "./keywords.js";
import { asRecord, isRecord } from "./target.js";
import { TIMEOUT_LIMIT_MS } from "./tool-rules.js";
import type { HeuristicRule, RuleHit } from "./types.js";

const EMPTY: Readonly<Record<string, unknown>> = Object.freeze({});

export interface ConfigTarget {
  /** Undefined when `mcpServers` is absent or not an object. */
  readonly servers?: Readonly<Record<string, unknown>>;
}

/** One `mcpServers` entry. Only top-level fields count for servers. */
export interface ServerTarget extends AliasSource {
  readonly name: string;
}

export function toConfigTarget(raw: unknown): ConfigTarget {
  const servers = isRecord(raw) ? raw.mcpServers : undefined;
  return { servers: isRecord(servers) ? servers : undefined };
}

export function toServerTargets(config: ConfigTarget): ServerTarget[] {
  return Object.entries(config.servers ?? {}).map(([name, value]) => ({
    name,
    fields: asRecord(value),
    config: EMPTY,
    retryPolicy: EMPTY,
  }));
}

const noServers: HeuristicRule<ConfigTarget> = {
  id: "HEUR-CFG-001",
  category: OperationalRiskCategory.SilentFailurePath,
  severity: Severity.Info,
  summary: "No MCP servers configured",
  check: (config) => {
    if (config.servers && Object.keys(config.servers).length > 0) {
      return [];
    }
    return [
      {
        title: "No MCP servers configured",
        description: "Configuration file contains no MCP server definitions",
        location: "mcpServers",
        evidence: { servers: 0 },
      },
    ];
  },
};

type ServerRule = HeuristicRule<ServerTarget>;

const missingCommand: ServerRule = {
  id: "HEUR-CFG-002",
  category: OperationalRiskCategory.SilentFailurePath,
  severity: Severity.High,
  summary: "Missing server command",
  check: (server) => {
    const { command, url } = server.fields;
    if (typeof command === "string" || typeof url === "string") {
      return [];
    }
    return [
      {
        title: "Missing server command",
        description:
          `Server '${server.name}' does not specify a command. ` +
          "The server cannot be started without a command.",
        location: serverLocation(server.name, "command"),
        evidence: { has_command: command !== undefined, has_url: false },
        remediation:
          "Add a 'command' (and 'args') that starts the server, or a 'url' for a remote server",
      },
    ];
  },
};

const sensitiveEnv: ServerRule = {
  id: "HEUR-CFG-003",
  category: OperationalRiskCategory.NoObservabilityHooks,
  severity: Severity.Info,
  summary: "Sensitive environment variable",
  check: (server) =>
    Object.keys(asRecord(server.fields.env)).flatMap((envName): RuleHit[] => {
      const lower = envName.toLowerCase();
      const matched = SENSITIVE_ENV_TERMS.filter((term) => lower.includes(term));
      if (matched.length === 0) {
        return [];
      }
      return [
        {
          title: "Sensitive environment variable",
          description:
            `Server '${server.name}' has environment variable '${envName}' that may ` +
            "contain sensitive data. Ensure this is not logged or exposed.",
          location: serverLocation(server.name, `env.${envName}`),
          evidence: { variable: envName, matched },
          remediation:
            "Keep the value out of logs and error messages, and load it from a secret store",
        },
      ];
    }),
};

const missingServerTimeout: ServerRule = {
  id: "HEUR-CFG-004",
  category: OperationalRiskCategory.MissingTimeoutGuard,
  severity: Severity.Medium,
  summary: "No server timeout",
  check: (server) => {
    if (hasAlias(server, "timeout")) {
      return [];
    }
    return [
      {
        title: "No server timeout",
        description:
          `Server '${server.name}' does not specify a timeout. ` +
          "Server initialization may hang indefinitely.",
        location: serverLocation(server.name),
        evidence: { checked_fields: aliasNames("timeout") },
        remediation: "Add a 'timeout' field for server initialization",
      },
    ];
  },
};

const serverTimeoutTooLong: ServerRule = {
  id: "HEUR-CFG-005",
  category: OperationalRiskCategory.MissingTimeoutGuard,
  severity: Severity.Medium,
  summary: "Server timeout longer than 5 minutes",
  check: (server) =>
    resolveAll(server, "timeout").flatMap((resolved): RuleHit[] => {
      const timeout = numericValue(resolved);
      if (!timeout || timeout.canonical <= TIMEOUT_LIMIT_MS) {
        return [];
      }
      const path = fieldPath(resolved);
      return [
        {
          title: "Server timeout too long",
          description:
            `Server '${server.name}' has ${path}=${timeout.value} ` +
            `(${timeout.canonical}ms, over 5 minutes). A hung server start blocks every tool it provides.`,
          location: serverLocation(server.name, path),
          evidence: { field: path, value: timeout.value, value_ms: timeout.canonical },
          remediation: "Reduce the server timeout to 60 seconds or less",
        },
      ];
    }),
};

export const CONFIG_RULES: readonly HeuristicRule<ConfigTarget>[] = [noServers];

export const SERVER_RULES: readonly ServerRule[] = [
  missingCommand,
  sensitiveEnv,
  missingServerTimeout,
  serverTimeoutTooLong,
];
