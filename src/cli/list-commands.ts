import { errorMessage } from "../errors/errors.js";
import { createLogger, type Logger } from "../logger/logger.js";
import { CONFIG_RULES, SERVER_RULES } from "../providers/heuristic/config-rules.js";
import { TOOL_RULES } from "../providers/heuristic/tool-rules.js";
import type { InspectionProvider } from "../providers/types.js";

export interface ProviderStatus {
  readonly name: string;
  readonly description: string;
  readonly available: boolean;
}

export interface RuleSummary {
  readonly id: string;
  readonly target: "tool" | "config";
  readonly category: string;
  readonly severity: string;
  readonly summary: string;
}

export function describeProviders(
  providers: readonly InspectionProvider[],
  logger: Logger = createLogger("[providers] "),
): ProviderStatus[] {
  return providers.map((provider) => ({
    name: provider.name,
    description: provider.description,
    available: probe(provider, logger),
  }));
}

export function listRules(): RuleSummary[] {
  const toolRules = TOOL_RULES.map((rule) => ({ ...summarize(rule), target: "tool" as const }));
  const configRules = [...CONFIG_RULES, ...SERVER_RULES].map((rule) => ({
    ...summarize(rule),
    target: "config" as const,
  }));
  return [...toolRules, ...configRules];
}

export function renderProviderList(statuses: readonly ProviderStatus[]): string {
  return statuses
    .map(
      (status) =>
        `${status.available ? "[available]  " : "[unavailable]"} ${status.name} - ${status.description}`,
    )
    .join("\n");
}

export function renderRuleList(rules: readonly RuleSummary[]): string {
  const width = Math.max(...rules.map((rule) => rule.id.length));
  return rules
    .map(
      (rule) =>
        `${rule.id.padEnd(width)}  ${rule.severity.padEnd(8)}  ${rule.category.padEnd(26)}  ${rule.summary}`,
    )
    .join("\n");
}

function summarize(rule: {
  id: string;
  category: string;
  severity: string;
  summary: string;
}): Omit<RuleSummary, "target"> {
  return {
    id: rule.id,
    category: rule.category,
    severity: rule.severity,
    summary: rule.summary,
  };
}

function probe(provider: InspectionProvider, logger: Logger): boolean {
  try {
    return provider.isAvailable();
  } catch (error) {
    logger.warn(`availability check for '${provider.name}' failed: ${errorMessage(error)}`);
    return false;
  }
}
