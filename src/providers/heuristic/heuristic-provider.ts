import { errorMessage } from "../../errors/errors.js";
import { createLogger, type Logger } from "../../logger/logger.js";
import { createFinding } from "../../scanner/finding-factory.js";
import type { Finding, TargetDocument } from "../../scanner/types.js";
import type { InspectionProvider } from "../types.js";
import {
  CONFIG_RULES,
  SERVER_RULES,
  toConfigTarget,
  toServerTargets,
} from "./config-rules.js";
import { toToolTarget } from "./target.js";
import { TOOL_RULES } from "./tool-rules.js";
import {
  DEFAULT_HEURISTIC_OPTIONS,
  type HeuristicOptions,
  type HeuristicRule,
} from "./types.js";

export const HEURISTIC_PROVIDER_NAME = "heuristic";

/**
 * Rule-based static analysis of tool definitions and MCP configs.
 * Always available; needs nothing but the document.
 */
export class HeuristicProvider implements InspectionProvider {
  readonly name = HEURISTIC_PROVIDER_NAME;
  readonly description =
    "Static heuristics for timeouts, retries, schemas, scope and observability";

  private readonly options: HeuristicOptions;
  private readonly logger: Logger;

  constructor(
    options: Partial<HeuristicOptions> = {},
    logger: Logger = createLogger("[heuristic] "),
  ) {
    this.options = { ...DEFAULT_HEURISTIC_OPTIONS, ...options };
    this.logger = logger;
  }

  isAvailable(): boolean {
    return true;
  }

  async analyzeTool(tool: TargetDocument): Promise<readonly Finding[]> {
    const target = toToolTarget(tool);
    return TOOL_RULES.flatMap((rule) => this.apply(rule, target));
  }

  async analyzeConfig(config: TargetDocument): Promise<readonly Finding[]> {
    const target = toConfigTarget(config);
    const findings = CONFIG_RULES.flatMap((rule) => this.apply(rule, target));
    if (findings.length > 0) {
      return findings;
    }
    return toServerTargets(target).flatMap((server) =>
      SERVER_RULES.flatMap((rule) => this.apply(rule, server)),
    );
  }

  private apply<T>(rule: HeuristicRule<T>, target: T): Finding[] {
    try {
      return rule.check(target, this.options).map((hit) =>
        createFinding({
          category: rule.category,
          severity: hit.severity ?? rule.severity,
          title: hit.title,
          description: hit.description,
          location: hit.location,
          evidence: hit.evidence,
          provider: this.name,
          remediation: hit.remediation,
          rule_id: rule.id,
        }),
      );
    } catch (error) {
      this.logger.warn(`rule ${rule.id} failed, skipping: ${errorMessage(error)}`);
      return [];
    }
  }
}
