import type { Evidence } from "../../scanner/types.js";
import type {
  OperationalRiskCategory,
  Severity,
} from "../../taxonomy/types.js";

export interface HeuristicOptions {
  readonly maxCapabilities: number;
  readonly minDescriptionLength: number;
}

export const DEFAULT_HEURISTIC_OPTIONS: HeuristicOptions = {
  maxCapabilities: 10,
  minDescriptionLength: 20,
};

/** One decision of a rule; the provider turns it into a Finding. */
export interface RuleHit {
  readonly title: string;
  readonly description: string;
  readonly location?: string;
  readonly evidence?: Evidence;
  readonly remediation?: string;
  /** Set when the bound that was crossed carries its own severity. */
  readonly severity?: Severity;
}

export interface HeuristicRule<T> {
  readonly id: string;
  readonly category: OperationalRiskCategory;
  readonly severity: Severity;
  readonly summary: string;
  readonly check: (target: T, options: HeuristicOptions) => readonly RuleHit[];
}
