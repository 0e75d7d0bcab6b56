export {
  RISK_CATEGORIES,
  categoryIndex,
  getCategoryInfo,
  isRiskCategory,
} from "./registry.js";
export {
  OperationalRiskCategory,
  SEVERITY_ORDER,
  Severity,
  compareSeverity,
  parseSeverity,
  severityRank,
} from "./types.js";
export type { CategoryInfo } from "./types.js";
