export { HeuristicProvider, HEURISTIC_PROVIDER_NAME } from "./heuristic-provider.js";
export { CONFIG_RULES, SERVER_RULES } from "./config-rules.js";
export { TOOL_RULES } from "./tool-rules.js";
export { FIELD_ALIASES } from "./aliases.js";
export { DEFAULT_HEURISTIC_OPTIONS } from "./types.js";
export type { HeuristicOptions, HeuristicRule, RuleHit } from "./types.js";
