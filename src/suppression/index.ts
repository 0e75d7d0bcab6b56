export {
  DEFAULT_IGNORE_FILE,
  INLINE_IGNORE_FIELD,
  SuppressionManager,
  inlineRuleIds,
  loadIgnoreFile,
  parseIgnoreFile,
} from "./suppression-manager.js";
export type {
  FilteredFindings,
  SuppressionOptions,
} from "./suppression-manager.js";
