export {
  DEFAULT_PROVIDER_TIMEOUT_MS,
  PROVIDER_FAILURE_RULE_ID,
  ScanOrchestrator,
  runWithTimeout,
} from "./scan-orchestrator.js";
export type {
  CreateOrchestratorOptions,
  OrchestratorOptions,
} from "./scan-orchestrator.js";
