import type { Finding, TargetDocument } from "../scanner/types.js";

export interface AnalysisOptions {
  /** Aborted when the orchestrator gives up on this provider's call. */
  readonly signal?: AbortSignal;
}

/**
 * Capability contract shared by every analysis backend.
 *
 * `isAvailable` is synchronous and must return false, not throw, when a
 * binary, credential or other dependency is missing. The analysis calls
 * may do I/O but must not reject for malformed targets: a partially
 * specified document yields fewer findings.
 */
export interface InspectionProvider {
  readonly name: string;
  readonly description: string;
  isAvailable(): boolean;
  analyzeTool(
    tool: TargetDocument,
    options?: AnalysisOptions,
  ): Promise<readonly Finding[]>;
  analyzeConfig(
    config: TargetDocument,
    options?: AnalysisOptions,
  ): Promise<readonly Finding[]>;
}

export type ProviderConstructor = new () => InspectionProvider;
