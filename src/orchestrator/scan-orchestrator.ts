import { ProviderTimeoutError, errorMessage } from "../errors/errors.js";
import { createLogger, type Logger } from "../logger/logger.js";
import { loadProviders, type ProviderSettings } from "../providers/registry.js";
import type { InspectionProvider } from "../providers/types.js";
import { createFinding, parseFinding } from "../scanner/finding-factory.js";
import type {
  Finding,
  ScanResult,
  TargetDocument,
  TargetKind,
} from "../scanner/types.js";
import { calculateReadiness, resolveScoringOptions } from "../scoring/score-calculator.js";
import type { ScoringOptions, ScoringOverrides } from "../scoring/types.js";
import { SuppressionManager } from "../suppression/suppression-manager.js";
import { OperationalRiskCategory, Severity } from "../taxonomy/types.js";

export const DEFAULT_PROVIDER_TIMEOUT_MS = 30_000;
export const PROVIDER_FAILURE_RULE_ID = "SCAN-001";

export interface OrchestratorOptions {
  readonly providerTimeoutMs?: number;
  readonly suppression?: SuppressionManager;
  readonly scoring?: ScoringOptions;
  readonly logger?: Logger;
  /** Source of `timestamp`; replaced in tests. */
  readonly clock?: () => Date;
}

export interface CreateOrchestratorOptions extends ProviderSettings {
  readonly providerTimeoutMs?: number;
  readonly ignoreRules?: Iterable<string>;
  readonly ignoreFile?: string;
  readonly scoring?: ScoringOverrides;
}

type ProviderOutcome =
  | { readonly ok: true; readonly findings: readonly Finding[] }
  | { readonly ok: false; readonly error: unknown };

/**
 * Runs every available provider against one target concurrently and folds
 * their findings into a scored, suppression-filtered result. A provider
 * failure never fails the scan.
 */
export class ScanOrchestrator {
  readonly providers: readonly InspectionProvider[];
  private readonly providerTimeoutMs: number;
  private readonly suppression: SuppressionManager;
  private readonly scoring: ScoringOptions;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(
    providers: readonly InspectionProvider[],
    options: OrchestratorOptions = {},
  ) {
    this.logger = options.logger ?? createLogger("[scan] ");
    this.providerTimeoutMs = options.providerTimeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
    if (!Number.isFinite(this.providerTimeoutMs) || this.providerTimeoutMs <= 0) {
      throw new RangeError(
        `providerTimeoutMs must be a positive number, got ${this.providerTimeoutMs}`,
      );
    }
    this.suppression = options.suppression ?? new SuppressionManager();
    this.scoring = options.scoring ?? resolveScoringOptions();
    this.clock = options.clock ?? (() => new Date());
    this.providers = providers.filter((provider) => this.probe(provider));
  }

  /** Loads built-ins, plugins and the ignore file, then builds an orchestrator. */
  static async create(
    options: CreateOrchestratorOptions = {},
  ): Promise<ScanOrchestrator> {
    const logger = options.logger ?? createLogger("[scan] ");
    const [providers, suppression] = await Promise.all([
      loadProviders(options),
      SuppressionManager.create({
        ignoreRules: options.ignoreRules,
        ignoreFile: options.ignoreFile,
      }),
    ]);
    return new ScanOrchestrator(providers, {
      providerTimeoutMs: options.providerTimeoutMs,
      suppression,
      scoring: resolveScoringOptions(options.scoring),
      logger,
    });
  }

  get providerNames(): string[] {
    return this.providers.map((provider) => provider.name);
  }

  scanTool(tool: TargetDocument, target: string = "tool"): Promise<ScanResult> {
    return this.scan("tool", tool, target);
  }

  scanConfig(config: TargetDocument, target: string = "config"): Promise<ScanResult> {
    return this.scan("config", config, target);
  }

  private async scan(
    kind: TargetKind,
    document: TargetDocument,
    target: string,
  ): Promise<ScanResult> {
    const timestamp = this.clock().toISOString();
    const outcomes = await Promise.all(
      this.providers.map((provider) => this.invoke(provider, kind, document)),
    );

    const merged: Finding[] = [];
    const providersUsed: string[] = [];
    outcomes.forEach((outcome, index) => {
      const provider = this.providers[index];
      if (!provider) {
        return;
      }
      if (outcome.ok) {
        providersUsed.push(provider.name);
        merged.push(...outcome.findings);
        return;
      }
      this.logger.warn(
        `provider '${provider.name}' failed: ${errorMessage(outcome.error)}`,
      );
      merged.push(failureFinding(provider.name, outcome.error));
    });

    const { active, suppressed } = this.suppression.filterFindings(merged, document);
    const readiness = calculateReadiness(active, this.scoring);
    this.logger.debug(
      `${target}: ${active.length} finding(s), ${suppressed.length} suppressed, score ${readiness.score}`,
    );

    return Object.freeze({
      target,
      kind,
      timestamp,
      findings: Object.freeze(active),
      suppressed: Object.freeze(suppressed),
      providers_used: Object.freeze(providersUsed),
      counts: Object.freeze(readiness.counts),
      readiness_score: readiness.score,
      is_production_ready: readiness.isProductionReady,
    });
  }

  private async invoke(
    provider: InspectionProvider,
    kind: TargetKind,
    document: TargetDocument,
  ): Promise<ProviderOutcome> {
    try {
      const result: unknown = await runWithTimeout(
        provider.name,
        this.providerTimeoutMs,
        (signal) =>
          kind === "tool"
            ? provider.analyzeTool(document, { signal })
            : provider.analyzeConfig(document, { signal }),
      );
      if (!Array.isArray(result)) {
        return {
          ok: false,
          error: new TypeError(`expected an array of findings, got ${typeof result}`),
        };
      }
      return { ok: true, findings: this.normalize(provider.name, result) };
    } catch (error) {
      return { ok: false, error };
    }
  }

  // Every item is rebuilt, frozen ones included, so severities are canonical.
  private normalize(providerName: string, items: readonly unknown[]): Finding[] {
    const findings: Finding[] = [];
    for (const item of items) {
      const finding = parseFinding(item, providerName);
      if (finding) {
        findings.push(finding);
      } else {
        this.logger.warn(`provider '${providerName}' returned a malformed finding; dropped`);
      }
    }
    return findings;
  }

  private probe(provider: InspectionProvider): boolean {
    try {
      const available = provider.isAvailable();
      if (!available) {
        this.logger.debug(`provider '${provider.name}' is not available`);
      }
      return available;
    } catch (error) {
      this.logger.warn(
        `availability check for '${provider.name}' failed: ${errorMessage(error)}`,
      );
      return false;
    }
  }
}

/**
 * Races `task` against a timer. On timeout the task's signal is aborted and
 * the promise rejects with ProviderTimeoutError; the timer never outlives
 * the race.
 */
export async function runWithTimeout<T>(
  provider: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new ProviderTimeoutError(provider, timeoutMs);
      // Settle first so a task that rejects on abort does not win the race.
      reject(error);
      controller.abort(error);
    }, timeoutMs);
  });
  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function failureFinding(provider: string, error: unknown): Finding {
  const timedOut = error instanceof ProviderTimeoutError;
  return createFinding({
    category: OperationalRiskCategory.SilentFailurePath,
    severity: Severity.Info,
    title: timedOut ? "Provider timed out" : "Provider failed",
    description: `Provider '${provider}' did not complete: ${errorMessage(error)}. Its checks are missing from this result.`,
    provider,
    evidence: {
      error: errorMessage(error),
      timed_out: timedOut,
    },
    rule_id: PROVIDER_FAILURE_RULE_ID,
  });
}
