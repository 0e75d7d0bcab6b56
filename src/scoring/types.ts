import type { SeverityCounts } from "../scanner/types.js";
import type { SeverityPenalties } from "./weights.js";

export interface ScoringOptions {
  readonly penalties: SeverityPenalties;
  readonly threshold: number;
}

export interface ScoringOverrides {
  readonly penalties?: Partial<Record<keyof SeverityPenalties, number>>;
  readonly threshold?: number;
}

export interface ReadinessResult {
  readonly score: number;
  readonly isProductionReady: boolean;
  readonly counts: SeverityCounts;
}
