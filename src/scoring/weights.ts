import { Severity } from "../taxonomy/types.js";

export type SeverityPenalties = Readonly<Record<Severity, number>>;

export const DEFAULT_SEVERITY_PENALTIES: SeverityPenalties = {
  [Severity.Critical]: 25,
  [Severity.High]: 15,
  [Severity.Medium]: 7,
  [Severity.Low]: 3,
  [Severity.Info]: 0,
};

export const DEFAULT_READINESS_THRESHOLD = 70;
export const MAX_SCORE = 100;
