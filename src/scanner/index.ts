export { createFinding, isFinding, parseFinding } from "./finding-factory.js";
export type {
  Evidence,
  EvidenceValue,
  Finding,
  ScanResult,
  SeverityCounts,
  TargetDocument,
  TargetKind,
} from "./types.js";
