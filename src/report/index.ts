export { buildJsonReport, renderJsonReport } from "./json-reporter.js";
export { renderMarkdownReport } from "./markdown-reporter.js";
export type { MarkdownRenderOptions } from "./markdown-reporter.js";
export {
  SARIF_SCHEMA,
  SARIF_VERSION,
  buildSarifLog,
  buildSarifSummary,
  renderSarifReport,
  renderSarifSummary,
  toSarifLevel,
} from "./sarif-reporter.js";
export type { SarifLevel, SarifLog, SarifResult, SarifRule } from "./sarif-reporter.js";
export { renderReport } from "./render.js";
export { readinessLevel, sortFindings } from "./report-utils.js";
export { REPORT_FORMATS } from "./types.js";
export type {
  JsonReport,
  ReadinessLevel,
  RenderOptions,
  ReportFormat,
  SummaryInfo,
  ToolInfo,
} from "./types.js";
