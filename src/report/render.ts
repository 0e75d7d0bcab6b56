import type { ScanResult } from "../scanner/types.js";
import { renderJsonReport } from "./json-reporter.js";
import {
  renderMarkdownReport,
  type MarkdownRenderOptions,
} from "./markdown-reporter.js";
import { renderSarifReport, renderSarifSummary } from "./sarif-reporter.js";
import type { RenderOptions, ReportFormat } from "./types.js";

export function renderReport(
  result: ScanResult,
  format: ReportFormat,
  options: RenderOptions & MarkdownRenderOptions,
): string {
  switch (format) {
    case "json":
      return renderJsonReport(result, options);
    case "sarif":
      return renderSarifReport(result, options);
    case "sarif-summary":
      return renderSarifSummary(result, options);
    case "md":
      return renderMarkdownReport(result, options);
  }
}
