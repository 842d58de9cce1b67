import type { PerformanceReport } from "@deliverypulse/core";
import type { ReportFormat } from "./domain.js";
import { renderMarkdownReport, renderTextReport } from "./renderers.js";

export {
  REPORT_SCHEMA_VERSION,
  RECONCILIATION_TOLERANCE,
  ReportConsistencyError,
  round1,
  type ReportFormat,
  type ReportSchemaVersion,
} from "./domain.js";
export { assembleReport, verifyReconciliation, type AssembleReportInput } from "./report.js";

export const formatReport = (report: PerformanceReport, format: ReportFormat): string => {
  if (format === "json") {
    return JSON.stringify(report, null, 2);
  }

  if (format === "md") {
    return renderMarkdownReport(report);
  }

  return renderTextReport(report);
};
