export const REPORT_SCHEMA_VERSION = "deliverypulse.report.v1" as const;

export type ReportSchemaVersion = typeof REPORT_SCHEMA_VERSION;

export type ReportFormat = "json" | "text" | "md";

export const RECONCILIATION_TOLERANCE = 1e-6;

export class ReportConsistencyError extends Error {
  readonly code = "report_reconciliation_failed";

  constructor(message: string) {
    super(message);
    this.name = "ReportConsistencyError";
  }
}

export const round1 = (value: number): number => Number(value.toFixed(1));

export const formatValue = (value: number | null, suffix = ""): string =>
  value === null ? "n/a" : `${round1(value)}${suffix}`;

export const formatSigned = (value: number | null, suffix = ""): string => {
  if (value === null) {
    return "n/a";
  }

  const rounded = round1(value);
  return rounded > 0 ? `+${rounded}${suffix}` : `${rounded}${suffix}`;
};
