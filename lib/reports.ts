// lib/reports.ts
import type {
  BatchOutput,
  CrossCheckReport,
  JsonObject,
  JsonValue,
  QualityReport,
  ValidationReport,
} from "./types";

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: JsonValue | undefined): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

export function isCrossCheckReport(
  report: ValidationReport
): report is JsonObject & CrossCheckReport {
  return (
    isJsonObject(report) &&
    typeof report.company_name_match === "string" &&
    typeof report.twitter_handle_validity === "string" &&
    typeof report.twitter_handle_accuracy === "string" &&
    isStringArray(report.inconsistencies) &&
    typeof report.overall_assessment === "string" &&
    isStringArray(report.recommendations)
  );
}

export function isQualityReport(report: ValidationReport): report is JsonObject & QualityReport {
  return (
    isJsonObject(report) &&
    typeof report.data_completeness === "string" &&
    typeof report.format_compliance === "string" &&
    typeof report.data_quality === "string" &&
    isStringArray(report.missing_elements) &&
    typeof report.overall_assessment === "string" &&
    isStringArray(report.recommendations)
  );
}

export type BatchSummary = {
  structured: number;
  rawText: number;
  errors: number;
};

export function isErrorAnalysis(analysis: JsonValue): boolean {
  return typeof analysis === "string" && analysis.startsWith("Error: ");
}

export function summarizeBatch(output: BatchOutput): BatchSummary {
  const summary: BatchSummary = { structured: 0, rawText: 0, errors: 0 };

  for (const r of output.results) {
    if (isErrorAnalysis(r.analysis)) summary.errors++;
    else if (typeof r.analysis === "string") summary.rawText++;
    else summary.structured++;
  }

  return summary;
}
