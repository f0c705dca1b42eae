// api/responses.ts
// Shapes shared by the HTTP handlers.

import { formatValidationReport, summarizeReport, type ReportSummary } from '../engine/buildReportMessage';
import { assessTemplateCompatibility, type TemplateCompatibility } from '../engine/templateCompatibility';
import type { ValidationReport } from '../engine/types';

// The subset of VercelRequest / VercelResponse the handlers touch
export interface HttpRequestLike {
  method?: string;
  body?: unknown;
}

export interface HttpResponseLike {
  setHeader(name: string, value: string): unknown;
  status(code: number): HttpResponseLike;
  json(body: unknown): unknown;
}

export interface SummaryPayload {
  summary: ReportSummary;
  summary_text: string;
  compatibility: TemplateCompatibility;
}

export function buildSummaryPayload(report: ValidationReport): SummaryPayload {
  return {
    summary: summarizeReport(report),
    summary_text: formatValidationReport(report),
    compatibility: assessTemplateCompatibility(report.header)
  };
}
