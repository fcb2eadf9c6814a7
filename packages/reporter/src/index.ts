import type { RiskReport } from "@deepxcheck/core";
import type { ReportFormat } from "./domain.js";
import { renderMarkdownReport, renderTextReport } from "./renderers.js";

export { REPORT_FORMATS, type ReportFormat } from "./domain.js";
export { renderMarkdownReport, renderTextReport };

export const formatReport = (report: RiskReport, format: ReportFormat): string => {
  if (format === "json") {
    return JSON.stringify(report, null, 2);
  }

  if (format === "md") {
    return renderMarkdownReport(report);
  }

  return renderTextReport(report);
};

/**
 * Several reports render as one JSON array, or as text blocks separated by a blank line.
 */
export const formatReports = (reports: readonly RiskReport[], format: ReportFormat): string => {
  if (format === "json") {
    const [only] = reports;
    return JSON.stringify(reports.length === 1 ? only : reports, null, 2);
  }

  return reports.map((report) => formatReport(report, format)).join("\n\n");
};

export type PrintReportOptions = {
  format?: ReportFormat;
  write?: (chunk: string) => void;
};

const writeToStdout = (chunk: string): void => {
  process.stdout.write(chunk);
};

export const printReport = (report: RiskReport, options: PrintReportOptions = {}): void => {
  const write = options.write ?? writeToStdout;
  write(`${formatReport(report, options.format ?? "text")}\n`);
};
