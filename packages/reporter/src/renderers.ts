import type { RiskReport } from "@deepxcheck/core";
import { describeFinding, profileLines, summarizeEvidence } from "./domain.js";

const RULE = "=".repeat(60);
const DIVIDER = "-".repeat(60);

const renderTextTrace = (report: RiskReport): string[] => {
  if (report.trace === undefined) {
    return [];
  }

  return [
    "",
    "Check trace",
    ...report.trace.evaluations.map(
      (evaluation) =>
        `  ${evaluation.category}: ${evaluation.triggered ? `triggered (weight ${evaluation.weight})` : "clear"}`,
    ),
  ];
};

export const renderTextReport = (report: RiskReport): string => {
  const lines: string[] = [];
  lines.push(RULE);
  lines.push("DEEPXCHECK ANALYSIS REPORT");
  lines.push(RULE);

  lines.push("");
  lines.push(`Mode: ${report.meta.mode.toUpperCase()}`);
  lines.push(`Date: ${report.meta.analyzedAt}`);
  lines.push(`Subject: ${report.subject.identifier}`);

  lines.push("");
  lines.push(
    `Risk score: ${report.assessment.score}/${report.assessment.maxScore} - ${report.assessment.level.toUpperCase()}`,
  );
  lines.push(`Red flags detected: ${report.assessment.findingCount}`);

  if (report.meta.mode !== "discovery") {
    lines.push("");
    lines.push("Profile");
    for (const line of profileLines(report.profile)) {
      lines.push(`  ${line.label}: ${line.value}`);
    }
  }

  lines.push("");
  lines.push("Red flags");
  if (report.findings.length === 0) {
    lines.push("  none");
  }
  report.findings.forEach((finding, index) => {
    lines.push(`  ${index + 1}. ${describeFinding(finding)}`);
    const evidence = summarizeEvidence(finding.evidence);
    if (evidence !== null) {
      lines.push(`     evidence: ${evidence}`);
    }
  });

  lines.push("");
  lines.push("Recommendations");
  for (const recommendation of report.recommendations) {
    lines.push(`  - ${recommendation}`);
  }

  if (!report.completeness.complete) {
    lines.push("");
    lines.push(`Incomplete profile, missing: ${report.completeness.missingFields.join(", ")}`);
  }

  lines.push(...renderTextTrace(report));

  if (report.meta.mode === "expert") {
    lines.push("");
    lines.push(DIVIDER);
    lines.push("EXPERT MODE DISCLAIMER:");
    lines.push(report.meta.disclaimer);
    lines.push(DIVIDER);
  }

  lines.push("");
  lines.push(RULE);
  lines.push("End of report - use responsibly");
  lines.push(RULE);

  return lines.join("\n");
};

const renderMarkdownTrace = (report: RiskReport): string[] => {
  if (report.trace === undefined) {
    return [];
  }

  return [
    "",
    "## Check Trace",
    ...report.trace.evaluations.map(
      (evaluation) =>
        `- \`${evaluation.category}\`: ${evaluation.triggered ? `triggered (weight \`${evaluation.weight}\`)` : "clear"}`,
    ),
  ];
};

export const renderMarkdownReport = (report: RiskReport): string => {
  const lines: string[] = [];
  lines.push("# DeepXCheck Report");
  lines.push("");
  lines.push(`> ${report.meta.disclaimer}`);

  lines.push("");
  lines.push("## Summary");
  lines.push(`- mode: \`${report.meta.mode}\``);
  lines.push(`- analyzed at: \`${report.meta.analyzedAt}\``);
  lines.push(`- subject: \`${report.subject.identifier}\``);
  lines.push(`- risk score: \`${report.assessment.score}/${report.assessment.maxScore}\``);
  lines.push(`- risk level: \`${report.assessment.level}\``);

  if (report.meta.mode !== "discovery") {
    lines.push("");
    lines.push("## Profile");
    for (const line of profileLines(report.profile)) {
      lines.push(`- ${line.label}: ${line.value}`);
    }
  }

  lines.push("");
  lines.push("## Red Flags");
  if (report.findings.length === 0) {
    lines.push("- none");
  }
  for (const finding of report.findings) {
    lines.push(`- **${finding.category}** (${finding.severity}, weight \`${finding.weight}\`): ${finding.description}`);
    const evidence = summarizeEvidence(finding.evidence);
    if (evidence !== null) {
      lines.push(`  - evidence: \`${evidence}\``);
    }
  }

  lines.push("");
  lines.push("## Recommendations");
  for (const recommendation of report.recommendations) {
    lines.push(`- ${recommendation}`);
  }

  if (!report.completeness.complete) {
    lines.push("");
    lines.push("## Completeness");
    lines.push(
      `- missing: ${report.completeness.missingFields.map((field) => `\`${field}\``).join(", ")}`,
    );
  }

  lines.push(...renderMarkdownTrace(report));

  return lines.join("\n");
};
