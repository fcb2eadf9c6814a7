import {
  InvalidInputError,
  parseAnalysisMode,
  type AnalysisMode,
  type Finding,
  type ProfileField,
  type ProfileRecord,
  type RiskReport,
} from "@deepxcheck/core";
import { RISK_MODEL_VERSION, type RiskEngineConfigOverrides } from "../config.js";
import {
  anonymizationFor,
  presentFinding,
  presentIdentifier,
  presentProfile,
} from "../domain/anonymization.js";
import {
  PROFILE_CHECKS,
  type CheckContext,
  type ProfileCheck,
} from "../domain/checks.js";
import { parseProfileRecord } from "../domain/profile-schema.js";
import { assessFindings, buildRecommendations } from "../domain/scoring.js";
import { createTraceCollector } from "../domain/trace-collector.js";
import { resolveRiskEngineConfig } from "./resolve-config.js";

export type AnalyzeProfileOptions = {
  config?: RiskEngineConfigOverrides;
  // Reference instant for account age and `meta.analyzedAt`. Defaults to now.
  asOf?: Date;
  explain?: boolean;
};

const EXPERT_DISCLAIMER =
  "EXPERT MODE - IDENTIFYING DATA VISIBLE. This report contains identifying information. " +
  "Public sharing may have legal and ethical consequences. Use responsibly for documentation purposes only.";

const disclaimerFor = (mode: AnalysisMode): string => {
  switch (mode) {
    case "discovery":
      return "Educational analysis - patterns anonymized";
    case "investigation":
      return "Investigation analysis - identifiers partially masked";
    case "expert":
      return EXPERT_DISCLAIMER;
  }
};

export const findMissingFields = (profile: ProfileRecord): readonly ProfileField[] =>
  profile.declaredLocation !== undefined && profile.technicalLocation === undefined
    ? ["technicalLocation"]
    : [];

export const runChecks = (
  profile: ProfileRecord,
  context: CheckContext,
  onEvaluated?: (check: ProfileCheck, findings: readonly Finding[]) => void,
): readonly Finding[] => {
  const findings: Finding[] = [];

  for (const check of PROFILE_CHECKS) {
    const produced = check.run(profile, context);
    onEvaluated?.(check, produced);
    findings.push(...produced);
  }

  return findings;
};

/**
 * Scores one profile and renders the report for the requested disclosure mode.
 * Every check runs in every mode; the mode only decides what the report reveals.
 *
 * @throws UnknownModeError when `mode` is not one of the three modes.
 * @throws InvalidInputError when the profile is malformed, or when expert mode
 * lacks `technicalLocation` for a declared location.
 */
export const analyzeProfile = (
  profile: ProfileRecord,
  mode: AnalysisMode = "discovery",
  options: AnalyzeProfileOptions = {},
): RiskReport => {
  const analysisMode = parseAnalysisMode(mode);
  const record = parseProfileRecord(profile);
  const config = resolveRiskEngineConfig(options.config);
  const asOf = options.asOf ?? new Date();
  if (Number.isNaN(asOf.getTime())) {
    throw new InvalidInputError("asOf must be a valid date");
  }

  const missingFields = findMissingFields(record);
  if (analysisMode === "expert" && missingFields.length > 0) {
    throw new InvalidInputError(
      "expert mode requires technicalLocation when declaredLocation is provided",
      missingFields.map((field) => `${field}: required in expert mode`),
    );
  }

  const collector = createTraceCollector(options.explain === true);
  const findings = runChecks(record, { config, asOf }, (check, produced) => {
    collector.record({
      category: check.category,
      triggered: produced.length > 0,
      weight: produced.reduce((sum, finding) => sum + finding.weight, 0),
    });
  });

  const assessment = assessFindings(findings, config.riskLevels);
  const trace = collector.build();

  return {
    schemaVersion: "deepxcheck.report.v1",
    meta: {
      tool: "DeepXCheck",
      riskModelVersion: RISK_MODEL_VERSION,
      mode: analysisMode,
      analyzedAt: asOf.toISOString(),
      disclaimer: disclaimerFor(analysisMode),
    },
    subject: {
      identifier: presentIdentifier(record.username, analysisMode),
      anonymization: anonymizationFor(analysisMode),
    },
    profile: presentProfile(record, analysisMode),
    assessment,
    findings: findings.map((finding) => presentFinding(finding, analysisMode)),
    recommendations: buildRecommendations(findings, assessment, config.riskLevels),
    completeness: {
      complete: missingFields.length === 0,
      missingFields,
    },
    ...(trace === undefined ? {} : { trace }),
  };
};
