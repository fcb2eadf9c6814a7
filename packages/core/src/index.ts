import type { AnalysisMode } from "./analysis-mode.js";

export {
  ANALYSIS_MODES,
  isAnalysisMode,
  parseAnalysisMode,
  type AnalysisMode,
} from "./analysis-mode.js";
export { InvalidConfigError, InvalidInputError, UnknownModeError } from "./errors.js";

export const MAX_RISK_SCORE = 10;

export type ProfileRecord = {
  username: string;
  displayName?: string;
  declaredLocation?: string;
  technicalLocation?: string;
  device?: string;
  bio: string;
  joinDate?: string;
  followers: number;
  following: number;
  nameChanges?: number;
  lastNameChange?: string;
  sharedChannels?: readonly string[];
  likeFishing?: boolean;
};

export type ProfileField = keyof ProfileRecord;

export type FindingCategory =
  | "geo-mismatch"
  | "suspicious-growth"
  | "identity-instability"
  | "telegram-promotion"
  | "scam-bio"
  | "suspicious-ratio"
  | "coordinated-network"
  | "like-fishing";

export type FindingSeverity = "low" | "medium" | "high";

export type EvidenceValue = string | number | boolean;

export type Finding = {
  category: FindingCategory;
  severity: FindingSeverity;
  weight: number;
  // Coarse, identifier-free wording.
  summary: string;
  detail: string;
  evidence: Readonly<Record<string, EvidenceValue>>;
};

export type RiskLevel = "minimal" | "low" | "medium" | "high" | "critical";

export type Anonymization = "redacted" | "masked" | "none";

export type ReportedFinding = {
  category: FindingCategory;
  severity: FindingSeverity;
  weight: number;
  description: string;
  evidence?: Readonly<Record<string, EvidenceValue>>;
};

export type CheckEvaluation = {
  category: FindingCategory;
  triggered: boolean;
  weight: number;
};

export type CheckTrace = {
  schemaVersion: "1";
  evaluations: readonly CheckEvaluation[];
};

export type RiskAssessment = {
  score: number;
  maxScore: number;
  normalizedScore: number;
  level: RiskLevel;
  findingCount: number;
};

export type RiskReport = {
  schemaVersion: "deepxcheck.report.v1";
  meta: {
    tool: "DeepXCheck";
    riskModelVersion: string;
    mode: AnalysisMode;
    analyzedAt: string;
    disclaimer: string;
  };
  subject: {
    identifier: string;
    anonymization: Anonymization;
  };
  profile: ProfileRecord;
  assessment: RiskAssessment;
  findings: readonly ReportedFinding[];
  recommendations: readonly string[];
  completeness: {
    complete: boolean;
    missingFields: readonly ProfileField[];
  };
  trace?: CheckTrace;
};
