import { MAX_RISK_SCORE, type Finding, type RiskAssessment, type RiskLevel } from "@deepxcheck/core";
import type { RiskLevelThresholds } from "../config.js";
import { round4, saturatingSum } from "./math.js";

export const toRiskLevel = (score: number, thresholds: RiskLevelThresholds): RiskLevel => {
  if (score >= thresholds.critical) {
    return "critical";
  }
  if (score >= thresholds.high) {
    return "high";
  }
  if (score >= thresholds.medium) {
    return "medium";
  }
  if (score >= thresholds.low) {
    return "low";
  }
  return "minimal";
};

export const assessFindings = (
  findings: readonly Finding[],
  thresholds: RiskLevelThresholds,
): RiskAssessment => {
  const score = saturatingSum(
    findings.map((finding) => finding.weight),
    MAX_RISK_SCORE,
  );

  return {
    score,
    maxScore: MAX_RISK_SCORE,
    normalizedScore: round4(score / MAX_RISK_SCORE),
    level: toRiskLevel(score, thresholds),
    findingCount: findings.length,
  };
};

export const NORMAL_PROFILE_RECOMMENDATION = "Profile appears normal: maintain standard vigilance";

export const buildRecommendations = (
  findings: readonly Finding[],
  assessment: RiskAssessment,
  thresholds: RiskLevelThresholds,
): readonly string[] => {
  const categories = new Set(findings.map((finding) => finding.category));
  const recommendations: string[] = [];

  if (assessment.score >= thresholds.high) {
    recommendations.push("Avoid any financial interaction with this account");
    recommendations.push("Report the account if it promotes scams or manipulation");
  }

  if (categories.has("geo-mismatch")) {
    recommendations.push("Verify geographical claims before extending trust");
  }

  if (categories.has("telegram-promotion")) {
    recommendations.push("Be cautious of Telegram groups promising quick gains");
  }

  if (categories.has("scam-bio")) {
    recommendations.push("Never send money to accounts that solicit payments in their bio");
  }

  if (categories.has("like-fishing")) {
    recommendations.push("Likes can be bait: check the profile before engaging");
  }

  if (recommendations.length === 0) {
    recommendations.push(NORMAL_PROFILE_RECOMMENDATION);
  }

  return recommendations;
};
