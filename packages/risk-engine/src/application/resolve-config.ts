import { InvalidConfigError } from "@deepxcheck/core";
import { z } from "zod";
import {
  DEFAULT_RISK_ENGINE_CONFIG,
  type RiskEngineConfig,
  type RiskEngineConfigOverrides,
} from "../config.js";
import { formatIssues } from "../domain/profile-schema.js";

const weight = z.number().finite().nonnegative();
const threshold = z.number().finite().nonnegative();
const phrases = z.array(z.string().trim().min(1));

const overridesSchema = z
  .object({
    weights: z
      .object({
        geoMismatch: weight,
        suspiciousGrowth: weight,
        identityInstability: weight,
        telegramPromotion: weight,
        scamBio: weight,
        scamBioEscalated: weight,
        suspiciousRatio: weight,
        coordinatedNetwork: weight,
        likeFishing: weight,
      })
      .partial()
      .strict(),
    thresholds: z
      .object({
        recentAccountDays: threshold,
        growthFollowerFloor: threshold,
        nameChangeLimit: threshold,
        scamPhraseEscalation: threshold,
        followRatioLimit: threshold,
        sharedChannelLimit: threshold,
      })
      .partial()
      .strict(),
    riskLevels: z
      .object({
        low: threshold,
        medium: threshold,
        high: threshold,
        critical: threshold,
      })
      .partial()
      .strict(),
    lexicon: z
      .object({
        scamPhrases: phrases,
        telegramPatterns: phrases,
        regions: z.record(phrases),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

/**
 * Validates overrides read from an untrusted source such as a JSON config file.
 */
export const parseRiskEngineConfigOverrides = (raw: unknown): RiskEngineConfigOverrides => {
  const result = overridesSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigError("invalid risk engine configuration", formatIssues(result.error));
  }

  return result.data;
};

export const mergeConfig = (overrides: RiskEngineConfigOverrides | undefined): RiskEngineConfig => {
  if (overrides === undefined) {
    return DEFAULT_RISK_ENGINE_CONFIG;
  }

  return {
    weights: {
      ...DEFAULT_RISK_ENGINE_CONFIG.weights,
      ...overrides.weights,
    },
    thresholds: {
      ...DEFAULT_RISK_ENGINE_CONFIG.thresholds,
      ...overrides.thresholds,
    },
    riskLevels: {
      ...DEFAULT_RISK_ENGINE_CONFIG.riskLevels,
      ...overrides.riskLevels,
    },
    lexicon: {
      ...DEFAULT_RISK_ENGINE_CONFIG.lexicon,
      ...overrides.lexicon,
    },
  };
};

export const resolveRiskEngineConfig = (
  overrides: RiskEngineConfigOverrides | undefined,
): RiskEngineConfig => {
  const config = mergeConfig(overrides);
  const issues: string[] = [];

  const sections = { weights: config.weights, thresholds: config.thresholds };
  for (const [section, values] of Object.entries(sections)) {
    for (const [key, value] of Object.entries(values)) {
      if (!Number.isFinite(value) || value < 0) {
        issues.push(`${section}.${key}: must be a non-negative number`);
      }
    }
  }

  // An extra scam phrase must never lower the score.
  if (config.weights.scamBioEscalated < config.weights.scamBio) {
    issues.push("weights: scamBioEscalated must be at least scamBio");
  }

  const { low, medium, high, critical } = config.riskLevels;
  if (!(low <= medium && medium <= high && high <= critical)) {
    issues.push("riskLevels: thresholds must ascend from low to critical");
  }

  if (issues.length > 0) {
    throw new InvalidConfigError("invalid risk engine configuration", issues);
  }

  return config;
};
