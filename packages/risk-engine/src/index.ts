export {
  analyzeProfile,
  findMissingFields,
  runChecks,
  type AnalyzeProfileOptions,
} from "./application/analyze-profile.js";
export {
  mergeConfig,
  parseRiskEngineConfigOverrides,
  resolveRiskEngineConfig,
} from "./application/resolve-config.js";
export {
  DEFAULT_RISK_ENGINE_CONFIG,
  RISK_MODEL_VERSION,
  type CheckThresholds,
  type CheckWeights,
  type RiskEngineConfig,
  type RiskEngineConfigOverrides,
  type RiskLevelThresholds,
  type SignalLexicon,
} from "./config.js";
export { PROFILE_CHECKS, type CheckContext, type ProfileCheck } from "./domain/checks.js";
export { parseJoinDate } from "./domain/join-date.js";
export { parseProfileRecord } from "./domain/profile-schema.js";
export { toRiskLevel } from "./domain/scoring.js";
