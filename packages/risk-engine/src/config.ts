export type CheckWeights = {
  geoMismatch: number;
  suspiciousGrowth: number;
  identityInstability: number;
  telegramPromotion: number;
  scamBio: number;
  scamBioEscalated: number;
  suspiciousRatio: number;
  coordinatedNetwork: number;
  likeFishing: number;
};

export type CheckThresholds = {
  recentAccountDays: number;
  growthFollowerFloor: number;
  nameChangeLimit: number;
  scamPhraseEscalation: number;
  followRatioLimit: number;
  sharedChannelLimit: number;
};

export type RiskLevelThresholds = {
  low: number;
  medium: number;
  high: number;
  critical: number;
};

export type SignalLexicon = {
  scamPhrases: readonly string[];
  telegramPatterns: readonly string[];
  regions: Readonly<Record<string, readonly string[]>>;
};

export type RiskEngineConfig = {
  weights: CheckWeights;
  thresholds: CheckThresholds;
  riskLevels: RiskLevelThresholds;
  lexicon: SignalLexicon;
};

export type RiskEngineConfigOverrides = {
  weights?: Partial<CheckWeights>;
  thresholds?: Partial<CheckThresholds>;
  riskLevels?: Partial<RiskLevelThresholds>;
  lexicon?: Partial<SignalLexicon>;
};

export const RISK_MODEL_VERSION = "rules-v1" as const;

export const DEFAULT_RISK_ENGINE_CONFIG: RiskEngineConfig = {
  // Score impact per finding. The sum is capped at MAX_RISK_SCORE.
  weights: {
    geoMismatch: 3,
    suspiciousGrowth: 2,
    identityInstability: 2,
    telegramPromotion: 2,
    scamBio: 1,
    scamBioEscalated: 2,
    suspiciousRatio: 1,
    coordinatedNetwork: 3,
    likeFishing: 2,
  },
  thresholds: {
    recentAccountDays: 365,
    // Strictly more followers than this on a recent account counts as suspicious growth.
    growthFollowerFloor: 1000,
    nameChangeLimit: 3,
    // At this many distinct scam phrases the bio finding uses the escalated weight.
    scamPhraseEscalation: 3,
    followRatioLimit: 10,
    sharedChannelLimit: 2,
  },
  riskLevels: {
    low: 2,
    medium: 4,
    high: 6,
    critical: 8,
  },
  lexicon: {
    scamPhrases: [
      "blessed",
      "blessing",
      "cashapp",
      "paypal",
      "apple pay",
      "send me",
      "dm me",
      "instant money",
      "get paid",
      "nfa",
      "not financial advice",
      "alpha",
      "signal",
      "signals",
      "pump",
      "moon",
      "100x",
      "financial freedom",
    ],
    // Raw substrings, matched against the lower-cased bio.
    telegramPatterns: ["t.me/", "telegram", "tg://", "joinchat/"],
    regions: {
      "united-states": [
        "usa",
        "us",
        "united states",
        "america",
        "new york",
        "california",
        "texas",
        "florida",
        "pennsylvania",
        "memphis",
        "boston",
        "chicago",
        "ma",
        "pa",
        "tn",
        "ny",
        "tx",
      ],
      nigeria: ["nigeria", "ng", "lagos", "abuja", "ikeja", "port harcourt"],
      ghana: ["ghana", "gh", "accra", "kumasi"],
      "united-kingdom": ["united kingdom", "uk", "england", "london", "manchester", "scotland"],
      philippines: ["philippines", "ph", "manila", "cebu"],
    },
  },
};
