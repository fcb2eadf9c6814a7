import type { Finding, FindingCategory, ProfileRecord } from "@deepxcheck/core";
import type { RiskEngineConfig } from "../config.js";
import { accountAgeDays, parseJoinDate } from "./join-date.js";
import { matchPhrases, resolveRegion } from "./text-matching.js";

export type CheckContext = {
  config: RiskEngineConfig;
  asOf: Date;
};

export type ProfileCheck = {
  category: FindingCategory;
  run: (profile: ProfileRecord, context: CheckContext) => readonly Finding[];
};

const round1 = (value: number): number => Number(value.toFixed(1));

const geoMismatch: ProfileCheck = {
  category: "geo-mismatch",
  run: (profile, { config }) => {
    const declared = profile.declaredLocation;
    const technical = profile.technicalLocation;
    if (declared === undefined || technical === undefined) {
      return [];
    }

    const declaredRegion = resolveRegion(declared, config.lexicon.regions);
    const technicalRegion = resolveRegion(technical, config.lexicon.regions);
    if (
      declaredRegion === null ||
      technicalRegion === null ||
      declaredRegion.region === technicalRegion.region
    ) {
      return [];
    }

    return [
      {
        category: "geo-mismatch",
        severity: "high",
        weight: config.weights.geoMismatch,
        summary: "Declared location does not match the technical location",
        detail: `Declared location: ${declared} (${declaredRegion.region}), technical location: ${technical} (${technicalRegion.region})`,
        evidence: {
          declaredLocation: declared,
          declaredRegion: declaredRegion.region,
          technicalLocation: technical,
          technicalRegion: technicalRegion.region,
        },
      },
    ];
  },
};

const suspiciousGrowth: ProfileCheck = {
  category: "suspicious-growth",
  run: (profile, { config, asOf }) => {
    if (profile.joinDate === undefined) {
      return [];
    }

    const joinedAt = parseJoinDate(profile.joinDate);
    if (joinedAt === null) {
      return [];
    }

    const ageDays = accountAgeDays(joinedAt, asOf);
    const { recentAccountDays, growthFollowerFloor } = config.thresholds;
    if (ageDays >= recentAccountDays || profile.followers <= growthFollowerFloor) {
      return [];
    }

    return [
      {
        category: "suspicious-growth",
        severity: "medium",
        weight: config.weights.suspiciousGrowth,
        summary: "Recently created account with an unusually large audience",
        detail: `Recent account (${profile.joinDate}, ${ageDays} days old) with ${profile.followers} followers`,
        evidence: {
          joinDate: profile.joinDate,
          accountAgeDays: ageDays,
          followers: profile.followers,
        },
      },
    ];
  },
};

const identityInstability: ProfileCheck = {
  category: "identity-instability",
  run: (profile, { config }) => {
    const nameChanges = profile.nameChanges ?? 0;
    if (nameChanges < config.thresholds.nameChangeLimit) {
      return [];
    }

    const lastChange = profile.lastNameChange ?? "unknown";
    return [
      {
        category: "identity-instability",
        severity: "medium",
        weight: config.weights.identityInstability,
        summary: "Username changed repeatedly",
        detail: `${nameChanges} username changes, last: ${lastChange}`,
        evidence: {
          nameChanges,
          lastNameChange: lastChange,
        },
      },
    ];
  },
};

const telegramPromotion: ProfileCheck = {
  category: "telegram-promotion",
  run: (profile, { config }) => {
    const bio = profile.bio.toLowerCase();
    const pattern = config.lexicon.telegramPatterns.find((candidate) =>
      bio.includes(candidate.toLowerCase()),
    );
    if (pattern === undefined) {
      return [];
    }

    return [
      {
        category: "telegram-promotion",
        severity: "medium",
        weight: config.weights.telegramPromotion,
        summary: "Bio promotes a Telegram channel",
        detail: `Telegram reference "${pattern}" found in bio (common for coordinated groups)`,
        evidence: { pattern },
      },
    ];
  },
};

const scamBio: ProfileCheck = {
  category: "scam-bio",
  run: (profile, { config }) => {
    const phrases = matchPhrases(profile.bio, config.lexicon.scamPhrases);
    if (phrases.length === 0) {
      return [];
    }

    const escalated = phrases.length >= config.thresholds.scamPhraseEscalation;
    return [
      {
        category: "scam-bio",
        severity: "medium",
        weight: escalated ? config.weights.scamBioEscalated : config.weights.scamBio,
        summary: "Bio uses language typical of payment or investment scams",
        detail: `Bio contains suspicious phrases: ${phrases.join(", ")}`,
        evidence: {
          phrases: phrases.join(", "),
          phraseCount: phrases.length,
        },
      },
    ];
  },
};

const suspiciousRatio: ProfileCheck = {
  category: "suspicious-ratio",
  run: (profile, { config }) => {
    // Zero followers divide by one, so mass-following fresh accounts still register.
    const ratio = profile.following / Math.max(profile.followers, 1);
    if (ratio <= config.thresholds.followRatioLimit) {
      return [];
    }

    return [
      {
        category: "suspicious-ratio",
        severity: "low",
        weight: config.weights.suspiciousRatio,
        summary: "Follows far more accounts than follow it back",
        detail: `Following ${profile.following} but only ${profile.followers} followers (ratio: ${round1(ratio).toFixed(1)})`,
        evidence: {
          following: profile.following,
          followers: profile.followers,
          ratio: round1(ratio),
        },
      },
    ];
  },
};

const coordinatedNetwork: ProfileCheck = {
  category: "coordinated-network",
  run: (profile, { config }) => {
    const channels = profile.sharedChannels ?? [];
    if (channels.length < config.thresholds.sharedChannelLimit) {
      return [];
    }

    return [
      {
        category: "coordinated-network",
        severity: "high",
        weight: config.weights.coordinatedNetwork,
        summary: "Shares channels with other suspicious accounts",
        detail: `Shares ${channels.length} channels with other suspicious accounts`,
        evidence: {
          sharedChannelCount: channels.length,
          sharedChannels: channels.join(", "),
        },
      },
    ];
  },
};

const likeFishing: ProfileCheck = {
  category: "like-fishing",
  run: (profile, { config }) => {
    if (profile.likeFishing !== true) {
      return [];
    }

    return [
      {
        category: "like-fishing",
        severity: "medium",
        weight: config.weights.likeFishing,
        summary: "Uses likes to attract attention",
        detail: "Uses likes to attract attention before DM scams",
        evidence: { likeFishing: true },
      },
    ];
  },
};

export const PROFILE_CHECKS: readonly ProfileCheck[] = [
  geoMismatch,
  suspiciousGrowth,
  identityInstability,
  telegramPromotion,
  scamBio,
  suspiciousRatio,
  coordinatedNetwork,
  likeFishing,
];
