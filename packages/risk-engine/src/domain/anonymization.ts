import type {
  AnalysisMode,
  Anonymization,
  Finding,
  ProfileRecord,
  ReportedFinding,
} from "@deepxcheck/core";

export const REDACTED_USERNAME = "@[REDACTED]";
export const ANONYMIZED_NAME = "[ANONYMIZED]";
export const REDACTED_CHANNEL = "[CHANNEL]";

const MENTION_PATTERN = /@\w+/g;
const TELEGRAM_LINK_PATTERN = /t\.me\/[\w/+-]+/gi;

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

export const maskIdentifier = (username: string): string =>
  username.length > 4 ? `${username.slice(0, 2)}***${username.slice(-2)}` : "***";

export const redactText = (text: string, username: string): string => {
  let redacted = text
    .replace(MENTION_PATTERN, "@[USER]")
    .replace(TELEGRAM_LINK_PATTERN, "t.me/[CHANNEL]");

  const handle = username.replace(/^@+/, "");
  if (handle.length > 0) {
    redacted = redacted.replace(new RegExp(`(?<!\\w)${escapeRegExp(handle)}(?!\\w)`, "gi"), "[REDACTED]");
  }

  return redacted;
};

export const anonymizationFor = (mode: AnalysisMode): Anonymization => {
  switch (mode) {
    case "discovery":
      return "redacted";
    case "investigation":
      return "masked";
    case "expert":
      return "none";
  }
};

export const presentIdentifier = (username: string, mode: AnalysisMode): string => {
  switch (mode) {
    case "discovery":
      return REDACTED_USERNAME;
    case "investigation":
      return maskIdentifier(username);
    case "expert":
      return username;
  }
};

export const presentProfile = (profile: ProfileRecord, mode: AnalysisMode): ProfileRecord => {
  if (mode === "expert") {
    return { ...profile };
  }

  if (mode === "investigation") {
    return { ...profile, username: maskIdentifier(profile.username) };
  }

  const redact = (value: string): string => redactText(value, profile.username);

  return {
    ...profile,
    username: REDACTED_USERNAME,
    bio: redact(profile.bio),
    ...(profile.declaredLocation === undefined ? {} : { declaredLocation: redact(profile.declaredLocation) }),
    ...(profile.technicalLocation === undefined ? {} : { technicalLocation: redact(profile.technicalLocation) }),
    ...(profile.device === undefined ? {} : { device: redact(profile.device) }),
    ...(profile.lastNameChange === undefined ? {} : { lastNameChange: redact(profile.lastNameChange) }),
    ...(profile.displayName === undefined ? {} : { displayName: ANONYMIZED_NAME }),
    ...(profile.sharedChannels === undefined
      ? {}
      : { sharedChannels: profile.sharedChannels.map(() => REDACTED_CHANNEL) }),
  };
};

export const presentFinding = (finding: Finding, mode: AnalysisMode): ReportedFinding => {
  const base = {
    category: finding.category,
    severity: finding.severity,
    weight: finding.weight,
  };

  if (mode === "discovery") {
    return { ...base, description: finding.summary };
  }

  if (mode === "investigation") {
    return { ...base, description: finding.detail };
  }

  return { ...base, description: finding.detail, evidence: { ...finding.evidence } };
};
