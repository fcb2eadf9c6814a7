import type { EvidenceValue, ProfileRecord, ReportedFinding } from "@deepxcheck/core";

export type ReportFormat = "json" | "text" | "md";

export const REPORT_FORMATS: readonly ReportFormat[] = ["text", "json", "md"];

export const BIO_PREVIEW_LENGTH = 100;

export const previewBio = (bio: string): string =>
  bio.length > BIO_PREVIEW_LENGTH ? `${bio.slice(0, BIO_PREVIEW_LENGTH)}...` : bio;

export const summarizeEvidence = (
  evidence: Readonly<Record<string, EvidenceValue>> | undefined,
): string | null => {
  if (evidence === undefined) {
    return null;
  }

  const entries = Object.entries(evidence)
    .sort((a, b) => a[0].localeCompare(b[0]))
    .map(([key, value]) => `${key}=${value}`);

  return entries.length === 0 ? null : entries.join(", ");
};

export const describeFinding = (finding: ReportedFinding): string =>
  `[${finding.severity.toUpperCase()}] ${finding.description}`;

export type ProfileLine = {
  label: string;
  value: string;
};

export const profileLines = (profile: ProfileRecord): readonly ProfileLine[] => [
  { label: "Name", value: profile.displayName ?? "N/A" },
  { label: "Handle", value: profile.username },
  { label: "Bio", value: profile.bio.length === 0 ? "N/A" : previewBio(profile.bio) },
  { label: "Location", value: profile.declaredLocation ?? "N/A" },
  { label: "Technical", value: profile.technicalLocation ?? "N/A" },
  { label: "Joined", value: profile.joinDate ?? "N/A" },
  { label: "Followers", value: String(profile.followers) },
  { label: "Following", value: String(profile.following) },
];
