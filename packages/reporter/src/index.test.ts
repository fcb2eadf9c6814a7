import type { RiskReport } from "@deepxcheck/core";
import { describe, expect, it } from "vitest";
import { formatReport, formatReports, printReport } from "./index.js";

const RULE = "=".repeat(60);

const discoveryReport: RiskReport = {
  schemaVersion: "deepxcheck.report.v1",
  meta: {
    tool: "DeepXCheck",
    riskModelVersion: "rules-v1",
    mode: "discovery",
    analyzedAt: "2025-03-01T12:00:00.000Z",
    disclaimer: "Educational analysis - patterns anonymized",
  },
  subject: { identifier: "@[REDACTED]", anonymization: "redacted" },
  profile: {
    username: "@[REDACTED]",
    declaredLocation: "New York, USA",
    technicalLocation: "Nigeria",
    bio: "Send me CashApp for blessing $$$",
    followers: 1500,
    following: 10,
  },
  assessment: { score: 5, maxScore: 10, normalizedScore: 0.5, level: "medium", findingCount: 2 },
  findings: [
    {
      category: "geo-mismatch",
      severity: "high",
      weight: 3,
      description: "Declared location does not match the technical location",
    },
    {
      category: "scam-bio",
      severity: "medium",
      weight: 2,
      description: "Bio uses language typical of payment or investment scams",
    },
  ],
  recommendations: [
    "Verify geographical claims before extending trust",
    "Never send money to accounts that solicit payments in their bio",
  ],
  completeness: { complete: true, missingFields: [] },
};

const expertReport: RiskReport = {
  ...discoveryReport,
  meta: { ...discoveryReport.meta, mode: "expert", disclaimer: "EXPERT MODE - IDENTIFYING DATA VISIBLE." },
  subject: { identifier: "@ExampleUser", anonymization: "none" },
  profile: { ...discoveryReport.profile, username: "@ExampleUser", bio: "x".repeat(120) },
  findings: [
    {
      category: "geo-mismatch",
      severity: "high",
      weight: 3,
      description: "Declared location: New York, USA (united-states), technical location: Nigeria (nigeria)",
      evidence: { technicalRegion: "nigeria", declaredRegion: "united-states" },
    },
  ],
  completeness: { complete: false, missingFields: ["joinDate"] },
  trace: {
    schemaVersion: "1",
    evaluations: [
      { category: "geo-mismatch", triggered: true, weight: 3 },
      { category: "like-fishing", triggered: false, weight: 0 },
    ],
  },
};

describe("formatReport", () => {
  it("renders the discovery console layout without profile details", () => {
    expect(formatReport(discoveryReport, "text")).toBe(
      [
        RULE,
        "DEEPXCHECK ANALYSIS REPORT",
        RULE,
        "",
        "Mode: DISCOVERY",
        "Date: 2025-03-01T12:00:00.000Z",
        "Subject: @[REDACTED]",
        "",
        "Risk score: 5/10 - MEDIUM",
        "Red flags detected: 2",
        "",
        "Red flags",
        "  1. [HIGH] Declared location does not match the technical location",
        "  2. [MEDIUM] Bio uses language typical of payment or investment scams",
        "",
        "Recommendations",
        "  - Verify geographical claims before extending trust",
        "  - Never send money to accounts that solicit payments in their bio",
        "",
        RULE,
        "End of report - use responsibly",
        RULE,
      ].join("\n"),
    );
  });

  it("adds the profile, evidence, trace and disclaimer in expert mode", () => {
    const lines = formatReport(expertReport, "text").split("\n");

    expect(lines).toContain("  Handle: @ExampleUser");
    expect(lines).toContain(`  Bio: ${"x".repeat(100)}...`);
    expect(lines).toContain("  Joined: N/A");
    expect(lines).toContain("     evidence: declaredRegion=united-states, technicalRegion=nigeria");
    expect(lines).toContain("Incomplete profile, missing: joinDate");
    expect(lines).toContain("  geo-mismatch: triggered (weight 3)");
    expect(lines).toContain("  like-fishing: clear");
    expect(lines).toContain("EXPERT MODE DISCLAIMER:");
  });

  it("renders markdown sections", () => {
    const lines = formatReport(expertReport, "md").split("\n");

    expect(lines[0]).toBe("# DeepXCheck Report");
    expect(lines).toContain("- risk level: `medium`");
    expect(lines).toContain(
      "- **geo-mismatch** (high, weight `3`): Declared location: New York, USA (united-states), technical location: Nigeria (nigeria)",
    );
    expect(lines).toContain("- missing: `joinDate`");
    expect(formatReport(discoveryReport, "md").split("\n")).not.toContain("## Profile");
  });

  it("renders json that round-trips", () => {
    expect(JSON.parse(formatReport(discoveryReport, "json"))).toEqual(discoveryReport);
  });
});

describe("formatReports", () => {
  it("renders one report as an object and several as an array", () => {
    expect(JSON.parse(formatReports([discoveryReport], "json"))).toEqual(discoveryReport);
    expect(JSON.parse(formatReports([discoveryReport, expertReport], "json"))).toHaveLength(2);
  });

  it("separates text reports with a blank line", () => {
    const rendered = formatReports([discoveryReport, discoveryReport], "text");
    expect(rendered).toBe(`${formatReport(discoveryReport, "text")}\n\n${formatReport(discoveryReport, "text")}`);
  });
});

describe("printReport", () => {
  it("writes the rendering followed by a newline", () => {
    const chunks: string[] = [];
    printReport(discoveryReport, { format: "md", write: (chunk) => chunks.push(chunk) });

    expect(chunks).toEqual([`${formatReport(discoveryReport, "md")}\n`]);
  });
});
