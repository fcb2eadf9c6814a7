import type { Finding, ProfileRecord } from "@deepxcheck/core";
import { describe, expect, it } from "vitest";
import { maskIdentifier, presentFinding, presentIdentifier, presentProfile, redactText } from "./anonymization.js";

const profile: ProfileRecord = {
  username: "@ExampleUser",
  displayName: "Example",
  bio: "Ping @friend or exampleuser at t.me/joinchat/xyz",
  followers: 10,
  following: 20,
  sharedChannels: ["t.me/alpha", "t.me/beta"],
};

const finding: Finding = {
  category: "coordinated-network",
  severity: "high",
  weight: 3,
  summary: "Shares channels with other suspicious accounts",
  detail: "Shares 2 channels with other suspicious accounts",
  evidence: { sharedChannelCount: 2 },
};

describe("maskIdentifier", () => {
  it("keeps the first and last two characters of longer identifiers", () => {
    expect(maskIdentifier("@ExampleUser")).toBe("@E***er");
    expect(maskIdentifier("@abc")).toBe("***");
  });
});

describe("redactText", () => {
  it("replaces mentions, Telegram links and the subject's own handle", () => {
    expect(redactText(profile.bio, profile.username)).toBe(
      "Ping @[USER] or [REDACTED] at t.me/[CHANNEL]",
    );
  });

  it("does not touch words that merely contain the handle", () => {
    expect(redactText("bob and bobby", "@bob")).toBe("[REDACTED] and bobby");
  });
});

describe("presentIdentifier", () => {
  it("redacts, masks or reveals the username by mode", () => {
    expect(presentIdentifier("@ExampleUser", "discovery")).toBe("@[REDACTED]");
    expect(presentIdentifier("@ExampleUser", "investigation")).toBe("@E***er");
    expect(presentIdentifier("@ExampleUser", "expert")).toBe("@ExampleUser");
  });
});

describe("presentProfile", () => {
  it("anonymizes every identifying field in discovery mode", () => {
    expect(presentProfile(profile, "discovery")).toEqual({
      username: "@[REDACTED]",
      displayName: "[ANONYMIZED]",
      bio: "Ping @[USER] or [REDACTED] at t.me/[CHANNEL]",
      followers: 10,
      following: 20,
      sharedChannels: ["[CHANNEL]", "[CHANNEL]"],
    });
  });

  it("only masks the username in investigation mode", () => {
    expect(presentProfile(profile, "investigation")).toEqual({ ...profile, username: "@E***er" });
  });

  it("returns a copy in expert mode", () => {
    const presented = presentProfile(profile, "expert");
    expect(presented).toEqual(profile);
    expect(presented).not.toBe(profile);
  });
});

describe("presentFinding", () => {
  it("uses the summary in discovery mode and the detail elsewhere", () => {
    expect(presentFinding(finding, "discovery")).toEqual({
      category: "coordinated-network",
      severity: "high",
      weight: 3,
      description: "Shares channels with other suspicious accounts",
    });
    expect(presentFinding(finding, "investigation").evidence).toBeUndefined();
    expect(presentFinding(finding, "expert")).toEqual({
      category: "coordinated-network",
      severity: "high",
      weight: 3,
      description: "Shares 2 channels with other suspicious accounts",
      evidence: { sharedChannelCount: 2 },
    });
  });
});
