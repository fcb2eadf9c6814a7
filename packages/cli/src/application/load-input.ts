import { readFile } from "node:fs/promises";
import { InvalidInputError, type ProfileRecord } from "@deepxcheck/core";
import {
  parseProfileRecord,
  parseRiskEngineConfigOverrides,
  type RiskEngineConfigOverrides,
} from "@deepxcheck/risk-engine";

const readJsonFile = async (path: string): Promise<unknown> => {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown read error";
    throw new InvalidInputError(`cannot read ${path}`, [message]);
  }

  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown parse error";
    throw new InvalidInputError(`${path} is not valid JSON`, [message]);
  }
};

const prefixIssues = (error: InvalidInputError, prefix: string): InvalidInputError =>
  new InvalidInputError(
    "invalid profile record",
    error.issues.map((issue) => `${prefix}${issue}`),
  );

/**
 * A profile file holds one profile object or an array of them.
 */
export const loadProfiles = async (path: string): Promise<readonly ProfileRecord[]> => {
  const parsed = await readJsonFile(path);

  if (!Array.isArray(parsed)) {
    return [parseProfileRecord(parsed)];
  }

  if (parsed.length === 0) {
    throw new InvalidInputError(`${path} contains no profiles`);
  }

  return parsed.map((entry: unknown, index) => {
    try {
      return parseProfileRecord(entry);
    } catch (error) {
      if (error instanceof InvalidInputError) {
        throw prefixIssues(error, `[${index}].`);
      }
      throw error;
    }
  });
};

export const loadConfigOverrides = async (path: string): Promise<RiskEngineConfigOverrides> =>
  parseRiskEngineConfigOverrides(await readJsonFile(path));
