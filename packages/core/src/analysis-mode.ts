import { UnknownModeError } from "./errors.js";

export const ANALYSIS_MODES = ["discovery", "investigation", "expert"] as const;

export type AnalysisMode = (typeof ANALYSIS_MODES)[number];

export const isAnalysisMode = (value: string): value is AnalysisMode =>
  (ANALYSIS_MODES as readonly string[]).includes(value);

/**
 * Accepts any casing and surrounding whitespace, so `"Expert"` and `" discovery "` both parse.
 */
export const parseAnalysisMode = (value: string): AnalysisMode => {
  const normalized = value.trim().toLowerCase();
  if (isAnalysisMode(normalized)) {
    return normalized;
  }

  throw new UnknownModeError(value);
};
