const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

export const tokenize = (text: string): readonly string[] =>
  text.toLowerCase().match(TOKEN_PATTERN) ?? [];

const containsRun = (tokens: readonly string[], run: readonly string[]): boolean => {
  if (run.length === 0 || run.length > tokens.length) {
    return false;
  }

  for (let start = 0; start + run.length <= tokens.length; start += 1) {
    let matched = true;
    for (let offset = 0; offset < run.length; offset += 1) {
      if (tokens[start + offset] !== run[offset]) {
        matched = false;
        break;
      }
    }

    if (matched) {
      return true;
    }
  }

  return false;
};

/**
 * Phrases match as whole-token runs: "ng" matches "Lagos, NG" but not "Reading".
 */
export const containsPhrase = (tokens: readonly string[], phrase: string): boolean =>
  containsRun(tokens, tokenize(phrase));

export const matchPhrases = (text: string, phrases: readonly string[]): readonly string[] => {
  const tokens = tokenize(text);
  const matches: string[] = [];

  for (const phrase of phrases) {
    const normalized = phrase.trim().toLowerCase();
    if (normalized.length > 0 && !matches.includes(normalized) && containsPhrase(tokens, normalized)) {
      matches.push(normalized);
    }
  }

  return matches;
};

export type RegionMatch = {
  region: string;
  indicator: string;
};

/**
 * The region whose longest matching indicator spans the most tokens wins.
 * Ties between regions and texts without any indicator resolve to null.
 */
export const resolveRegion = (
  location: string,
  regions: Readonly<Record<string, readonly string[]>>,
): RegionMatch | null => {
  const tokens = tokenize(location);
  let best: RegionMatch | null = null;
  let bestLength = 0;
  let tied = false;

  for (const region of Object.keys(regions).sort((a, b) => a.localeCompare(b))) {
    let regionBest: { indicator: string; length: number } | null = null;

    for (const indicator of regions[region] ?? []) {
      const run = tokenize(indicator);
      if (!containsRun(tokens, run)) {
        continue;
      }

      if (regionBest === null || run.length > regionBest.length) {
        regionBest = { indicator: run.join(" "), length: run.length };
      }
    }

    if (regionBest === null) {
      continue;
    }

    if (regionBest.length > bestLength) {
      best = { region, indicator: regionBest.indicator };
      bestLength = regionBest.length;
      tied = false;
    } else if (regionBest.length === bestLength) {
      tied = true;
    }
  }

  return tied ? null : best;
};
