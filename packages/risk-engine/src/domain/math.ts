export const round4 = (value: number): number => Number(value.toFixed(4));

export const clampScore = (value: number, max: number): number =>
  Number.isFinite(value) ? Math.min(max, Math.max(0, value)) : 0;

/**
 * Sums non-negative contributions and caps the total. Negative or non-finite
 * contributions count as zero, so adding a contribution never lowers the result.
 */
export const saturatingSum = (contributions: readonly number[], max: number): number => {
  let total = 0;

  for (const contribution of contributions) {
    if (Number.isFinite(contribution) && contribution > 0) {
      total += contribution;
    }
  }

  return clampScore(total, max);
};
