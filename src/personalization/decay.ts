const MS_PER_DAY = 86_400_000;

/**
 * Exponential pull toward zero: `weight × exp(−elapsed / halfLife)`.
 * Elapsed time and half-life share a unit (days everywhere in this package).
 */
export function decay(weight: number, elapsed: number, halfLife: number): number {
  if (halfLife <= 0) {
    throw new RangeError(`halfLife must be positive, got ${halfLife}`);
  }
  if (elapsed <= 0) return weight;
  return weight * Math.exp(-elapsed / halfLife);
}

export function elapsedDays(since: string, now: Date): number {
  const then = Date.parse(since);
  if (Number.isNaN(then)) return 0;
  return Math.max(0, (now.getTime() - then) / MS_PER_DAY);
}
