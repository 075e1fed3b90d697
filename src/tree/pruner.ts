import type { Branch } from '../types/index.js';

/**
 * Select the next beam from a set of scored branches.
 *
 * Drops anything below the threshold, orders the rest by score (highest
 * first, generation order on ties) and keeps at most `beamWidth`.
 * Unscored branches never survive. Pure: the input array is not touched.
 */
export function prune(
  branches: readonly Branch[],
  beamWidth: number,
  minScoreThreshold: number
): Branch[] {
  const passing = branches.filter(
    (b): b is Branch & { score: number } => b.score !== null && b.score >= minScoreThreshold
  );
  // Array.prototype.sort is stable, so equal scores keep generation order
  const sorted = [...passing].sort((a, b) => b.score - a.score);
  return sorted.slice(0, Math.max(0, beamWidth));
}
