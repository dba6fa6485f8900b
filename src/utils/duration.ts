import { DURATION_MINUTES, isDuration } from "../config/catalog";

export interface TimedEntry {
  game: { duration: string };
  durationMultiplier: number;
}

/**
 * Minutes a duration label stands for. "10+min" counts as 10.
 * Labels outside the enumeration fall back to parsing the leading number.
 */
export function durationToMinutes(duration: string): number {
  if (isDuration(duration)) return DURATION_MINUTES[duration];

  const match = /^(\d+)\+?\s*min$/.exec(duration.trim());
  return match ? Number(match[1]) : 0;
}

/**
 * Total planned minutes: sum of each game's minutes times its multiplier.
 */
export function totalDuration(entries: readonly TimedEntry[]): number {
  return entries.reduce(
    (sum, entry) => sum + durationToMinutes(entry.game.duration) * entry.durationMultiplier,
    0
  );
}
