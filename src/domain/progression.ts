/** XP required to advance one level. */
export const LEVEL_WIDTH = 1000;

/** Ordered tiers indexed by meetings booked; the last entry is open-ended. */
export const RANK_LADDER = [
  'Iron',
  'Bronze',
  'Silver',
  'Gold',
  'Platinum',
  'Emerald',
  'Diamond',
  'Master',
  'Grandmaster',
  'Challenger',
] as const;

export type Rank = (typeof RANK_LADDER)[number];

export interface LevelProgress {
  readonly current_level: number;
  readonly xp_in_current_level: number;
  readonly xp_to_next_level: number;
}

export function deriveLevel(totalXp: number): LevelProgress {
  const xpInLevel = totalXp % LEVEL_WIDTH;
  return {
    current_level: Math.floor(totalXp / LEVEL_WIDTH) + 1,
    xp_in_current_level: xpInLevel,
    xp_to_next_level: LEVEL_WIDTH - xpInLevel,
  };
}

/**
 * Maps a meeting count onto the ladder. Counts at or beyond the top
 * index all land on the final tier.
 */
export function rankForMeetings(meetingsBooked: number): Rank {
  const top = RANK_LADDER.length - 1;
  const index = Math.min(Math.max(Math.floor(meetingsBooked), 0), top);
  return RANK_LADDER[index] ?? 'Iron';
}
