export interface LevelProgress {
  level: number;
  xp: number;
  xpToNext: number | null;
}

export interface LevelStep<T> {
  level: number;
  entry: T;
}

/**
 * Cascades level-ups: while the current threshold is defined and reached,
 * subtract it and move to the next level. A level with no table entry ends
 * the cascade with a null threshold.
 */
export function cascadeLevels<T extends { xp_to_next_level: number | null }>(
  start: LevelProgress,
  table: Record<string, T>,
  onLevelUp?: (step: LevelStep<T | undefined>) => void
): LevelProgress {
  let { level, xp, xpToNext } = start;

  while (xpToNext !== null && xpToNext > 0 && xp >= xpToNext) {
    xp -= xpToNext;
    level += 1;
    const entry: T | undefined = table[String(level)];
    xpToNext = entry?.xp_to_next_level ?? null;
    onLevelUp?.({ level, entry });
  }

  return { level, xp, xpToNext };
}

export function thresholdFor<T extends { xp_to_next_level: number | null }>(
  table: Record<string, T>,
  level: number
): number | null {
  const entry: T | undefined = table[String(level)];
  return entry?.xp_to_next_level ?? null;
}
