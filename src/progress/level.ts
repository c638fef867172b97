export interface LevelProgress {
  total: number;
  level: number;
  remainder: number;
  /** Share of the current level already earned, in [0, 100) */
  progressPct: number;
}

// pointsPerLevel > 0 is guaranteed by loadEnvConfig
export function levelProgress(total: number, pointsPerLevel: number): LevelProgress {
  const level = Math.floor(total / pointsPerLevel);
  const remainder = total - level * pointsPerLevel;
  const progressPct = (remainder / pointsPerLevel) * 100;

  return { total, level, remainder, progressPct };
}
