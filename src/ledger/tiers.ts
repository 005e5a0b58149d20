export enum Tier {
  BRONZE = 1,
  SILVER = 2,
  GOLD = 3,
  PLATINUM = 4,
  DIAMOND = 5,
}

// Minimum level for each tier above Bronze, highest first
const LEVEL_THRESHOLDS: ReadonlyArray<readonly [number, Tier]> = [
  [9, Tier.DIAMOND],
  [7, Tier.PLATINUM],
  [5, Tier.GOLD],
  [3, Tier.SILVER],
];

export function tierForLevel(level: number): Tier {
  for (const [minLevel, tier] of LEVEL_THRESHOLDS) {
    if (level >= minLevel) return tier;
  }
  return Tier.BRONZE;
}

export function tierName(tier: Tier): string {
  return Tier[tier];
}
