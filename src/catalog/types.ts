export const COSMETIC_CATEGORIES = ['frame', 'badge', 'title', 'banner'] as const;
export type CosmeticCategory = (typeof COSMETIC_CATEGORIES)[number];

export const COSMETIC_RARITIES = ['common', 'uncommon', 'rare', 'epic', 'legendary', 'mythic'] as const;
export type CosmeticRarity = (typeof COSMETIC_RARITIES)[number];

export function isCosmeticCategory(value: unknown): value is CosmeticCategory {
  return typeof value === 'string' && COSMETIC_CATEGORIES.some((c) => c === value);
}

export function isCosmeticRarity(value: unknown): value is CosmeticRarity {
  return typeof value === 'string' && COSMETIC_RARITIES.some((r) => r === value);
}

export interface CosmeticItem {
  id: string;
  name: string;
  category: CosmeticCategory;
  rarity: CosmeticRarity;
  imageHash: string;
  /** 0 means unbounded */
  maxSupply: number;
  currentSupply: number;
  /** Advisory only; the catalog does not gate equips on profile tier. */
  minTier: number;
}

export type CreateItemInput = Omit<CosmeticItem, 'currentSupply'>;
