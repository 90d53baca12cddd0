// Entity types - heroes and monsters that carry equipment and fight

/**
 * The two kinds of entity
 */
export type EntityCategory = 'hero' | 'monster';

// --- Heroes ---

/**
 * Named anchor points every hero has, in allocation order
 */
export const HERO_ANCHOR_NAMES = ['leftHand', 'rightHand', 'back', 'body', 'belt'] as const;

export type HeroAnchorName = (typeof HERO_ANCHOR_NAMES)[number];

export const HERO_BASE_PROTECTION = 10;

/** Carrying capacity per point of strength */
export const HERO_CAPACITY_PER_STRENGTH = 20;

export const HERO_MAX_ARMORS = 2;

export const HERO_MAX_PURSES = 1;

export type HeroInput = {
  name: string;

  /** Integer > 0. Starting hit points are the largest prime not above it. */
  maxHitPoints: number;

  /** Intrinsic strength, > 0, kept to two decimals */
  strength: number;

  /** Base protection, defaults to HERO_BASE_PROTECTION */
  protection?: number;
};

// --- Monsters ---

/**
 * Monster skin. Each maps to a maximal protection.
 */
export type SkinType = 'tough' | 'thick' | 'scaly';

export const SKIN_TYPES: Readonly<Record<SkinType, { maxProtection: number }>> = {
  tough: { maxProtection: 10 },
  thick: { maxProtection: 20 },
  scaly: { maxProtection: 30 },
};

export type MonsterInput = {
  name: string;
  maxHitPoints: number;

  /** Multiple of 7 in [7, 100] */
  damage: number;

  skin: SkinType;

  /** Defaults to the skin's maximal protection */
  currentProtection?: number;

  /** Number of anonymous anchor points, defaults to the configured count */
  anchorCount?: number;

  /**
   * Carrying capacity. Defaults to the total weight of the starting
   * loadout and may not be lower than it.
   */
  capacity?: number;
};
