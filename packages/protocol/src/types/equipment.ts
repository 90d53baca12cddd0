// Equipment types - the things entities carry around

/**
 * The four kinds of equipment. Identifiers are unique within a category.
 */
export type EquipmentCategory = 'weapon' | 'armor' | 'purse' | 'backpack';

export const EQUIPMENT_CATEGORIES: readonly EquipmentCategory[] = [
  'weapon',
  'armor',
  'purse',
  'backpack',
];

/**
 * Highest base value (in dukaten) a new piece of equipment may have
 */
export const MAX_BASE_VALUE: Readonly<Record<EquipmentCategory, number>> = {
  weapon: 200,
  armor: 1000,
  purse: 0,
  backpack: 500,
};

// --- Weapons ---

/** Weapon and monster damage must be a multiple of this step */
export const DAMAGE_STEP = 7;

export const MAX_DAMAGE = 100;

/** Dukaten a weapon is worth per point of damage */
export const WEAPON_VALUE_PER_DAMAGE = 2;

// --- Armor ---

/**
 * Armor material. Each maps to a maximal protection.
 */
export type ArmorType = 'tin' | 'bronze';

export const ARMOR_TYPES: Readonly<Record<ArmorType, { maxProtection: number }>> = {
  tin: { maxProtection: 70 },
  bronze: { maxProtection: 90 },
};

// --- Purses ---

/** Weight added to a purse for every dukat it holds */
export const DUKAT_WEIGHT = 50;

// --- Construction inputs ---

/**
 * Fields shared by every equipment construction input
 */
export type EquipmentBaseInput = {
  /** Weight, integer >= 0 */
  weight: number;

  /** Base value in dukaten, 0 when omitted */
  baseValue?: number;

  /** Looting priority flag, true when omitted */
  shiny?: boolean;
};

export type WeaponInput = EquipmentBaseInput & {
  damage: number;
};

export type ArmorInput = EquipmentBaseInput & {
  type: ArmorType;

  /** Defaults to the type's maximal protection */
  currentProtection?: number;
};

export type PurseInput = {
  weight: number;
  capacity: number;

  /** Dukaten already inside, 0 when omitted */
  contents?: number;

  shiny?: boolean;
};

export type BackpackInput = EquipmentBaseInput & {
  /** Maximal total weight of the contents */
  capacity: number;
};

/**
 * Tagged construction input for any category
 */
export type EquipmentInput =
  | ({ category: 'weapon' } & WeaponInput)
  | ({ category: 'armor' } & ArmorInput)
  | ({ category: 'purse' } & PurseInput)
  | ({ category: 'backpack' } & BackpackInput);
