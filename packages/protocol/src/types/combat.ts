// Combat constants

/** Attack rolls are uniform integers in [ROLL_MIN, ROLL_MAX] */
export const ROLL_MIN = 0;
export const ROLL_MAX = 100;

/**
 * Hero damage is floor((attackPower - HERO_DAMAGE_OFFSET) / HERO_DAMAGE_DIVISOR),
 * never below zero.
 */
export const HERO_DAMAGE_OFFSET = 10;
export const HERO_DAMAGE_DIVISOR = 2;

/** Which side of an exchange a participant is on */
export type CombatRole = 'attacker' | 'defender';

/**
 * Lifecycle of a battle
 */
export type BattleStatus = 'not_started' | 'in_progress' | 'resolved';
