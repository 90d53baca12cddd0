// Single attack
//
// Roll in [0, 100]; the attack connects when the roll reaches the
// defender's effective protection. Both sides count as fighting for the
// duration, so hit points are only rounded to a prime afterwards (and not
// at all inside a battle, which keeps both sides fighting throughout).

import {
  HERO_DAMAGE_DIVISOR,
  HERO_DAMAGE_OFFSET,
  ROLL_MAX,
  ROLL_MIN,
} from '@armory/protocol';
import type { Entity } from '../entities/entity.js';
import type { Hero } from '../entities/hero.js';
import { isHero, isMonster } from '../entities/guards.js';
import { NullTargetError } from '../errors.js';
import { getDefaultLogger, type Logger } from '../logging.js';
import { getDefaultRng, nextInt, type Rng } from '../rng.js';
import { collectTreasure, loot, type LootReport } from './loot.js';

export type HitOptions = {
  rng?: Rng;
  logger?: Logger;
};

export type HitResult = {
  roll: number;
  /** Protection the roll had to reach */
  protection: number;
  connected: boolean;
  /** Hit points taken from the defender */
  damage: number;
  fatal: boolean;
  /** Hit points the attacker regained after a kill */
  healed: number;
  /** What changed hands after a kill */
  loot: LootReport | null;
};

/**
 * Damage the attacker deals to the defender when a hit connects.
 *
 * A hero deals floor((attack power - 10) / 2). A monster deals its damage
 * minus the defender's base protection. Never negative.
 */
export function attackDamage(attacker: Entity, defender: Entity): number {
  if (isHero(attacker)) {
    return Math.max(
      0,
      Math.floor((attacker.attackPower() - HERO_DAMAGE_OFFSET) / HERO_DAMAGE_DIVISOR)
    );
  }
  if (isMonster(attacker)) {
    return Math.max(0, attacker.damage - defender.protection);
  }
  return 0;
}

/**
 * Whether the attacker has any chance of taking hit points off the defender
 */
export function canWound(attacker: Entity, defender: Entity): boolean {
  return attackDamage(attacker, defender) > 0 && defender.effectiveProtection() <= ROLL_MAX;
}

/**
 * Heal a hero by a random percentage of its missing hit points
 *
 * @returns hit points requested (before rounding to a prime outside combat)
 */
export function healAfterKill(hero: Hero, rng: Rng = getDefaultRng()): number {
  const missing = hero.maxHitPoints - hero.hitPoints;
  if (missing <= 0) return 0;
  const amount = Math.floor((missing * nextInt(rng, 0, 100)) / 100);
  hero.addHitPoints(amount);
  return amount;
}

/**
 * Resolve one attack.
 *
 * A connecting hit is fatal when it takes all remaining hit points, or
 * leaves exactly one (no prime lies at or below one). The defender then
 * drops to zero; a hero attacker heals and collects treasure, a monster
 * attacker loots.
 *
 * @throws NullTargetError if either side is missing
 */
export function hit(attacker: Entity | null, defender: Entity | null, options: HitOptions = {}): HitResult {
  if (attacker === null) throw new NullTargetError('attacker');
  if (defender === null) throw new NullTargetError('defender');

  const rng = options.rng ?? getDefaultRng();
  const logger = options.logger ?? getDefaultLogger();

  return attacker.withFighting(() =>
    defender.withFighting(() => {
      const roll = nextInt(rng, ROLL_MIN, ROLL_MAX);
      const protection = defender.effectiveProtection();
      const result: HitResult = {
        roll,
        protection,
        connected: false,
        damage: 0,
        fatal: false,
        healed: 0,
        loot: null,
      };

      if (roll < protection) {
        logger.debug(`${attacker.name} misses ${defender.name}`, { roll, protection });
        return result;
      }

      const before = defender.hitPoints;
      const damage = attackDamage(attacker, defender);
      result.connected = true;
      result.fatal = before > 0 && damage > 0 && before - damage <= 1;
      result.damage = result.fatal ? before : Math.min(damage, before);
      defender.removeHitPoints(result.damage);
      logger.debug(`${attacker.name} hits ${defender.name}`, {
        roll,
        protection,
        damage: result.damage,
        hitPoints: defender.hitPoints,
      });

      if (!result.fatal) return result;

      logger.info(`${attacker.name} kills ${defender.name}`);
      if (isHero(attacker)) {
        result.healed = healAfterKill(attacker, rng);
        if (result.healed > 0) {
          logger.info(`${attacker.name} heals ${result.healed}`, { hitPoints: attacker.hitPoints });
        }
        result.loot = collectTreasure(attacker, defender, { logger });
      } else if (isMonster(attacker)) {
        result.loot = loot(attacker, defender, { logger });
      }
      return result;
    })
  );
}
