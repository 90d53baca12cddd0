// Looting
//
// After a kill, the winner goes through the loser's anchored items, shiny
// ones first, keeping anchor order within each group. Backpacks move with
// their contents.

import type { Entity } from '../entities/entity.js';
import type { Hero } from '../entities/hero.js';
import type { Monster } from '../entities/monster.js';
import type { Equipment } from '../equipment/equipment.js';
import { isArmor, isBackpack, isWeapon } from '../equipment/guards.js';
import { getDefaultLogger, type Logger } from '../logging.js';

export type LootReport = {
  /** Now on one of the winner's anchor points */
  claimed: Equipment[];
  /** Put into one of the winner's backpacks */
  stored: Equipment[];
  /** Shattered because nobody could take them */
  destroyed: Equipment[];
  /** Still with the defeated entity */
  left: Equipment[];
};

export type LootOptions = {
  logger?: Logger;
};

/**
 * Anchored items of an entity, shiny first, each group in anchor order
 */
export function lootOrder(entity: Entity): Equipment[] {
  const items = entity.items();
  return [...items.filter((item) => item.shiny), ...items.filter((item) => !item.shiny)];
}

function emptyReport(): LootReport {
  return { claimed: [], stored: [], destroyed: [], left: [] };
}

function describe(item: Equipment): Record<string, unknown> {
  return { category: item.category, identifier: item.identifier.toString(), shiny: item.shiny };
}

/**
 * A monster takes what it can from a defeated entity.
 *
 * Each item goes to a free anchor point of the monster if the monster
 * accepts it, and stays put if it is refused (too heavy). Once the
 * monster has no free anchor left, weapons and armors shatter and
 * backpacks and purses stay with the defeated entity.
 */
export function loot(monster: Monster, defeated: Entity, options: LootOptions = {}): LootReport {
  const logger = options.logger ?? getDefaultLogger();
  const report = emptyReport();

  for (const item of lootOrder(defeated)) {
    if (monster.hasFreeAnchorPoint()) {
      if (monster.canAccept(item)) {
        item.setOwner(monster);
        report.claimed.push(item);
        logger.info(`${monster.name} claims a ${item.category}`, describe(item));
      } else {
        report.left.push(item);
        logger.debug(`${monster.name} leaves a ${item.category}`, {
          ...describe(item),
          reason: monster.acceptanceFailure(item),
        });
      }
    } else if (isWeapon(item) || isArmor(item)) {
      item.destroy();
      report.destroyed.push(item);
      logger.info(`A ${item.category} of ${defeated.name} shatters`, describe(item));
    } else {
      report.left.push(item);
    }
  }

  return report;
}

/**
 * A hero collects treasure from a defeated entity.
 *
 * Each item goes to a free accepting anchor point of the hero, otherwise
 * into the first of the hero's anchored backpacks that accepts it,
 * otherwise it is left behind. Nothing is destroyed.
 */
export function collectTreasure(hero: Hero, defeated: Entity, options: LootOptions = {}): LootReport {
  const logger = options.logger ?? getDefaultLogger();
  const report = emptyReport();

  for (const item of lootOrder(defeated)) {
    if (hero.canAccept(item)) {
      item.setOwner(hero);
      report.claimed.push(item);
      logger.info(`${hero.name} takes a ${item.category}`, describe(item));
      continue;
    }

    const backpack = hero
      .items()
      .filter(isBackpack)
      .find((candidate) => candidate.canAccept(item));
    if (backpack !== undefined) {
      item.setBackpack(backpack);
      report.stored.push(item);
      logger.info(`${hero.name} stores a ${item.category}`, describe(item));
      continue;
    }

    report.left.push(item);
    logger.debug(`${hero.name} leaves a ${item.category}`, describe(item));
  }

  return report;
}
