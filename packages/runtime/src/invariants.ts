// Ownership graph audit
//
// Walks entities and items and reports every broken invariant as a
// readable line. Used by tests after random sequences of operations; an
// empty list means the graph is consistent.

import { isPrime } from '@armory/protocol';
import type { Entity } from './entities/entity.js';
import { isHero } from './entities/guards.js';
import type { Equipment } from './equipment/equipment.js';
import { isBackpack } from './equipment/guards.js';

function label(item: Equipment): string {
  return `${item.category} ${item.identifier}`;
}

function itemViolations(item: Equipment): string[] {
  const violations: string[] = [];
  const owner = item.directOwner;
  const container = item.container;

  if (owner !== null && container !== null) {
    violations.push(`${label(item)} is both anchored on ${owner.name} and in a backpack`);
  }
  if (owner !== null && !owner.hasItem(item)) {
    violations.push(`${label(item)} points to ${owner.name}, which does not hold it`);
  }
  if (container !== null && !container.has(item)) {
    violations.push(`${label(item)} points to ${label(container)}, which does not list it`);
  }
  if (isBackpack(item)) {
    for (const content of item.items()) {
      if (content.container !== item) {
        violations.push(`${label(item)} lists ${label(content)}, which points elsewhere`);
      }
    }
    if (item.contentWeight() > item.capacity) {
      violations.push(
        `${label(item)} holds weight ${item.contentWeight()} over capacity ${item.capacity}`
      );
    }
  }
  return violations;
}

function entityViolations(entity: Entity): string[] {
  const violations: string[] = [];

  for (const anchor of entity.anchorPoints()) {
    const item = anchor.item;
    if (item !== null && item.directOwner !== entity) {
      violations.push(`${entity.name} holds ${label(item)}, which points elsewhere`);
    }
  }

  const hp = entity.hitPoints;
  if (hp < 0 || hp > entity.maxHitPoints) {
    violations.push(`${entity.name} has ${hp} hit points, outside [0, ${entity.maxHitPoints}]`);
  }
  if (!entity.isFighting() && hp !== 0 && !isPrime(hp)) {
    violations.push(`${entity.name} rests at ${hp} hit points, which is not prime`);
  }

  if (isHero(entity)) {
    const mirrors = [
      ['leftHand', entity.leftHandWeapon],
      ['rightHand', entity.rightHandWeapon],
      ['body', entity.armor],
    ] as const;
    for (const [anchorName, equipped] of mirrors) {
      if ((entity.anchorPoint(anchorName)?.item ?? null) !== equipped) {
        violations.push(`${entity.name} has a stale ${anchorName} reference`);
      }
    }
  }

  return violations;
}

/**
 * Every broken invariant among the given entities and items
 */
export function findOwnershipViolations(
  entities: readonly Entity[],
  items: readonly Equipment[]
): string[] {
  const violations = [
    ...items.flatMap(itemViolations),
    ...entities.flatMap(entityViolations),
  ];

  const seen = new Map<string, Equipment>();
  for (const item of items) {
    if (item.isDestroyed()) continue;
    const key = label(item);
    const other = seen.get(key);
    if (other !== undefined && other !== item) {
      violations.push(`${key} is shared by two live items`);
    }
    seen.set(key, item);
  }

  return violations;
}
