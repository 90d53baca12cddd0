// Narrowing by entity category

import type { Entity } from './entity.js';
import type { Hero } from './hero.js';
import type { Monster } from './monster.js';

export function isHero(entity: Entity | null): entity is Hero {
  return entity?.category === 'hero';
}

export function isMonster(entity: Entity | null): entity is Monster {
  return entity?.category === 'monster';
}
