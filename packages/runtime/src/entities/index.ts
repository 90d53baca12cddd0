export { AnchorPoint } from './anchor-point.js';
export { Entity, type StartingItemsOptions } from './entity.js';
export { Hero } from './hero.js';
export { Monster } from './monster.js';
export { isHero, isMonster } from './guards.js';
