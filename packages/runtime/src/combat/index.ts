export {
  hit,
  attackDamage,
  canWound,
  healAfterKill,
  type HitOptions,
  type HitResult,
} from './hit.js';
export {
  loot,
  collectTreasure,
  lootOrder,
  type LootReport,
  type LootOptions,
} from './loot.js';
export { Battle, createBattle, type BattleOptions } from './battle.js';
