export {
  Equipment,
  type EquipmentOptions,
  type PlacementOptions,
  type ItemPlacement,
} from './equipment.js';
export { Weapon } from './weapon.js';
export { Armor } from './armor.js';
export { Purse } from './purse.js';
export { Backpack } from './backpack.js';
export { isWeapon, isArmor, isPurse, isBackpack } from './guards.js';
export { createEquipment, type AnyEquipment } from './factory.js';
