// Re-export all protocol types

export * from './common.js';
export * from './equipment.js';
export * from './entities.js';
export * from './combat.js';
