// Equipment construction schemas
//
// Parsed with zod before any object is built, so a rejected input never
// leaves a half-constructed item or a registered identifier behind.

import { z } from 'zod';
import {
  ARMOR_TYPES,
  DAMAGE_STEP,
  MAX_BASE_VALUE,
  MAX_DAMAGE,
  type EquipmentCategory,
} from '../types/equipment.js';

const weightSchema = z.number().int().min(0, 'weight cannot be negative');

const baseValueSchema = (category: EquipmentCategory) =>
  z
    .number()
    .int()
    .min(0, 'base value cannot be negative')
    .max(MAX_BASE_VALUE[category], `base value cannot exceed ${MAX_BASE_VALUE[category]}`)
    .default(0);

/**
 * Damage shared by weapons and monsters: a positive multiple of 7, at most 100
 */
export const damageSchema = z
  .number()
  .int()
  .min(DAMAGE_STEP, `damage must be at least ${DAMAGE_STEP}`)
  .max(MAX_DAMAGE, `damage cannot exceed ${MAX_DAMAGE}`)
  .refine((damage) => damage % DAMAGE_STEP === 0, {
    message: `damage must be a multiple of ${DAMAGE_STEP}`,
  });

export const weaponInputSchema = z.object({
  weight: weightSchema,
  baseValue: baseValueSchema('weapon'),
  shiny: z.boolean().default(true),
  damage: damageSchema,
});

export const armorInputSchema = z
  .object({
    weight: weightSchema,
    baseValue: baseValueSchema('armor'),
    shiny: z.boolean().default(true),
    type: z.enum(['tin', 'bronze']),
    currentProtection: z.number().int().min(0, 'protection cannot be negative').optional(),
  })
  .superRefine((input, ctx) => {
    const max = ARMOR_TYPES[input.type].maxProtection;
    if (input.currentProtection !== undefined && input.currentProtection > max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['currentProtection'],
        message: `protection cannot exceed ${max} for ${input.type} armor`,
      });
    }
  });

export const purseInputSchema = z
  .object({
    weight: weightSchema,
    capacity: z.number().int().min(0, 'capacity cannot be negative'),
    contents: z.number().int().min(0, 'contents cannot be negative').default(0),
    shiny: z.boolean().default(true),
  })
  .superRefine((input, ctx) => {
    if (input.contents > input.capacity) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['contents'],
        message: `contents cannot exceed capacity ${input.capacity}`,
      });
    }
  });

export const backpackInputSchema = z.object({
  weight: weightSchema,
  baseValue: baseValueSchema('backpack'),
  shiny: z.boolean().default(true),
  capacity: z.number().int().min(0, 'capacity cannot be negative'),
});
