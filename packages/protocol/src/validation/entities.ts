// Entity construction schemas

import { z } from 'zod';
import { HERO_BASE_PROTECTION, SKIN_TYPES } from '../types/entities.js';
import { damageSchema } from './equipment.js';
import { isValidHeroName, isValidMonsterName } from './names.js';

const maxHitPointsSchema = z.number().int().positive('maximum hit points must be positive');

export const heroInputSchema = z.object({
  name: z.string().refine(isValidHeroName, { message: 'invalid hero name' }),
  maxHitPoints: maxHitPointsSchema,
  strength: z.number().finite().positive('strength must be positive'),
  protection: z.number().int().min(0, 'protection cannot be negative').default(HERO_BASE_PROTECTION),
});

export const monsterInputSchema = z
  .object({
    name: z.string().refine(isValidMonsterName, { message: 'invalid monster name' }),
    maxHitPoints: maxHitPointsSchema,
    damage: damageSchema,
    skin: z.enum(['tough', 'thick', 'scaly']),
    currentProtection: z.number().int().min(0, 'protection cannot be negative').optional(),
    anchorCount: z.number().int().min(0, 'anchor count cannot be negative').optional(),
    capacity: z.number().int().min(0, 'capacity cannot be negative').optional(),
  })
  .superRefine((input, ctx) => {
    const max = SKIN_TYPES[input.skin].maxProtection;
    if (input.currentProtection !== undefined && input.currentProtection > max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['currentProtection'],
        message: `protection cannot exceed ${max} for ${input.skin} skin`,
      });
    }
  });
