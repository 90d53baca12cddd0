// Runtime configuration
//
// Read once from the environment. Tests call loadConfig with their own
// map instead of touching process.env.

import { z } from 'zod';
import { MAX_IDENTIFIER, type LogThreshold } from '@armory/protocol';
import { InvalidConstructionArgumentError } from './errors.js';

export type ArmoryConfig = {
  /** Lowest level the default logger prints */
  logLevel: LogThreshold;

  /** Seed of the default random source; unseeded when absent */
  seed?: number;

  /** Anchor points a Monster gets when none are requested */
  monsterAnchors: number;

  /** Draws IdentityRegistry.generate makes before giving up */
  idMaxAttempts: number;

  /** Exclusive upper bound of armor identifiers */
  armorIdBound: bigint;
};

const envSchema = z.object({
  ARMORY_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
  ARMORY_SEED: z.coerce.number().int('must be an integer').optional(),
  ARMORY_MONSTER_ANCHORS: z.coerce.number().int('must be an integer').min(0).default(5),
  ARMORY_ID_MAX_ATTEMPTS: z.coerce.number().int('must be an integer').positive().default(100_000),
  ARMORY_ARMOR_ID_BOUND: z
    .string()
    .regex(/^\d+$/, 'must be a non-negative integer')
    .default('1000000')
    .transform((value) => BigInt(value))
    .refine((bound) => bound > 2n, 'must leave room for at least one prime')
    .refine((bound) => bound <= MAX_IDENTIFIER + 1n, 'must not exceed 2^63'),
});

/**
 * Parse configuration from an environment map.
 *
 * @throws InvalidConstructionArgumentError naming the offending variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ArmoryConfig {
  // Blank variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('ARMORY_') && value !== '')
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw InvalidConstructionArgumentError.fromZodError(result.error);
  }

  const parsed = result.data;
  return {
    logLevel: parsed.ARMORY_LOG_LEVEL,
    seed: parsed.ARMORY_SEED,
    monsterAnchors: parsed.ARMORY_MONSTER_ANCHORS,
    idMaxAttempts: parsed.ARMORY_ID_MAX_ATTEMPTS,
    armorIdBound: parsed.ARMORY_ARMOR_ID_BOUND,
  };
}

let configInstance: ArmoryConfig | null = null;

/**
 * Get the process configuration singleton.
 *
 * Parses process.env on first call, reuses the result afterwards.
 */
export function getConfig(): ArmoryConfig {
  if (!configInstance) {
    configInstance = loadConfig(process.env);
  }
  return configInstance;
}
