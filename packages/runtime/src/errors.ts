// Runtime error types

import type { ZodError } from 'zod';
import type { EquipmentCategory, Identifier, CombatRole, BattleStatus } from '@armory/protocol';

/**
 * Base class for all armory errors.
 * Provides structured error information for debugging and logging.
 */
export class ArmoryError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'ArmoryError';
    this.code = code;
  }
}

/**
 * Out-of-range or malformed input to a constructor or to configuration.
 * Nothing is built (and no identifier is issued) when this is thrown.
 */
export class InvalidConstructionArgumentError extends ArmoryError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('INVALID_CONSTRUCTION_ARGUMENT', message);
    this.name = 'InvalidConstructionArgumentError';
    this.field = options?.field;
    this.details = options?.details;
  }

  /**
   * Build from the first issue of a failed zod parse.
   */
  static fromZodError(error: ZodError, fieldPrefix?: string): InvalidConstructionArgumentError {
    const issue = error.issues[0];
    if (issue === undefined) {
      return new InvalidConstructionArgumentError('Invalid construction argument', {
        field: fieldPrefix,
      });
    }
    const path = issue.path.map(String).join('.');
    const field = [fieldPrefix, path].filter((part) => part !== undefined && part !== '').join('.');
    return new InvalidConstructionArgumentError(
      field === '' ? issue.message : `Invalid ${field}: ${issue.message}`,
      { field: field === '' ? undefined : field, details: { code: issue.code } }
    );
  }
}

/**
 * An identifier that is not valid for its category or was already issued.
 */
export class DuplicateOrInvalidIdentifierError extends ArmoryError {
  readonly category: EquipmentCategory;
  readonly identifier: Identifier;

  constructor(category: EquipmentCategory, identifier: Identifier, reason: string) {
    super('DUPLICATE_OR_INVALID_IDENTIFIER', `Identifier ${identifier} for ${category}: ${reason}`);
    this.name = 'DuplicateOrInvalidIdentifierError';
    this.category = category;
    this.identifier = identifier;
  }
}

/**
 * No fresh identifier could be drawn within the configured number of attempts.
 */
export class IdentifierExhaustedError extends ArmoryError {
  readonly category: EquipmentCategory;
  readonly attempts: number;

  constructor(category: EquipmentCategory, attempts: number) {
    super(
      'IDENTIFIER_EXHAUSTED',
      `No free ${category} identifier found after ${attempts} attempts`
    );
    this.name = 'IdentifierExhaustedError';
    this.category = category;
    this.attempts = attempts;
  }
}

/**
 * Which relationship a rejected change targeted
 */
export type Relationship = 'owner' | 'backpack' | 'anchor';

/**
 * A relationship change was refused. The graph is unchanged.
 */
export class IllegalRelationshipTargetError extends ArmoryError {
  readonly relationship: Relationship;
  readonly reason: string;

  constructor(relationship: Relationship, reason: string) {
    super('ILLEGAL_RELATIONSHIP_TARGET', `Cannot set ${relationship}: ${reason}`);
    this.name = 'IllegalRelationshipTargetError';
    this.relationship = relationship;
    this.reason = reason;
  }
}

/**
 * An internal add/remove primitive was called out of order.
 * This is a programming error, not a condition callers should handle.
 */
export class InconsistentRelationshipStateError extends ArmoryError {
  constructor(message: string) {
    super('INCONSISTENT_RELATIONSHIP_STATE', message);
    this.name = 'InconsistentRelationshipStateError';
  }
}

/**
 * A combat operation was invoked without one of its participants.
 */
export class NullTargetError extends ArmoryError {
  readonly role: CombatRole;

  constructor(role: CombatRole) {
    super('NULL_TARGET', `Missing ${role}`);
    this.name = 'NullTargetError';
    this.role = role;
  }
}

/**
 * A battle was asked to do something its state does not allow.
 */
export class InvalidBattleStateError extends ArmoryError {
  readonly state: BattleStatus;
  readonly attempted: string;

  constructor(state: BattleStatus, attempted: string, reason?: string) {
    super(
      'INVALID_BATTLE_STATE',
      reason === undefined
        ? `Cannot ${attempted} a battle that is ${state}`
        : `Cannot ${attempted}: ${reason}`
    );
    this.name = 'InvalidBattleStateError';
    this.state = state;
    this.attempted = attempted;
  }
}
