// Battle
//
// Two entities take turns hitting each other until one of them dies.
// A coin flip decides who starts. Both sides count as fighting for the
// whole battle, so hit points are rounded to a prime only once it ends.

import type { BattleStatus } from '@armory/protocol';
import type { Entity } from '../entities/entity.js';
import { InvalidBattleStateError, NullTargetError } from '../errors.js';
import { getDefaultLogger, type Logger } from '../logging.js';
import { getDefaultRng, nextBoolean, type Rng } from '../rng.js';
import { canWound, hit } from './hit.js';

export type BattleOptions = {
  rng?: Rng;
  logger?: Logger;
};

export class Battle {
  readonly first: Entity;
  readonly second: Entity;

  private _status: BattleStatus = 'not_started';
  private _winner: Entity | null = null;
  private _turns = 0;
  private readonly rng: Rng;
  private readonly logger: Logger;

  constructor(first: Entity, second: Entity, options: BattleOptions = {}) {
    this.first = first;
    this.second = second;
    this.rng = options.rng ?? getDefaultRng();
    this.logger = options.logger ?? getDefaultLogger();
  }

  get status(): BattleStatus {
    return this._status;
  }

  /** Set once the battle is resolved */
  get winner(): Entity | null {
    return this._winner;
  }

  /** Hits exchanged so far */
  get turns(): number {
    return this._turns;
  }

  /**
   * Run the battle to the end and return the survivor.
   *
   * @throws InvalidBattleStateError if the battle already ran, a side is
   *   already dead, or neither side can ever wound the other
   */
  fight(): Entity {
    if (this._status !== 'not_started') {
      throw new InvalidBattleStateError(this._status, 'fight');
    }
    for (const side of [this.first, this.second]) {
      if (!side.isAlive()) {
        throw new InvalidBattleStateError(this._status, 'fight', `${side.name} is already dead`);
      }
    }
    if (!canWound(this.first, this.second) && !canWound(this.second, this.first)) {
      throw new InvalidBattleStateError(
        this._status,
        'fight',
        `neither ${this.first.name} nor ${this.second.name} can wound the other`
      );
    }

    this._status = 'in_progress';
    let [attacker, defender] = nextBoolean(this.rng)
      ? [this.first, this.second]
      : [this.second, this.first];
    this.logger.info(`${this.first.name} fights ${this.second.name}`, { starts: attacker.name });

    this.first.setFighting(true);
    this.second.setFighting(true);
    try {
      while (attacker.isAlive() && defender.isAlive()) {
        hit(attacker, defender, { rng: this.rng, logger: this.logger });
        this._turns++;
        [attacker, defender] = [defender, attacker];
      }
    } finally {
      this.first.setFighting(false);
      this.second.setFighting(false);
    }

    const winner = this.first.isAlive() ? this.first : this.second;
    this._winner = winner;
    this._status = 'resolved';
    this.logger.info(`${winner.name} wins`, { turns: this._turns, hitPoints: winner.hitPoints });
    return winner;
  }
}

/**
 * @throws NullTargetError if either side is missing
 * @throws InvalidBattleStateError if both sides are the same entity
 */
export function createBattle(
  first: Entity | null,
  second: Entity | null,
  options: BattleOptions = {}
): Battle {
  if (first === null) throw new NullTargetError('attacker');
  if (second === null) throw new NullTargetError('defender');
  if (first === second) {
    throw new InvalidBattleStateError('not_started', 'create', `${first.name} cannot fight itself`);
  }
  return new Battle(first, second, options);
}
