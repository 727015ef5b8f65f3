import { Player, Role, ROLES, isRole } from '../models/types';
import { ConfigurationError, IndexOutOfRangeError } from '../models/errors';

/**
 * Ordered, immutable collection of players. Every strategy in a run reads
 * the same pool; a player is addressed by its index.
 */
export class PlayerPool {
  private readonly players: readonly Player[];

  constructor(records: readonly unknown[]) {
    if (records.length === 0) {
      throw new ConfigurationError('Player pool must contain at least one player');
    }
    this.players = Object.freeze(records.map((r, i) => validatePlayer(r, i)));
  }

  static from(records: readonly unknown[]): PlayerPool {
    return new PlayerPool(records);
  }

  get length(): number {
    return this.players.length;
  }

  get(index: number): Player {
    if (!Number.isInteger(index) || index < 0 || index >= this.players.length) {
      throw new IndexOutOfRangeError(
        `Player index ${index} is outside the pool (size ${this.players.length})`,
        { index, size: this.players.length },
      );
    }
    return this.players[index];
  }

  toArray(): Player[] {
    return [...this.players];
  }

  countByRole(): Record<Role, number> {
    const counts: Record<Role, number> = { forward: 0, midfielder: 0, defender: 0, goalkeeper: 0 };
    for (const p of this.players) counts[p.role]++;
    return counts;
  }
}

function validatePlayer(record: unknown, index: number): Player {
  if (typeof record !== 'object' || record === null) {
    throw new ConfigurationError(`Player ${index} is not a record`, { index });
  }
  const value: unknown = Reflect.get(record, 'value');
  const cost: unknown = Reflect.get(record, 'cost');
  const role: unknown = Reflect.get(record, 'role');

  if (!isRole(role)) {
    throw new ConfigurationError(
      `Player ${index} has unknown role "${String(role)}" (expected one of ${ROLES.join(', ')})`,
      { index, role },
    );
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`Player ${index} value must be a positive number`, { index, value });
  }
  if (typeof cost !== 'number' || !Number.isFinite(cost) || cost <= 0) {
    throw new ConfigurationError(`Player ${index} cost must be a positive number`, { index, cost });
  }

  return Object.freeze({ value, cost, role });
}
