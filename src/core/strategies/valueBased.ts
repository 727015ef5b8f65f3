import {
  BaseStrategyOptions,
  BidOutcome,
  BiddingStrategy,
  StrategyKind,
  StrategyState,
} from '../../models/types';
import { PlayerPool } from '../playerPool';
import { RosterTracker } from '../store/rosterTracker';

/** Fraction of value a ValueBased bidder offers. */
export const VALUE_BASED_FACTOR = 0.8;

/**
 * Value-Based Strategy
 *
 * Always bids 80% of the player's value. Ignores history and randomness:
 * the only thing that stops it bidding is a full role.
 */
export class ValueBasedStrategy implements BiddingStrategy {
  readonly kind: StrategyKind = 'value_based';
  readonly name: string;
  private readonly roster: RosterTracker;

  constructor(pool: PlayerPool, initialBudget: number, options: BaseStrategyOptions = {}) {
    this.name = options.name ?? 'ValueBased';
    this.roster = new RosterTracker(
      pool,
      initialBudget,
      options.roleRequirements,
      options.budgetPolicy,
    );
  }

  canAcquire(playerIndex: number): boolean {
    return this.roster.canAcquire(playerIndex);
  }

  computeBid(playerIndex: number): number {
    if (!this.canAcquire(playerIndex)) return 0;
    return this.roster.player(playerIndex).value * VALUE_BASED_FACTOR;
  }

  recordOutcome(_outcome: BidOutcome): void {}

  acquire(playerIndex: number): void {
    this.roster.acquire(playerIndex);
  }

  getState(): StrategyState {
    return {
      name: this.name,
      kind: this.kind,
      acquiredPlayers: this.roster.acquiredPlayers,
      remainingBudget: this.roster.remainingBudget,
    };
  }
}
