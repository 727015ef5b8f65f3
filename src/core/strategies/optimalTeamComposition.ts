import {
  BaseStrategyOptions,
  BidOutcome,
  BiddingStrategy,
  StrategyKind,
  StrategyState,
} from '../../models/types';
import { PlayerPool } from '../playerPool';
import { RosterTracker } from '../store/rosterTracker';

export const TEAM_COMPOSITION_FACTOR = 0.9;

/**
 * Optimal Team Composition (LP) Strategy
 *
 * Bids 90% of value for any player whose role still has an open slot.
 * No linear program is solved: the role caps are the only composition logic,
 * and they live in the roster gate like every other strategy's.
 */
export class OptimalTeamCompositionLPStrategy implements BiddingStrategy {
  readonly kind: StrategyKind = 'optimal_team_composition_lp';
  readonly name: string;
  private readonly roster: RosterTracker;

  constructor(pool: PlayerPool, initialBudget: number, options: BaseStrategyOptions = {}) {
    this.name = options.name ?? 'OptimalTeamCompositionLP';
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
    return TEAM_COMPOSITION_FACTOR * this.roster.player(playerIndex).value;
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
