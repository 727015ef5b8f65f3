import {
  BidOutcome,
  BiddingStrategy,
  EpsilonGreedyOptions,
  RandomSource,
  StrategyKind,
  StrategyState,
} from '../../models/types';
import { ConfigurationError } from '../../models/errors';
import { SeededRandom } from '../../utils/random';
import { PlayerPool } from '../playerPool';
import { RosterTracker } from '../store/rosterTracker';

/**
 * Epsilon-Greedy Strategy
 *
 * With probability epsilon, explores: bids a uniform draw from [0, value).
 * Otherwise exploits: bids value × exploitationFactor.
 *
 * Parameters:
 * - epsilon: 0 to 1 (0 makes the strategy fully deterministic)
 * - exploitationFactor: >= 0
 * - rng: every exploration draw comes from here
 */
export class EpsilonGreedyStrategy implements BiddingStrategy {
  readonly kind: StrategyKind = 'epsilon_greedy';
  readonly name: string;
  readonly epsilon: number;
  readonly exploitationFactor: number;
  private readonly rng: RandomSource;
  private readonly roster: RosterTracker;

  constructor(pool: PlayerPool, initialBudget: number, options: EpsilonGreedyOptions = {}) {
    this.name = options.name ?? 'EpsilonGreedy';
    this.epsilon = options.epsilon ?? 0.1;
    this.exploitationFactor = options.exploitationFactor ?? 0.8;
    this.rng = options.rng ?? new SeededRandom(0);

    if (!(this.epsilon >= 0 && this.epsilon <= 1)) {
      throw new ConfigurationError(`epsilon must be within [0, 1], got ${this.epsilon}`, {
        epsilon: this.epsilon,
      });
    }
    if (!Number.isFinite(this.exploitationFactor) || this.exploitationFactor < 0) {
      throw new ConfigurationError(
        `exploitationFactor must be a non-negative number, got ${this.exploitationFactor}`,
        { exploitationFactor: this.exploitationFactor },
      );
    }

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
    const { value } = this.roster.player(playerIndex);
    if (this.rng.chance(this.epsilon)) {
      return this.rng.range(0, value);
    }
    return value * this.exploitationFactor;
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
