import {
  BidOutcome,
  BidRecordPolicy,
  BiddingStrategy,
  ReactiveOptions,
  StrategyKind,
  StrategyState,
} from '../../models/types';
import { ConfigurationError } from '../../models/errors';
import { PlayerPool } from '../playerPool';
import { RosterTracker } from '../store/rosterTracker';

/** Markup over the historical bid ratio on every bid after the first. */
export const REACTIVE_STEP = 0.05;

/**
 * Reactive Strategy
 *
 * Opens at value × initialBidFactor. Once it has a history, bids
 * value × (avgHistoricalBid / value + 0.05), i.e. its average past bid plus
 * 5% of the current player's value.
 *
 * History is fed by the round loop through recordOutcome:
 * - 'all': every bid it actually submitted (bid > 0)
 * - 'wins': only bids that won the player
 */
export class ReactiveStrategy implements BiddingStrategy {
  readonly kind: StrategyKind = 'reactive';
  readonly name: string;
  readonly initialBidFactor: number;
  readonly recordPolicy: BidRecordPolicy;
  private readonly bidHistory: number[] = [];
  private historyTotal = 0;
  private readonly roster: RosterTracker;

  constructor(pool: PlayerPool, initialBudget: number, options: ReactiveOptions = {}) {
    this.name = options.name ?? 'Reactive';
    this.initialBidFactor = options.initialBidFactor ?? 1.0;
    this.recordPolicy = options.recordPolicy ?? 'all';

    if (!Number.isFinite(this.initialBidFactor) || this.initialBidFactor < 0) {
      throw new ConfigurationError(
        `initialBidFactor must be a non-negative number, got ${this.initialBidFactor}`,
        { initialBidFactor: this.initialBidFactor },
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

    if (this.bidHistory.length === 0) {
      return value * this.initialBidFactor;
    }

    const avgHistoricalBid = this.historyTotal / this.bidHistory.length;
    return value * (avgHistoricalBid / value + REACTIVE_STEP);
  }

  recordOutcome(outcome: BidOutcome): void {
    if (outcome.bid <= 0) return;
    if (this.recordPolicy === 'wins' && !outcome.won) return;
    this.bidHistory.push(outcome.bid);
    this.historyTotal += outcome.bid;
  }

  acquire(playerIndex: number): void {
    this.roster.acquire(playerIndex);
  }

  getState(): StrategyState {
    return {
      name: this.name,
      kind: this.kind,
      acquiredPlayers: this.roster.acquiredPlayers,
      remainingBudget: this.roster.remainingBudget,
      bidHistory: [...this.bidHistory],
    };
  }
}
