import { ArmState, BanditSelector, BiddingStrategy } from '../models/types';
import { ConfigurationError, IndexOutOfRangeError } from '../models/errors';

/**
 * UCB1 over bidding strategies. One arm per strategy, in registration order.
 *
 * Selection:
 *   1. Any arm never played → the lowest such index (each arm is forced once).
 *   2. Otherwise argmax of mean + sqrt(2 · ln(total) / count), ties to the
 *      lowest index.
 *
 * Means are kept incrementally: mean ← mean + (reward − mean) / count.
 */
export class UCB1Bandit implements BanditSelector {
  readonly strategies: readonly BiddingStrategy[];
  private readonly counts: number[];
  private readonly means: number[];
  private total = 0;

  constructor(strategies: readonly BiddingStrategy[]) {
    if (strategies.length === 0) {
      throw new ConfigurationError('UCB1 needs at least one arm');
    }
    this.strategies = [...strategies];
    this.counts = new Array<number>(strategies.length).fill(0);
    this.means = new Array<number>(strategies.length).fill(0);
  }

  get armCount(): number {
    return this.strategies.length;
  }

  /** Rounds played across all arms. */
  get totalCount(): number {
    return this.total;
  }

  selectArm(): number {
    const unplayed = this.counts.findIndex((c) => c === 0);
    if (unplayed !== -1) return unplayed;

    const scores = this.ucbScores();
    let best = 0;
    for (let i = 1; i < scores.length; i++) {
      // Strict: an equal score never displaces a lower index
      if (scores[i] > scores[best]) best = i;
    }
    return best;
  }

  update(armIndex: number, reward: number): void {
    if (!Number.isInteger(armIndex) || armIndex < 0 || armIndex >= this.counts.length) {
      throw new IndexOutOfRangeError(
        `Arm ${armIndex} does not exist (${this.counts.length} arms)`,
        { armIndex, arms: this.counts.length },
      );
    }
    if (!Number.isFinite(reward) || reward < 0 || reward > 1) {
      throw new ConfigurationError(`Reward must lie in [0, 1], got ${reward}`, { reward });
    }

    const n = ++this.counts[armIndex];
    this.means[armIndex] += (reward - this.means[armIndex]) / n;
    this.total++;
  }

  /** Confidence bound per arm; Infinity for arms not yet played. */
  ucbScores(): number[] {
    const logTotal = Math.log(this.total);
    return this.counts.map((count, i) =>
      count === 0 ? Infinity : this.means[i] + Math.sqrt((2 * logTotal) / count),
    );
  }

  getArmStates(): ArmState[] {
    return this.counts.map((count, i) => ({ count, meanReward: this.means[i] }));
  }
}
