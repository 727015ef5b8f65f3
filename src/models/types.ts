// ─── Players ────────────────────────────────────────────────────────────────────

/** The fixed set of positions a player can fill. */
export const ROLES = ['forward', 'midfielder', 'defender', 'goalkeeper'] as const;

export type Role = (typeof ROLES)[number];

export function isRole(value: unknown): value is Role {
  return ROLES.some((role) => role === value);
}

/**
 * A player up for auction. Players are immutable and identified by their
 * index in the pool's ordered sequence.
 */
export interface Player {
  /** What the player is worth to a bidder. Always > 0. */
  readonly value: number;

  /** What the player costs against a strategy's budget once won. Always > 0. */
  readonly cost: number;

  readonly role: Role;
}

/** Max players per role a single strategy may hold. */
export type RoleRequirements = Readonly<Record<Role, number>>;

// ─── Pool Generation ────────────────────────────────────────────────────────────

export interface PoolConfig {
  /** Number of players to generate. */
  count: number;

  /** Inclusive integer range for player value. Default: [80, 150]. */
  valueRange: [number, number];

  /** cost = floor(value × U(costFactorRange)). Default: [0.6, 0.9]. */
  costFactorRange: [number, number];

  /** Roles to draw from (uniformly). Default: all four. */
  roles: readonly Role[];
}

// ─── Randomness ─────────────────────────────────────────────────────────────────

/**
 * Every random draw in the simulation goes through one of these, so a run
 * can be replayed exactly from its seed.
 */
export interface RandomSource {
  /** Float in [0, 1). */
  next(): number;

  /** Float in [min, max). */
  range(min: number, max: number): number;

  /** True with probability p. */
  chance(p: number): boolean;
}

// ─── Strategies ─────────────────────────────────────────────────────────────────

export type StrategyKind =
  | 'epsilon_greedy'
  | 'reactive'
  | 'value_based'
  | 'optimal_team_composition_lp';

/** Which submitted bids a Reactive strategy remembers. */
export type BidRecordPolicy = 'all' | 'wins';

/**
 * How an acquisition treats the strategy's budget.
 * - 'unchecked': subtract the cost and allow the budget to go negative
 * - 'enforce': refuse any acquisition that would leave the budget below zero
 */
export type BudgetPolicy = 'unchecked' | 'enforce';

/** Options every strategy accepts. */
export interface BaseStrategyOptions {
  /** Display name. Defaults to the variant's class-level name. */
  name?: string;

  /** Per-role caps, merged over DEFAULT_ROLE_REQUIREMENTS. */
  roleRequirements?: Partial<Record<Role, number>>;

  /** Applied when this strategy acquires a player. Default: 'unchecked'. */
  budgetPolicy?: BudgetPolicy;
}

export interface EpsilonGreedyOptions extends BaseStrategyOptions {
  /** Probability of an exploratory U[0, value) bid. Default: 0.1. */
  epsilon?: number;

  /** Fraction of value bid when exploiting. Default: 0.8. */
  exploitationFactor?: number;

  /** Source for exploration draws. Default: SeededRandom(0). */
  rng?: RandomSource;
}

export interface ReactiveOptions extends BaseStrategyOptions {
  /** Fraction of value bid before any history exists. Default: 1.0. */
  initialBidFactor?: number;

  /** Default: 'all'. */
  recordPolicy?: BidRecordPolicy;
}

export interface StrategyOptionsByKind {
  epsilon_greedy: EpsilonGreedyOptions;
  reactive: ReactiveOptions;
  value_based: BaseStrategyOptions;
  optimal_team_composition_lp: BaseStrategyOptions;
}

/** Declarative strategy entry, as held in a SimulationConfig. */
export type StrategySpec = {
  [K in StrategyKind]: { kind: K; options?: StrategyOptionsByKind[K] };
}[StrategyKind];

/** What the round loop tells a strategy after each of its bids is settled. */
export interface BidOutcome {
  playerIndex: number;
  bid: number;
  won: boolean;
}

/** Snapshot of a strategy's mutable state. */
export interface StrategyState {
  name: string;
  kind: StrategyKind;
  /** Player indices in acquisition order. */
  acquiredPlayers: number[];
  remainingBudget: number;
  /** Reactive only. */
  bidHistory?: number[];
}

/**
 * A bidding strategy acting as one arm of the bandit.
 *
 * `computeBid` is pure with respect to the strategy's own state (EpsilonGreedy
 * still consumes randomness). State changes arrive through `recordOutcome`
 * and `acquire`, both driven by the round loop.
 */
export interface BiddingStrategy {
  readonly name: string;
  readonly kind: StrategyKind;

  /** False once the strategy holds as many players of this role as allowed. */
  canAcquire(playerIndex: number): boolean;

  /** Bid for the player. Always 0 when canAcquire is false. */
  computeBid(playerIndex: number): number;

  recordOutcome(outcome: BidOutcome): void;

  /** Add a won player to the roster and charge its cost. */
  acquire(playerIndex: number): void;

  getState(): StrategyState;
}

// ─── Bandit ─────────────────────────────────────────────────────────────────────

export interface ArmState {
  /** Times this arm was selected. */
  count: number;

  /** Running mean of observed rewards, in [0, 1]. */
  meanReward: number;
}

/** Chooses which strategy acts each round and learns from the outcome. */
export interface BanditSelector {
  readonly strategies: readonly BiddingStrategy[];
  selectArm(): number;
  update(armIndex: number, reward: number): void;
  getArmStates(): ArmState[];
}

// ─── Simulation ─────────────────────────────────────────────────────────────────

export interface SimulationConfig {
  /** Human-readable name for this run. */
  name: string;

  /** Master seed: pool generation and every strategy/round draw derive from it. */
  seed: number;

  /** Starting budget per strategy. */
  initialBudget: number;

  /** Rounds to play. Defaults to the pool size. */
  rounds?: number;

  budgetPolicy: BudgetPolicy;

  /** Competitive bid = value × U(range), with 0 <= min <= max. Default: [0.7, 1.2]. */
  competitiveBidRange: [number, number];

  pool: PoolConfig;

  /** One entry per bandit arm, in arm order. */
  strategies: StrategySpec[];
}

/** One settled round. */
export interface RoundRecord {
  round: number;
  playerIndex: number;
  arm: number;
  strategy: string;
  bid: number;
  competitiveBid: number;
  reward: 0 | 1;
}

export interface SimulationResult {
  rounds: number;
  strategies: StrategyState[];
  arms: ArmState[];
  history: RoundRecord[];
  /** Rounds won across all arms. */
  totalReward: number;
}
