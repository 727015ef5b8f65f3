// ─── Types ──────────────────────────────────────────────────────────────────────
export type {
  Role,
  Player,
  RoleRequirements,
  PoolConfig,
  RandomSource,
  StrategyKind,
  BidRecordPolicy,
  BudgetPolicy,
  BaseStrategyOptions,
  EpsilonGreedyOptions,
  ReactiveOptions,
  StrategyOptionsByKind,
  StrategySpec,
  BidOutcome,
  StrategyState,
  BiddingStrategy,
  ArmState,
  BanditSelector,
  SimulationConfig,
  RoundRecord,
  SimulationResult,
} from './models/types';

export { ROLES, isRole } from './models/types';

// ─── Errors ─────────────────────────────────────────────────────────────────────
export {
  DraftSimulationError,
  ConfigurationError,
  IndexOutOfRangeError,
  InvariantViolationError,
} from './models/errors';
export type { DraftErrorCode } from './models/errors';

// ─── Players ────────────────────────────────────────────────────────────────────
export { PlayerPool } from './core/playerPool';
export { generatePlayerPool } from './core/poolGenerator';

// ─── Strategies ─────────────────────────────────────────────────────────────────
export { EpsilonGreedyStrategy } from './core/strategies/epsilonGreedy';
export { ReactiveStrategy } from './core/strategies/reactive';
export { ValueBasedStrategy } from './core/strategies/valueBased';
export { OptimalTeamCompositionLPStrategy } from './core/strategies/optimalTeamComposition';
export {
  createStrategy,
  createStrategies,
  isStrategyKind,
  listStrategyKinds,
} from './core/strategyFactory';

// ─── Roster ─────────────────────────────────────────────────────────────────────
export { RosterTracker, resolveRoleRequirements } from './core/store/rosterTracker';

// ─── Bandit ─────────────────────────────────────────────────────────────────────
export { UCB1Bandit } from './core/bandit';

// ─── Configs ────────────────────────────────────────────────────────────────────
export {
  DEFAULT_ROLE_REQUIREMENTS,
  DEFAULT_POOL_CONFIG,
  createDefaultStrategySpecs,
  createDefaultSimulationConfig,
  createTestSimulationConfig,
} from './core/configs';

// ─── Simulation ─────────────────────────────────────────────────────────────────
export {
  runSimulation,
  runConfiguredSimulation,
  printSimulationReport,
} from './simulation/harness';
export type { RunOptions } from './simulation/harness';

// ─── Utils ──────────────────────────────────────────────────────────────────────
export { SeededRandom } from './utils/random';
export { createLogger, silentLogger } from './utils/logger';
export type { Logger, LogLevel } from './utils/logger';
