import { PoolConfig, RoleRequirements, ROLES, SimulationConfig, StrategySpec } from '../models/types';

/** A squad of 11: 3 forwards, 4 midfielders, 3 defenders, 1 goalkeeper. */
export const DEFAULT_ROLE_REQUIREMENTS: RoleRequirements = Object.freeze({
  forward: 3,
  midfielder: 4,
  defender: 3,
  goalkeeper: 1,
});

export const DEFAULT_POOL_CONFIG: PoolConfig = {
  count: 100,
  valueRange: [80, 150],
  costFactorRange: [0.6, 0.9],
  roles: ROLES,
};

/** The four arms, in arm order, with their default parameters. */
export function createDefaultStrategySpecs(): StrategySpec[] {
  return [
    { kind: 'epsilon_greedy', options: { epsilon: 0.1, exploitationFactor: 0.8 } },
    { kind: 'reactive', options: { initialBidFactor: 1.0, recordPolicy: 'all' } },
    { kind: 'value_based' },
    { kind: 'optimal_team_composition_lp' },
  ];
}

/**
 * Default run:
 *
 * 100 players, values 80–150, cost 60–90% of value, roles uniform.
 * $1,000 per strategy, unchecked budgets (a strategy may overspend).
 * Competitive bid 70–120% of value. One round per player.
 */
export function createDefaultSimulationConfig(
  overrides?: Partial<SimulationConfig>,
): SimulationConfig {
  return {
    name: 'Default Draft Auction',
    seed: 42,
    initialBudget: 1_000,
    budgetPolicy: 'unchecked',
    competitiveBidRange: [0.7, 1.2],
    pool: { ...DEFAULT_POOL_CONFIG },
    strategies: createDefaultStrategySpecs(),
    ...overrides,
  };
}

/**
 * Small run for tests: 20 players, deterministic seed.
 */
export function createTestSimulationConfig(
  overrides?: Partial<SimulationConfig>,
): SimulationConfig {
  return {
    name: 'Test Draft Auction',
    seed: 7,
    initialBudget: 500,
    budgetPolicy: 'unchecked',
    competitiveBidRange: [0.7, 1.2],
    pool: { ...DEFAULT_POOL_CONFIG, count: 20 },
    strategies: createDefaultStrategySpecs(),
    ...overrides,
  };
}
