import {
  createStrategy,
  createStrategies,
  isStrategyKind,
  listStrategyKinds,
} from '../src/core/strategyFactory';
import {
  createDefaultSimulationConfig,
  createDefaultStrategySpecs,
  createTestSimulationConfig,
  DEFAULT_ROLE_REQUIREMENTS,
} from '../src/core/configs';
import { EpsilonGreedyStrategy } from '../src/core/strategies/epsilonGreedy';
import { ReactiveStrategy } from '../src/core/strategies/reactive';
import { ConfigurationError, InvariantViolationError } from '../src/models/errors';
import { StrategyKind } from '../src/models/types';
import { SeededRandom } from '../src/utils/random';
import { onePerRole } from './helpers';

describe('strategyFactory', () => {
  test('createStrategy builds each kind with its default name', () => {
    const pool = onePerRole();
    expect(createStrategy('epsilon_greedy', pool, 100).name).toBe('EpsilonGreedy');
    expect(createStrategy('reactive', pool, 100).name).toBe('Reactive');
    expect(createStrategy('value_based', pool, 100).name).toBe('ValueBased');
    expect(createStrategy('optimal_team_composition_lp', pool, 100).name).toBe(
      'OptimalTeamCompositionLP',
    );
  });

  test('createStrategy passes variant options through', () => {
    const strategy = createStrategy('reactive', onePerRole(), 100, { initialBidFactor: 0.5 });
    expect(strategy).toBeInstanceOf(ReactiveStrategy);
    expect(strategy.computeBid(0)).toBe(100 * 0.5);
  });

  test('createStrategy throws for an unknown kind', () => {
    const bogus: StrategyKind = JSON.parse('"sniper"');
    expect(() => createStrategy(bogus, onePerRole(), 100)).toThrow(
      'Unknown bidding strategy: sniper',
    );
  });

  test('listStrategyKinds returns all registered kinds', () => {
    expect(listStrategyKinds()).toEqual([
      'epsilon_greedy',
      'reactive',
      'value_based',
      'optimal_team_composition_lp',
    ]);
  });

  test('isStrategyKind', () => {
    expect(isStrategyKind('reactive')).toBe(true);
    expect(isStrategyKind('toString')).toBe(false);
  });

  test('createStrategies keeps arm order and kinds', () => {
    const strategies = createStrategies(
      onePerRole(),
      1000,
      createDefaultStrategySpecs(),
      new SeededRandom(1),
    );
    expect(strategies.map((s) => s.kind)).toEqual(listStrategyKinds());
    expect(strategies[0]).toBeInstanceOf(EpsilonGreedyStrategy);
  });

  test('createStrategies forks a reproducible rng for epsilon-greedy arms', () => {
    const specs = [{ kind: 'epsilon_greedy' as const, options: { epsilon: 1 } }];
    const [a] = createStrategies(onePerRole(), 1000, specs, new SeededRandom(5));
    const [b] = createStrategies(onePerRole(), 1000, specs, new SeededRandom(5));
    expect(a.computeBid(0)).toBe(b.computeBid(0));
  });

  test('createStrategies applies the budget policy', () => {
    const [strategy] = createStrategies(
      onePerRole(),
      50,
      [{ kind: 'value_based' }],
      new SeededRandom(1),
      'enforce',
    );
    expect(() => strategy.acquire(0)).toThrow(InvariantViolationError);
  });

  test('createStrategies needs at least one spec', () => {
    expect(() => createStrategies(onePerRole(), 1000, [], new SeededRandom(1))).toThrow(
      ConfigurationError,
    );
  });
});

describe('configs', () => {
  test('default role requirements', () => {
    expect(DEFAULT_ROLE_REQUIREMENTS).toEqual({
      forward: 3,
      midfielder: 4,
      defender: 3,
      goalkeeper: 1,
    });
  });

  test('default simulation config', () => {
    const config = createDefaultSimulationConfig();
    expect(config.initialBudget).toBe(1000);
    expect(config.budgetPolicy).toBe('unchecked');
    expect(config.competitiveBidRange).toEqual([0.7, 1.2]);
    expect(config.pool).toEqual({
      count: 100,
      valueRange: [80, 150],
      costFactorRange: [0.6, 0.9],
      roles: ['forward', 'midfielder', 'defender', 'goalkeeper'],
    });
    expect(config.strategies).toHaveLength(4);
  });

  test('overrides replace defaults', () => {
    const config = createTestSimulationConfig({ seed: 99, budgetPolicy: 'enforce' });
    expect(config.seed).toBe(99);
    expect(config.budgetPolicy).toBe('enforce');
    expect(config.pool.count).toBe(20);
  });
});
