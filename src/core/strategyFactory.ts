import {
  BiddingStrategy,
  BudgetPolicy,
  StrategyKind,
  StrategyOptionsByKind,
  StrategySpec,
} from '../models/types';
import { ConfigurationError } from '../models/errors';
import { SeededRandom } from '../utils/random';
import { PlayerPool } from './playerPool';
import { EpsilonGreedyStrategy } from './strategies/epsilonGreedy';
import { ReactiveStrategy } from './strategies/reactive';
import { ValueBasedStrategy } from './strategies/valueBased';
import { OptimalTeamCompositionLPStrategy } from './strategies/optimalTeamComposition';

type StrategyBuilder<K extends StrategyKind> = (
  pool: PlayerPool,
  initialBudget: number,
  options?: StrategyOptionsByKind[K],
) => BiddingStrategy;

/**
 * Registry of bidding strategies.
 *
 * To register a new strategy:
 * 1. Implement the BiddingStrategy interface
 * 2. Add its kind to the StrategyKind union and StrategyOptionsByKind in types.ts
 * 3. Add an entry in the strategyMap below
 */
const strategyMap: { [K in StrategyKind]: StrategyBuilder<K> } = {
  epsilon_greedy: (pool, budget, options) => new EpsilonGreedyStrategy(pool, budget, options),
  reactive: (pool, budget, options) => new ReactiveStrategy(pool, budget, options),
  value_based: (pool, budget, options) => new ValueBasedStrategy(pool, budget, options),
  optimal_team_composition_lp: (pool, budget, options) =>
    new OptimalTeamCompositionLPStrategy(pool, budget, options),
};

export function isStrategyKind(value: string): value is StrategyKind {
  return Object.prototype.hasOwnProperty.call(strategyMap, value);
}

/**
 * Build a strategy by kind. Every variant shares the
 * (pool, initialBudget, options) constructor contract.
 */
export function createStrategy<K extends StrategyKind>(
  kind: K,
  pool: PlayerPool,
  initialBudget: number,
  options?: StrategyOptionsByKind[K],
): BiddingStrategy {
  const build: StrategyBuilder<K> | undefined = strategyMap[kind];
  if (!build) {
    throw new ConfigurationError(`Unknown bidding strategy: ${kind}`, { kind });
  }
  return build(pool, initialBudget, options);
}

/**
 * Build one strategy per spec, in arm order. Epsilon-greedy arms without
 * their own rng get one forked from the given generator.
 */
export function createStrategies(
  pool: PlayerPool,
  initialBudget: number,
  specs: StrategySpec[],
  rng: SeededRandom,
  budgetPolicy: BudgetPolicy = 'unchecked',
): BiddingStrategy[] {
  if (specs.length === 0) {
    throw new ConfigurationError('At least one strategy is required');
  }
  return specs.map((spec) => {
    switch (spec.kind) {
      case 'epsilon_greedy':
        return createStrategy(spec.kind, pool, initialBudget, {
          budgetPolicy,
          ...spec.options,
          rng: spec.options?.rng ?? rng.fork(),
        });
      case 'reactive':
        return createStrategy(spec.kind, pool, initialBudget, { budgetPolicy, ...spec.options });
      case 'value_based':
        return createStrategy(spec.kind, pool, initialBudget, { budgetPolicy, ...spec.options });
      case 'optimal_team_composition_lp':
        return createStrategy(spec.kind, pool, initialBudget, { budgetPolicy, ...spec.options });
    }
  });
}

/**
 * List all registered strategy kinds.
 */
export function listStrategyKinds(): StrategyKind[] {
  return Object.keys(strategyMap).filter(isStrategyKind);
}
