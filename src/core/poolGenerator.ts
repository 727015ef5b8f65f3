import { PoolConfig, Role, isRole } from '../models/types';
import { ConfigurationError } from '../models/errors';
import { SeededRandom } from '../utils/random';
import { PlayerPool } from './playerPool';
import { DEFAULT_POOL_CONFIG } from './configs';

/**
 * Generate a synthetic player pool.
 *
 * value: integer, uniform over valueRange (inclusive)
 * cost:  floor(value × U(costFactorRange)), never below 1
 * role:  uniform over config.roles
 */
export function generatePlayerPool(
  config: Partial<PoolConfig> & Pick<PoolConfig, 'count'>,
  rng: SeededRandom,
): PlayerPool {
  const { count, valueRange, costFactorRange, roles } = { ...DEFAULT_POOL_CONFIG, ...config };

  if (!Number.isInteger(count) || count <= 0) {
    throw new ConfigurationError(`Player count must be a positive integer, got ${count}`, { count });
  }
  checkRange('valueRange', valueRange, 1);
  checkRange('costFactorRange', costFactorRange, 0);
  if (roles.length === 0) {
    throw new ConfigurationError('At least one role is required');
  }
  const bad = roles.find((r: Role) => !isRole(r));
  if (bad !== undefined) {
    throw new ConfigurationError(`Unknown role "${bad}"`, { role: bad });
  }

  const minValue = Math.ceil(valueRange[0]);
  const maxValue = Math.floor(valueRange[1]);
  if (minValue > maxValue) {
    throw new ConfigurationError('valueRange contains no integer', { valueRange });
  }
  const [minFactor, maxFactor] = costFactorRange;

  const players = Array.from({ length: count }, () => {
    const value = rng.int(minValue, maxValue);
    const cost = Math.max(1, Math.floor(value * rng.range(minFactor, maxFactor)));
    const role = rng.pick(roles);
    return { value, cost, role };
  });

  return new PlayerPool(players);
}

function checkRange(label: string, [min, max]: [number, number], floor: number): void {
  if (!Number.isFinite(min) || !Number.isFinite(max) || min > max || min < floor) {
    throw new ConfigurationError(`${label} must be a finite [min, max] with min >= ${floor}`, {
      [label]: [min, max],
    });
  }
}
