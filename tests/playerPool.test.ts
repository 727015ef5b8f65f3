import { PlayerPool } from '../src/core/playerPool';
import { generatePlayerPool } from '../src/core/poolGenerator';
import { ConfigurationError, IndexOutOfRangeError } from '../src/models/errors';
import { ROLES, Role } from '../src/models/types';
import { SeededRandom } from '../src/utils/random';
import { onePerRole, player } from './helpers';

describe('PlayerPool', () => {
  test('keeps players in order', () => {
    const pool = onePerRole();
    expect(pool.length).toBe(4);
    expect(pool.get(0)).toEqual({ role: 'forward', value: 100, cost: 60 });
    expect(pool.get(3).role).toBe('goalkeeper');
  });

  test('players are frozen', () => {
    const pool = onePerRole();
    expect(Object.isFrozen(pool.get(1))).toBe(true);
  });

  test('toArray returns a copy', () => {
    const pool = onePerRole();
    const arr = pool.toArray();
    arr.pop();
    expect(pool.length).toBe(4);
  });

  test('countByRole', () => {
    const pool = new PlayerPool([
      player('forward', 100, 60),
      player('forward', 110, 70),
      player('goalkeeper', 90, 60),
    ]);
    expect(pool.countByRole()).toEqual({ forward: 2, midfielder: 0, defender: 0, goalkeeper: 1 });
  });

  test('empty pool is a configuration error', () => {
    expect(() => new PlayerPool([])).toThrow(ConfigurationError);
  });

  test('unknown role is a configuration error', () => {
    expect(() => PlayerPool.from([{ value: 100, cost: 60, role: 'striker' }])).toThrow(
      'Player 0 has unknown role "striker"',
    );
  });

  test('non-positive value or cost is a configuration error', () => {
    expect(() => PlayerPool.from([{ value: 0, cost: 60, role: 'forward' }])).toThrow(
      ConfigurationError,
    );
    expect(() => PlayerPool.from([{ value: 100, cost: -1, role: 'forward' }])).toThrow(
      'Player 0 cost must be a positive number',
    );
  });

  test('non-record entries are rejected', () => {
    expect(() => PlayerPool.from([null])).toThrow('Player 0 is not a record');
  });

  test('index past the end is out of range', () => {
    const pool = onePerRole();
    expect(() => pool.get(4)).toThrow(IndexOutOfRangeError);
    expect(() => pool.get(-1)).toThrow(IndexOutOfRangeError);
  });

  test('errors carry their code', () => {
    try {
      onePerRole().get(10);
      throw new Error('expected get(10) to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(IndexOutOfRangeError);
      if (err instanceof IndexOutOfRangeError) {
        expect(err.code).toBe('INDEX_OUT_OF_RANGE');
        expect(err.details).toEqual({ index: 10, size: 4 });
      }
    }
  });
});

describe('generatePlayerPool', () => {
  test('generates the requested number of valid players', () => {
    const pool = generatePlayerPool({ count: 50 }, new SeededRandom(1));
    expect(pool.length).toBe(50);

    for (const p of pool.toArray()) {
      expect(Number.isInteger(p.value)).toBe(true);
      expect(p.value).toBeGreaterThanOrEqual(80);
      expect(p.value).toBeLessThanOrEqual(150);
      expect(Number.isInteger(p.cost)).toBe(true);
      expect(p.cost).toBeGreaterThanOrEqual(Math.floor(p.value * 0.6));
      expect(p.cost).toBeLessThanOrEqual(Math.floor(p.value * 0.9));
      expect(ROLES).toContain(p.role);
    }
  });

  test('same seed, same pool', () => {
    const a = generatePlayerPool({ count: 30 }, new SeededRandom(9));
    const b = generatePlayerPool({ count: 30 }, new SeededRandom(9));
    expect(a.toArray()).toEqual(b.toArray());
  });

  test('respects a restricted role list and a fixed value', () => {
    const pool = generatePlayerPool(
      { count: 10, roles: ['goalkeeper'], valueRange: [100, 100] },
      new SeededRandom(4),
    );
    for (const p of pool.toArray()) {
      expect(p.role).toBe('goalkeeper');
      expect(p.value).toBe(100);
    }
  });

  test('non-positive count is a configuration error', () => {
    expect(() => generatePlayerPool({ count: 0 }, new SeededRandom(1))).toThrow(
      'Player count must be a positive integer, got 0',
    );
    expect(() => generatePlayerPool({ count: -3 }, new SeededRandom(1))).toThrow(
      ConfigurationError,
    );
  });

  test('unknown role is a configuration error', () => {
    const roles: Role[] = JSON.parse('["forward", "striker"]');
    expect(() => generatePlayerPool({ count: 5, roles }, new SeededRandom(1))).toThrow(
      'Unknown role "striker"',
    );
  });

  test('inverted value range is a configuration error', () => {
    expect(() =>
      generatePlayerPool({ count: 5, valueRange: [150, 80] }, new SeededRandom(1)),
    ).toThrow(ConfigurationError);
  });
});
