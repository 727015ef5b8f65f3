import { RosterTracker, resolveRoleRequirements } from '../src/core/store/rosterTracker';
import { PlayerPool } from '../src/core/playerPool';
import { ConfigurationError, InvariantViolationError } from '../src/models/errors';
import { onePerRole, player } from './helpers';

describe('RosterTracker', () => {
  let pool: PlayerPool;

  beforeEach(() => {
    pool = new PlayerPool([
      player('forward', 100, 70),
      player('forward', 120, 85),
      player('goalkeeper', 90, 60),
      player('goalkeeper', 95, 65),
    ]);
  });

  test('starts empty with the full budget', () => {
    const roster = new RosterTracker(pool, 1000);
    expect(roster.acquiredPlayers).toEqual([]);
    expect(roster.remainingBudget).toBe(1000);
    expect(roster.requirements).toEqual({ forward: 3, midfielder: 4, defender: 3, goalkeeper: 1 });
  });

  test('acquire appends in order and charges cost', () => {
    const roster = new RosterTracker(pool, 1000);
    roster.acquire(1);
    roster.acquire(0);
    expect(roster.acquiredPlayers).toEqual([1, 0]);
    expect(roster.remainingBudget).toBe(845);
    expect(roster.countForRole('forward')).toBe(2);
  });

  test('acquiredPlayers is a copy', () => {
    const roster = new RosterTracker(pool, 1000);
    roster.acquire(0);
    roster.acquiredPlayers.push(3);
    expect(roster.acquiredPlayers).toEqual([0]);
  });

  test('budget arithmetic is exact for fractional costs', () => {
    const mids = new PlayerPool([
      player('midfielder', 1, 0.1),
      player('midfielder', 1, 0.1),
      player('midfielder', 1, 0.1),
    ]);
    const roster = new RosterTracker(mids, 1);
    roster.acquire(0);
    roster.acquire(1);
    roster.acquire(2);
    expect(roster.remainingBudget).toBe(0.7);
  });

  test('canAcquire closes a role once it is full', () => {
    const roster = new RosterTracker(pool, 1000);
    expect(roster.canAcquire(2)).toBe(true);
    roster.acquire(2);
    expect(roster.canAcquire(3)).toBe(false);
    expect(roster.canAcquire(0)).toBe(true);
  });

  test('acquiring into a full role is an invariant violation', () => {
    const roster = new RosterTracker(pool, 1000);
    roster.acquire(2);
    expect(() => roster.acquire(3)).toThrow(InvariantViolationError);
    expect(roster.acquiredPlayers).toEqual([2]);
  });

  test('unchecked policy lets the budget go negative', () => {
    const roster = new RosterTracker(pool, 100);
    roster.acquire(0);
    roster.acquire(1);
    expect(roster.remainingBudget).toBe(-55);
  });

  test('enforce policy refuses an unaffordable player and leaves state alone', () => {
    const roster = new RosterTracker(pool, 100, undefined, 'enforce');
    roster.acquire(0);
    expect(() => roster.acquire(1)).toThrow('Cannot afford player 1 (cost 85, has 30)');
    expect(roster.acquiredPlayers).toEqual([0]);
    expect(roster.remainingBudget).toBe(30);
  });

  test('enforce policy allows spending down to exactly zero', () => {
    const roster = new RosterTracker(pool, 70, undefined, 'enforce');
    roster.acquire(0);
    expect(roster.remainingBudget).toBe(0);
  });

  test('non-positive budget is a configuration error', () => {
    expect(() => new RosterTracker(onePerRole(), 0)).toThrow(ConfigurationError);
    expect(() => new RosterTracker(onePerRole(), -10)).toThrow(
      'Initial budget must be positive, got -10',
    );
    expect(() => new RosterTracker(onePerRole(), NaN)).toThrow(ConfigurationError);
  });
});

describe('resolveRoleRequirements', () => {
  test('merges overrides over the defaults', () => {
    expect(resolveRoleRequirements({ forward: 1 })).toEqual({
      forward: 1,
      midfielder: 4,
      defender: 3,
      goalkeeper: 1,
    });
  });

  test('rejects negative or fractional caps', () => {
    expect(() => resolveRoleRequirements({ defender: -1 })).toThrow(ConfigurationError);
    expect(() => resolveRoleRequirements({ defender: 1.5 })).toThrow(
      'Requirement for defender must be a non-negative integer',
    );
  });
});
