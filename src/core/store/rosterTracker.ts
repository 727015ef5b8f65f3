import Decimal from 'decimal.js';
import { BudgetPolicy, Player, Role, RoleRequirements } from '../../models/types';
import { ConfigurationError, InvariantViolationError } from '../../models/errors';
import { DEFAULT_ROLE_REQUIREMENTS } from '../configs';
import { PlayerPool } from '../playerPool';

Decimal.set({ precision: 28, rounding: Decimal.ROUND_HALF_EVEN });

/**
 * Per-strategy roster: which players were won, in order, and what is left of
 * the budget. Single source of truth for the role caps.
 */
export class RosterTracker {
  private readonly acquired: number[] = [];
  private readonly roleCounts: Record<Role, number> = {
    forward: 0,
    midfielder: 0,
    defender: 0,
    goalkeeper: 0,
  };
  private budget: Decimal;

  readonly requirements: RoleRequirements;

  constructor(
    private readonly pool: PlayerPool,
    readonly initialBudget: number,
    roleRequirements?: Partial<Record<Role, number>>,
    private readonly budgetPolicy: BudgetPolicy = 'unchecked',
  ) {
    if (!Number.isFinite(initialBudget) || initialBudget <= 0) {
      throw new ConfigurationError(`Initial budget must be positive, got ${initialBudget}`, {
        initialBudget,
      });
    }
    this.budget = new Decimal(initialBudget);
    this.requirements = resolveRoleRequirements(roleRequirements);
  }

  // ── State Access ────────────────────────────────────────────────────────

  get remainingBudget(): number {
    return this.budget.toNumber();
  }

  get acquiredPlayers(): number[] {
    return [...this.acquired];
  }

  countForRole(role: Role): number {
    return this.roleCounts[role];
  }

  player(index: number): Player {
    return this.pool.get(index);
  }

  // ── Role Gate ───────────────────────────────────────────────────────────

  canAcquire(playerIndex: number): boolean {
    const { role } = this.pool.get(playerIndex);
    return this.roleCounts[role] < this.requirements[role];
  }

  // ── Acquisition ─────────────────────────────────────────────────────────

  acquire(playerIndex: number): void {
    const player = this.pool.get(playerIndex);

    if (this.roleCounts[player.role] >= this.requirements[player.role]) {
      throw new InvariantViolationError(
        `Roster already holds ${this.requirements[player.role]} ${player.role}(s)`,
        { playerIndex, role: player.role },
      );
    }

    const after = this.budget.minus(player.cost);
    if (this.budgetPolicy === 'enforce' && after.isNegative()) {
      throw new InvariantViolationError(
        `Cannot afford player ${playerIndex} (cost ${player.cost}, has ${this.budget.toNumber()})`,
        { playerIndex, cost: player.cost, remainingBudget: this.budget.toNumber() },
      );
    }

    this.budget = after;
    this.acquired.push(playerIndex);
    this.roleCounts[player.role]++;
  }
}

export function resolveRoleRequirements(
  overrides?: Partial<Record<Role, number>>,
): RoleRequirements {
  const merged = { ...DEFAULT_ROLE_REQUIREMENTS, ...overrides };
  for (const [role, max] of Object.entries(merged)) {
    if (!Number.isInteger(max) || max < 0) {
      throw new ConfigurationError(`Requirement for ${role} must be a non-negative integer`, {
        role,
        max,
      });
    }
  }
  return Object.freeze(merged);
}
