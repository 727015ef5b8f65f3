import {
  BanditSelector,
  RandomSource,
  Role,
  ROLES,
  RoundRecord,
  SimulationConfig,
  SimulationResult,
} from '../models/types';
import { ConfigurationError, IndexOutOfRangeError } from '../models/errors';
import { PlayerPool } from '../core/playerPool';
import { generatePlayerPool } from '../core/poolGenerator';
import { createStrategies } from '../core/strategyFactory';
import { UCB1Bandit } from '../core/bandit';
import { SeededRandom } from '../utils/random';
import { Logger, silentLogger } from '../utils/logger';

// ─── Options ────────────────────────────────────────────────────────────────────

export interface RunOptions {
  /** Source of the competitive bids. Default: SeededRandom(Date.now()). */
  rng?: RandomSource;

  /** Competitive bid = value × U(min, max). Default: [0.7, 1.2]. */
  competitiveBidRange?: [number, number];

  logger?: Logger;

  /** Called after every settled round. */
  onRound?: (record: RoundRecord) => void;
}

// ─── Round Loop ─────────────────────────────────────────────────────────────────

/**
 * Run the draft auction: one player per round, in pool order.
 *
 * Flow per round:
 *   1. Draw the competitive bid (value × U(range))
 *   2. Bandit selects an arm
 *   3. That strategy bids (0 if the player's role is full)
 *   4. Reward 1 only if bid > competitive bid (a tie loses)
 *   5. Bandit learns the reward
 *   6. Strategy records the outcome
 *   7. On a win, the strategy acquires the player
 *
 * Any error aborts the whole run. State already mutated is left as is.
 */
export function runSimulation(
  bandit: BanditSelector,
  playerPool: PlayerPool,
  rounds: number = playerPool.length,
  options: RunOptions = {},
): SimulationResult {
  const rng = options.rng ?? new SeededRandom(Date.now());
  const [minFactor, maxFactor] = options.competitiveBidRange ?? [0.7, 1.2];
  const logger = options.logger ?? silentLogger;

  if (!Number.isInteger(rounds) || rounds < 0) {
    throw new ConfigurationError(`Rounds must be a non-negative integer, got ${rounds}`, { rounds });
  }
  if (rounds > playerPool.length) {
    throw new IndexOutOfRangeError(
      `Cannot play ${rounds} rounds with ${playerPool.length} players`,
      { rounds, players: playerPool.length },
    );
  }
  checkCompetitiveBidRange([minFactor, maxFactor]);

  const history: RoundRecord[] = [];
  let totalReward = 0;

  for (let i = 0; i < rounds; i++) {
    const player = playerPool.get(i);

    // ── 1. Market ────────────────────────────────────────────────────────
    const competitiveBid = player.value * rng.range(minFactor, maxFactor);

    // ── 2–3. Arm and bid ─────────────────────────────────────────────────
    const arm = bandit.selectArm();
    const strategy = bandit.strategies[arm];
    const bid = strategy.computeBid(i);

    // ── 4–5. Reward ──────────────────────────────────────────────────────
    const reward: 0 | 1 = bid > competitiveBid ? 1 : 0;
    bandit.update(arm, reward);
    strategy.recordOutcome({ playerIndex: i, bid, won: reward === 1 });

    // ── 6. Roster ────────────────────────────────────────────────────────
    if (reward === 1) {
      strategy.acquire(i);
      totalReward++;
    }

    const record: RoundRecord = {
      round: i,
      playerIndex: i,
      arm,
      strategy: strategy.name,
      bid,
      competitiveBid,
      reward,
    };
    history.push(record);
    logger.debug(
      `round ${i}: ${strategy.name} bid ${bid.toFixed(2)} vs ${competitiveBid.toFixed(2)} ` +
        `for ${player.role} (value ${player.value}) → ${reward === 1 ? 'won' : 'lost'}`,
    );
    options.onRound?.(record);
  }

  logger.info(`Completed ${rounds} rounds, ${totalReward} players won`);

  return {
    rounds,
    strategies: bandit.strategies.map((s) => s.getState()),
    arms: bandit.getArmStates(),
    history,
    totalReward,
  };
}

/** A negative competitive bid would let a gated 0 bid win a full role. */
function checkCompetitiveBidRange([min, max]: [number, number]): void {
  if (!Number.isFinite(min) || !Number.isFinite(max) || min < 0 || min > max) {
    throw new ConfigurationError('competitiveBidRange must be a finite [min, max] with min >= 0', {
      competitiveBidRange: [min, max],
    });
  }
}

// ─── Configured Run ─────────────────────────────────────────────────────────────

/**
 * Build the pool, strategies and bandit from a config, then run.
 *
 * The master seed drives, in order: pool generation, one forked generator
 * per epsilon-greedy arm, and the competitive bids.
 */
export function runConfiguredSimulation(
  config: SimulationConfig,
  logger: Logger = silentLogger,
): { pool: PlayerPool; bandit: UCB1Bandit; result: SimulationResult } {
  checkCompetitiveBidRange(config.competitiveBidRange);
  const masterRng = new SeededRandom(config.seed);

  logger.step('Generating players', `${config.pool.count} players, seed ${config.seed}`);
  const pool = generatePlayerPool(config.pool, masterRng);

  const strategies = createStrategies(
    pool,
    config.initialBudget,
    config.strategies,
    masterRng,
    config.budgetPolicy,
  );
  const bandit = new UCB1Bandit(strategies);

  logger.step('Running auction', `${strategies.map((s) => s.name).join(', ')}`);
  const result = runSimulation(bandit, pool, config.rounds ?? pool.length, {
    rng: masterRng.fork(),
    competitiveBidRange: config.competitiveBidRange,
    logger,
  });

  return { pool, bandit, result };
}

// ─── Pretty Print ───────────────────────────────────────────────────────────────

export function printSimulationReport(result: SimulationResult, pool: PlayerPool): string {
  const lines: string[] = [];
  const hr = '═'.repeat(72);

  lines.push('');
  lines.push(hr);
  lines.push(`  DRAFT AUCTION REPORT — ${result.rounds} rounds, ${result.totalReward} players won`);
  lines.push(hr);
  lines.push('');

  // Arms
  lines.push('  BANDIT ARMS');
  lines.push('  ' + '─'.repeat(60));
  lines.push(
    '  ' + 'Strategy'.padEnd(28) + 'Plays'.padStart(8) + 'Win rate'.padStart(10) + 'Share'.padStart(8),
  );

  result.arms.forEach((arm, i) => {
    const name = result.strategies[i]?.name ?? `arm ${i}`;
    const share = result.rounds > 0 ? arm.count / result.rounds : 0;
    lines.push(
      '  ' +
        name.padEnd(28) +
        String(arm.count).padStart(8) +
        `${(arm.meanReward * 100).toFixed(1)}%`.padStart(10) +
        `${(share * 100).toFixed(1)}%`.padStart(8),
    );
  });

  lines.push('');

  // Rosters
  lines.push('  ROSTERS');
  lines.push('  ' + '─'.repeat(60));

  for (const state of result.strategies) {
    const byRole: Record<Role, number> = { forward: 0, midfielder: 0, defender: 0, goalkeeper: 0 };
    let value = 0;
    for (const idx of state.acquiredPlayers) {
      const p = pool.get(idx);
      byRole[p.role]++;
      value += p.value;
    }
    const roles = ROLES.map((r) => `${r.slice(0, 3).toUpperCase()} ${byRole[r]}`).join('  ');
    lines.push(
      `  ${state.name.padEnd(28)} ${String(state.acquiredPlayers.length).padStart(2)} players  ` +
        `value ${String(value).padStart(5)}  budget $${state.remainingBudget.toFixed(2)}`,
    );
    lines.push(`  ${''.padEnd(28)} ${roles}`);
  }

  lines.push('');

  // Overspend check
  const overspent = result.strategies.filter((s) => s.remainingBudget < 0);
  if (overspent.length > 0) {
    lines.push(`  ⚠  Over budget: ${overspent.map((s) => s.name).join(', ')}`);
  } else {
    lines.push('  ✓  Every strategy stayed within budget');
  }

  lines.push('');
  lines.push(hr);

  return lines.join('\n');
}
