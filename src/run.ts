import * as fs from 'fs';
import { createDefaultSimulationConfig, DEFAULT_POOL_CONFIG } from './core/configs';
import { runConfiguredSimulation, printSimulationReport } from './simulation/harness';
import { BudgetPolicy } from './models/types';
import { DraftSimulationError } from './models/errors';
import { createLogger } from './utils/logger';

// ─── Parse CLI args ─────────────────────────────────────────────────────────────

const args = process.argv.slice(2);

function arg(name: string): string | undefined {
  return args.find((a) => a.startsWith(`--${name}=`))?.split('=')[1];
}

function parsePolicy(raw: string | undefined): BudgetPolicy {
  if (raw === undefined || raw === 'unchecked') return 'unchecked';
  if (raw === 'enforce') return 'enforce';
  throw new Error(`--policy must be "unchecked" or "enforce", got "${raw}"`);
}

const seed = parseInt(arg('seed') ?? String(Date.now()), 10);
const players = parseInt(arg('players') ?? String(DEFAULT_POOL_CONFIG.count), 10);
const roundsArg = arg('rounds');
const budget = Number(arg('budget') ?? '1000');
const policy = parsePolicy(arg('policy'));
const verbose = args.includes('--verbose');

// ─── Run ────────────────────────────────────────────────────────────────────────

const logger = createLogger(true, verbose ? 'debug' : 'info');

const config = createDefaultSimulationConfig({
  seed,
  initialBudget: budget,
  budgetPolicy: policy,
  rounds: roundsArg === undefined ? undefined : parseInt(roundsArg, 10),
  pool: { ...DEFAULT_POOL_CONFIG, count: players },
});

console.log(`\nDraft Auction Simulation`);
console.log(`  Seed: ${seed}  Players: ${players}  Budget: ${budget}  Policy: ${policy}`);

const startTime = Date.now();

try {
  const { pool, result } = runConfiguredSimulation(config, logger);
  const elapsed = ((Date.now() - startTime) / 1000).toFixed(2);
  logger.info(`Finished in ${elapsed}s`);

  console.log(printSimulationReport(result, pool));

  // ─── Optional: dump the run to JSON ──────────────────────────────────────────

  if (args.includes('--json')) {
    const jsonOut = {
      config,
      players: pool.toArray(),
      arms: result.arms,
      strategies: result.strategies,
      history: result.history,
    };
    const filename = `draft_results_${seed}.json`;
    fs.writeFileSync(filename, JSON.stringify(jsonOut, null, 2));
    logger.info(`Results saved to ${filename}`);
  }
} catch (err) {
  if (err instanceof DraftSimulationError) {
    logger.error(`${err.name} [${err.code}]: ${err.message}`);
    process.exitCode = 1;
  } else {
    throw err;
  }
}
