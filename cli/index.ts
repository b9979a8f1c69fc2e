#!/usr/bin/env node
// cli/index.ts — CLI entry point

import { Command } from 'commander';
import { loadConfig } from '../src/shared/config.js';
import { createSimulation } from '../src/sim/simulation.js';
import { checkConservation } from '../src/sim/conservation.js';
import { toOverrides, type RunOptions } from './options.js';

const program = new Command();

program
  .name('foobar-factory')
  .description('Simulate a robot fleet mining, assembling and selling foobars until it reaches 30 robots')
  .version('0.1.0');

program
  .command('run')
  .description('Run the simulation to completion')
  .option('--seed <n>', 'Seed for the random source (default: FOOBAR_SEED or clock)')
  .option('--quiet', 'Only print status lines and the final summary')
  .option('--status-interval <ticks>', 'Ticks between status lines, 0 to disable')
  .option('--max-ticks <ticks>', 'Stop after this many ticks even if the fleet is incomplete')
  .action((opts: RunOptions) => {
    try {
      const config = loadConfig(toOverrides(opts));
      console.log(`[FF] Starting simulation (seed=${config.seed})`);

      const { world, loop } = createSimulation(config);
      loop.run();

      const violations = checkConservation(world);
      for (const violation of violations) {
        process.stderr.write(`[FF] Accounting error: ${violation}\n`);
      }
      if (violations.length > 0) process.exit(1);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      process.stderr.write(`[FF] ${msg}\n`);
      process.exit(1);
    }
  });

program.parse();
