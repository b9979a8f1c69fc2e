// cli/options.ts — Commander option values → config overrides

import { parseInteger, type SimulationConfig } from '../src/shared/config.js';

export interface RunOptions {
  seed?: string;
  quiet?: boolean;
  statusInterval?: string;
  maxTicks?: string;
}

export function toOverrides(opts: RunOptions): Partial<SimulationConfig> {
  const overrides: Partial<SimulationConfig> = {};
  if (opts.seed !== undefined) overrides.seed = parseInteger('--seed', opts.seed);
  if (opts.quiet) overrides.logEvents = false;
  if (opts.statusInterval !== undefined) {
    overrides.statusInterval = parseInteger('--status-interval', opts.statusInterval);
  }
  if (opts.maxTicks !== undefined) overrides.maxTicks = parseInteger('--max-ticks', opts.maxTicks, 1);
  return overrides;
}
