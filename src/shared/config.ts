// shared/config.ts — SimulationConfig interface + defaults + env var loading

import { DEFAULT_STATUS_INTERVAL_TICKS } from './constants.js';

export interface SimulationConfig {
  seed: number;
  logEvents: boolean;
  statusInterval: number;        // ticks between status lines, 0 = off
  maxTicks: number | null;       // safety cap on run length, null = none
}

export type Env = Record<string, string | undefined>;

export function parseInteger(name: string, raw: string, min = 0): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function envInteger(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  return parseInteger(name, raw);
}

export function loadConfig(
  overrides: Partial<SimulationConfig> = {},
  env: Env = process.env,
): SimulationConfig {
  const seed = overrides.seed ?? envInteger(env, 'FOOBAR_SEED') ?? Date.now() >>> 0;
  const quiet = env.FOOBAR_QUIET === '1' || env.FOOBAR_QUIET === 'true';

  return {
    seed,
    logEvents: overrides.logEvents ?? !quiet,
    statusInterval:
      overrides.statusInterval ?? envInteger(env, 'FOOBAR_STATUS_INTERVAL') ?? DEFAULT_STATUS_INTERVAL_TICKS,
    maxTicks:
      overrides.maxTicks !== undefined ? overrides.maxTicks : envInteger(env, 'FOOBAR_MAX_TICKS') ?? null,
  };
}
