// types/tick.ts — Tick output and run summary types

import type { Tick } from './core.js';
import type { SimEvent } from './world.js';

export interface TickResult {
  tick: Tick;
  events: SimEvent[];
  finished: boolean;
}

export interface RunStats {
  foosMinted: number;
  barsMinted: number;
  foobarsAssembled: number;
  assembliesFailed: number;
  foosLost: number;
  foobarsSold: number;
  robotsBought: number;
  foosSpent: number;
  moneyEarned: number;
  moneySpent: number;
}

export type RunEndReason = 'fleet_target' | 'tick_limit';

export interface RunSummary {
  reason: RunEndReason;
  ticks: Tick;
  seconds: number;
  robots: number;
  money: number;
  foos: number;
  bars: number;
  foobars: number;
  stats: RunStats;
}
