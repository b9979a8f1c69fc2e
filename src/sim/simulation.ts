// sim/simulation.ts — Wire world → processors → tick loop

import type { SimulationConfig } from '../shared/config.js';
import { WorldState } from './world.js';
import { SeededRng, type RandomSource } from './rng.js';
import { ProgressProcessor } from '../pipeline/progress-processor.js';
import { DispatchPolicy } from '../pipeline/dispatch-policy.js';
import { TickLoop } from './tick-loop.js';
import { EventLog, type LogSink } from './event-log.js';

export interface Simulation {
  world: WorldState;
  loop: TickLoop;
}

/**
 * Build a ready-to-run simulation. Both processors share one random
 * source, so draws interleave in robot order and a seed replays a run.
 */
export function createSimulation(
  config: SimulationConfig,
  sink?: LogSink,
  rng: RandomSource = new SeededRng(config.seed),
): Simulation {
  const world = new WorldState();
  const loop = new TickLoop(world, new ProgressProcessor(rng), new DispatchPolicy(rng), {
    statusInterval: config.statusInterval,
    maxTicks: config.maxTicks,
  });
  loop.setEventLog(new EventLog(sink, config.logEvents));
  return { world, loop };
}
