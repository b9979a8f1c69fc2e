// sim/tick-loop.ts — The heartbeat: one 100ms step per iteration

import type { TickResult, RunSummary, RunEndReason } from '../types/index.js';
import { elapsedSeconds } from '../types/index.js';
import type { WorldState } from './world.js';
import type { ProgressProcessor } from '../pipeline/progress-processor.js';
import type { DispatchPolicy } from '../pipeline/dispatch-policy.js';
import { formatSlowTick, type EventLog } from './event-log.js';
import { FLEET_TARGET, SLOW_TICK_MS } from '../shared/constants.js';

export interface TickLoopOptions {
  statusInterval?: number;
  maxTicks?: number | null;
}

export class TickLoop {
  private world: WorldState;
  private progress: ProgressProcessor;
  private dispatch: DispatchPolicy;
  private eventLog: EventLog | null = null;
  private statusInterval: number;
  private maxTicks: number | null;

  constructor(
    world: WorldState,
    progress: ProgressProcessor,
    dispatch: DispatchPolicy,
    options: TickLoopOptions = {},
  ) {
    this.world = world;
    this.progress = progress;
    this.dispatch = dispatch;
    this.statusInterval = options.statusInterval ?? 0;
    this.maxTicks = options.maxTicks ?? null;
  }

  setEventLog(eventLog: EventLog): void {
    this.eventLog = eventLog;
  }

  isFinished(): boolean {
    return this.world.robots.length >= FLEET_TARGET;
  }

  processTick(): TickResult {
    const startTime = performance.now();
    const tick = this.world.tick;

    // 1. Count down every action, resolving completions
    this.progress.tick(this.world);

    // 2. Hand work to every idle robot
    this.dispatch.tick(this.world);

    // 3. Termination check
    const finished = this.isFinished();

    // 4. Flush tick-scoped events
    const events = [...this.world.tickEvents];
    this.world.tickEvents = [];
    this.eventLog?.record(tick, events);

    // 5. Advance the clock
    this.world.tick++;

    if (this.eventLog && this.statusInterval > 0 && this.world.tick % this.statusInterval === 0) {
      this.eventLog.status(this.world);
    }

    const elapsed = performance.now() - startTime;
    if (elapsed > SLOW_TICK_MS) {
      if (this.eventLog) this.eventLog.slowTick(tick, elapsed);
      else console.warn(formatSlowTick(tick, elapsed));
    }

    return { tick, events, finished };
  }

  run(): RunSummary {
    let reason: RunEndReason = 'fleet_target';
    while (!this.isFinished()) {
      if (this.maxTicks !== null && this.world.tick >= this.maxTicks) {
        reason = 'tick_limit';
        break;
      }
      this.processTick();
    }

    const summary = this.summarize(reason);
    this.eventLog?.summary(summary);
    return summary;
  }

  summarize(reason: RunEndReason): RunSummary {
    const world = this.world;
    return {
      reason,
      ticks: world.tick,
      seconds: elapsedSeconds(world.tick),
      robots: world.robots.length,
      money: world.money,
      foos: world.foos.length,
      bars: world.bars.length,
      foobars: world.foobars.length,
      stats: { ...world.stats },
    };
  }
}
