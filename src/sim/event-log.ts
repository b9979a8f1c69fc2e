// sim/event-log.ts — Human-readable event lines

import type {
  Tick,
  SimEvent,
  RunSummary,
} from '../types/index.js';
import { elapsedSeconds } from '../types/index.js';
import type { WorldState } from './world.js';

export type LogSink = (line: string) => void;

const PREFIX = '[FF]';

function stamp(tick: Tick): string {
  return `${PREFIX} ${elapsedSeconds(tick).toFixed(1)}s`;
}

export function formatEvent(event: SimEvent): string {
  switch (event.type) {
    case 'foo_mined':
      return `robot #${event.robot} mined foo #${event.serial}`;
    case 'bar_mined':
      return `robot #${event.robot} mined bar #${event.serial}`;
    case 'foobar_assembled':
      return `robot #${event.robot} assembled foobar (foo #${event.foo}, bar #${event.bar})`;
    case 'assembly_failed':
      return `robot #${event.robot} failed to assemble foo #${event.foo} with bar #${event.bar}; foo lost`;
    case 'foobars_sold':
      return `robot #${event.robot} sold ${event.count} foobars, money now ${event.money}`;
    case 'robot_bought':
      return `robot #${event.robot} bought robot #${event.newRobot}, fleet now ${event.fleet}, money now ${event.money}`;
    case 'task_changed':
      return `robot #${event.robot} switching from ${event.from} to ${event.to}`;
  }
}

export function formatSlowTick(tick: Tick, elapsedMs: number): string {
  return `${PREFIX} Tick ${tick} took ${elapsedMs.toFixed(1)}ms`;
}

export class EventLog {
  private readonly sink: LogSink;
  private readonly logEvents: boolean;

  constructor(sink: LogSink = (line) => console.log(line), logEvents = true) {
    this.sink = sink;
    this.logEvents = logEvents;
  }

  record(tick: Tick, events: SimEvent[]): void {
    if (!this.logEvents) return;
    for (const event of events) {
      this.sink(`${stamp(tick)} ${formatEvent(event)}`);
    }
  }

  status(world: WorldState): void {
    this.sink(
      `${stamp(world.tick)} | ` +
      `${world.robots.length} robots | ` +
      `${world.foos.length} foos | ` +
      `${world.bars.length} bars | ` +
      `${world.foobars.length} foobars | ` +
      `money ${world.money}`,
    );
  }

  slowTick(tick: Tick, elapsedMs: number): void {
    this.sink(formatSlowTick(tick, elapsedMs));
  }

  summary(summary: RunSummary): void {
    const outcome = summary.reason === 'fleet_target' ? 'Fleet complete' : 'Tick limit reached';
    this.sink(
      `${PREFIX} ${outcome}: ${summary.robots} robots after ${summary.ticks} ticks ` +
      `(${summary.seconds.toFixed(1)}s simulated)`,
    );
  }
}
