// types/index.ts — Barrel export

export type { Tick, Serial, RobotIndex } from './core.js';
export { elapsedSeconds } from './core.js';

export type { Foo, Bar, Foobar } from './resources.js';

export type {
  ActionKind,
  WorkKind,
  IdleAction,
  MiningFooAction,
  MiningBarAction,
  AssemblingFoobarAction,
  SellingFoobarsAction,
  BuyingRobotAction,
  WorkAction,
  ChangingTaskAction,
  Action,
} from './action.js';

export type { Robot } from './robot.js';

export type { SimEvent } from './world.js';

export type {
  TickResult,
  RunStats,
  RunEndReason,
  RunSummary,
} from './tick.js';
