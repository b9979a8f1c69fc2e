// pipeline/actions.ts — Action constructors and contracts

import type {
  Action,
  Bar,
  Foo,
  Foobar,
  IdleAction,
  MiningFooAction,
  MiningBarAction,
  AssemblingFoobarAction,
  SellingFoobarsAction,
  BuyingRobotAction,
  ChangingTaskAction,
  WorkAction,
  WorkKind,
} from '../types/index.js';
import type { RandomSource } from '../sim/rng.js';
import {
  ASSEMBLING_TICKS,
  BUYING_TICKS,
  CHANGING_TASK_TICKS,
  MINING_BAR_MIN_TICKS,
  MINING_BAR_SPREAD_TICKS,
  MINING_FOO_TICKS,
  ROBOT_FOO_COST,
  SELL_BATCH_SIZE,
  SELLING_TICKS,
} from '../shared/constants.js';
import { ContractViolation } from '../shared/errors.js';

export function idle(previous: WorkKind | null = null): IdleAction {
  return { kind: 'idle', remainingTicks: 0, previous };
}

export function miningFoo(): MiningFooAction {
  return { kind: 'mining_foo', remainingTicks: MINING_FOO_TICKS };
}

/** Bar veins vary: 5 to 20 ticks, drawn once when mining starts. */
export function miningBar(rng: RandomSource): MiningBarAction {
  const remainingTicks = Math.round(rng.next() * MINING_BAR_SPREAD_TICKS) + MINING_BAR_MIN_TICKS;
  return { kind: 'mining_bar', remainingTicks };
}

export function assemblingFoobar(foo: Foo, bar: Bar): AssemblingFoobarAction {
  return { kind: 'assembling_foobar', remainingTicks: ASSEMBLING_TICKS, foo, bar };
}

export function sellingFoobars(foobars: Foobar[]): SellingFoobarsAction {
  if (foobars.length > SELL_BATCH_SIZE) {
    throw new ContractViolation(
      `Cannot sell ${foobars.length} foobars at once (max ${SELL_BATCH_SIZE})`,
    );
  }
  return { kind: 'selling_foobars', remainingTicks: SELLING_TICKS, foobars };
}

export function buyingRobot(foos: Foo[]): BuyingRobotAction {
  if (foos.length !== ROBOT_FOO_COST) {
    throw new ContractViolation(
      `Buying a robot takes exactly ${ROBOT_FOO_COST} foos, got ${foos.length}`,
    );
  }
  return { kind: 'buying_robot', remainingTicks: BUYING_TICKS, foos };
}

export function changingTask(next: WorkAction): ChangingTaskAction {
  return { kind: 'changing_task', remainingTicks: CHANGING_TASK_TICKS, next };
}

/** The action a robot is actually headed for, looking through a task change. */
export function pendingAction(action: Action): Action {
  return action.kind === 'changing_task' ? action.next : action;
}
