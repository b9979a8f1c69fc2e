// pipeline/dispatch-policy.ts — Chooses the next action for every idle robot

import type {
  Robot,
  WorkAction,
  WorkKind,
} from '../types/index.js';
import type { WorldState } from '../sim/world.js';
import type { RandomSource } from '../sim/rng.js';
import {
  assemblingFoobar,
  buyingRobot,
  changingTask,
  miningBar,
  miningFoo,
  pendingAction,
  sellingFoobars,
} from './actions.js';
import { projectFutureState } from './projection.js';
import {
  FOO_RESERVE,
  FOO_SURPLUS_TARGET,
  ROBOT_FOO_COST,
  ROBOT_PRICE,
  SELL_BATCH_SIZE,
} from '../shared/constants.js';

export class DispatchPolicy {
  private readonly rng: RandomSource;

  constructor(rng: RandomSource) {
    this.rng = rng;
  }

  tick(world: WorldState): void {
    for (const robot of world.robots) {
      if (robot.action.kind !== 'idle') continue;
      this.dispatch(world, robot);
    }
  }

  /**
   * Priority order: buy a robot, sell foobars, assemble a foobar, mine.
   * The first three are contested and go through shouldRobotTake; mining
   * is always available.
   */
  dispatch(world: WorldState, robot: Robot): void {
    if (
      world.money > ROBOT_PRICE &&
      uncommittedMoney(world) >= ROBOT_PRICE &&
      world.foos.length > ROBOT_FOO_COST &&
      shouldRobotTake(world, robot, 'buying_robot')
    ) {
      this.start(world, robot, buyingRobot(world.takeFoos(ROBOT_FOO_COST)));
      return;
    }

    if (
      world.foobars.length >= SELL_BATCH_SIZE &&
      shouldRobotTake(world, robot, 'selling_foobars')
    ) {
      this.start(world, robot, sellingFoobars(world.takeFoobars(SELL_BATCH_SIZE)));
      return;
    }

    if (
      world.foos.length > FOO_RESERVE &&
      world.bars.length > 0 &&
      shouldRobotTake(world, robot, 'assembling_foobar')
    ) {
      const foo = world.takeFoo();
      const bar = world.takeBar();
      this.start(world, robot, assemblingFoobar(foo, bar));
      return;
    }

    const projection = projectFutureState(world);
    if (projection.foos - projection.bars < FOO_SURPLUS_TARGET) {
      this.start(world, robot, miningFoo());
    } else {
      this.start(world, robot, miningBar(this.rng));
    }
  }

  /** Switching to a different kind of work costs a task change first. */
  private start(world: WorldState, robot: Robot, action: WorkAction): void {
    const from = robot.lastCompleted;
    if (from === null || from === action.kind) {
      robot.action = action;
      return;
    }
    robot.action = changingTask(action);
    world.emit({ type: 'task_changed', robot: robot.index, from, to: action.kind });
  }
}

/**
 * A robot may take a contested action if it was the last to complete that
 * kind, or if no other robot was. Robots that lose out fall through to the
 * next tier; one robot can keep an action to itself indefinitely.
 */
export function shouldRobotTake(world: WorldState, robot: Robot, kind: WorkKind): boolean {
  if (robot.lastCompleted === kind) return true;
  return !world.robots.some((other) => other !== robot && other.lastCompleted === kind);
}

/** Treasury minus the price of every purchase already under way. */
export function uncommittedMoney(world: WorldState): number {
  let committed = 0;
  for (const robot of world.robots) {
    if (pendingAction(robot.action).kind === 'buying_robot') committed += ROBOT_PRICE;
  }
  return world.money - committed;
}
