// pipeline/progress-processor.ts — Counts actions down and resolves completions

import type {
  Robot,
  WorkAction,
  WorkKind,
} from '../types/index.js';
import type { WorldState } from '../sim/world.js';
import type { RandomSource } from '../sim/rng.js';
import { idle } from './actions.js';
import { ASSEMBLY_SUCCESS_RATE, FOOBAR_PRICE, ROBOT_PRICE } from '../shared/constants.js';

export class ProgressProcessor {
  private readonly rng: RandomSource;

  constructor(rng: RandomSource) {
    this.rng = rng;
  }

  /**
   * Advance every robot by one tick. Robots bought during this pass join
   * the fleet idle and are first counted down on the next tick.
   */
  tick(world: WorldState): void {
    const fleetSize = world.robots.length;
    for (let i = 0; i < fleetSize; i++) {
      const robot = world.robots[i];
      if (robot) this.advance(world, robot);
    }
  }

  advance(world: WorldState, robot: Robot): void {
    const action = robot.action;
    if (action.kind === 'idle') return;

    action.remainingTicks -= 1;
    if (action.remainingTicks > 0) return;

    if (action.kind === 'changing_task') {
      robot.action = action.next;
      // A zero-length successor completes in the same tick.
      if (action.next.remainingTicks > 0) return;
      this.complete(world, robot, action.next);
      return;
    }

    this.complete(world, robot, action);
  }

  private complete(world: WorldState, robot: Robot, action: WorkAction): void {
    const kind: WorkKind = this.resolve(world, robot, action);
    robot.action = idle(kind);
    robot.lastCompleted = kind;
  }

  private resolve(world: WorldState, robot: Robot, action: WorkAction): WorkKind {
    switch (action.kind) {
      case 'mining_foo': {
        const foo = world.mintFoo();
        world.emit({ type: 'foo_mined', robot: robot.index, serial: foo.serial });
        return action.kind;
      }

      case 'mining_bar': {
        const bar = world.mintBar();
        world.emit({ type: 'bar_mined', robot: robot.index, serial: bar.serial });
        return action.kind;
      }

      case 'assembling_foobar': {
        const { foo, bar } = action;
        if (this.rng.next() < ASSEMBLY_SUCCESS_RATE) {
          world.foobars.push({ type: 'foobar', foo, bar });
          world.stats.foobarsAssembled++;
          world.emit({ type: 'foobar_assembled', robot: robot.index, foo: foo.serial, bar: bar.serial });
        } else {
          // The foo is ruined; the bar goes back to the pool.
          world.bars.push(bar);
          world.stats.assembliesFailed++;
          world.stats.foosLost++;
          world.emit({ type: 'assembly_failed', robot: robot.index, foo: foo.serial, bar: bar.serial });
        }
        return action.kind;
      }

      case 'selling_foobars': {
        const count = action.foobars.length;
        world.credit(count * FOOBAR_PRICE);
        world.stats.foobarsSold += count;
        world.emit({ type: 'foobars_sold', robot: robot.index, count, money: world.money });
        return action.kind;
      }

      case 'buying_robot': {
        world.debit(ROBOT_PRICE);
        world.stats.foosSpent += action.foos.length;
        world.stats.robotsBought++;
        const bought = world.addRobot();
        world.emit({
          type: 'robot_bought',
          robot: robot.index,
          newRobot: bought.index,
          fleet: world.robots.length,
          money: world.money,
        });
        return action.kind;
      }
    }
  }
}
