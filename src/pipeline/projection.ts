// pipeline/projection.ts — Expected pool sizes once in-flight actions land
// Read-only. Recomputed on every query.

import type { WorldState } from '../sim/world.js';
import { pendingAction } from './actions.js';
import { ASSEMBLY_SUCCESS_RATE, FOOBAR_PRICE, ROBOT_PRICE } from '../shared/constants.js';

export interface Projection {
  foos: number;
  bars: number;
  foobars: number;
  money: number;
  robots: number;
}

export function projectFutureState(world: WorldState): Projection {
  const projection: Projection = {
    foos: world.foos.length,
    bars: world.bars.length,
    foobars: world.foobars.length,
    money: world.money,
    robots: world.robots.length,
  };

  for (const robot of world.robots) {
    const action = pendingAction(robot.action);
    switch (action.kind) {
      case 'mining_foo':
        projection.foos += 1;
        break;
      case 'mining_bar':
        projection.bars += 1;
        break;
      case 'assembling_foobar':
        // Expectation, not a sampled outcome: a failed assembly gives the bar back.
        projection.foobars += ASSEMBLY_SUCCESS_RATE;
        projection.bars += 1 - ASSEMBLY_SUCCESS_RATE;
        break;
      case 'selling_foobars':
        projection.money += action.foobars.length * FOOBAR_PRICE;
        break;
      case 'buying_robot':
        projection.robots += 1;
        projection.money -= ROBOT_PRICE;
        break;
      case 'idle':
      case 'changing_task':
        break;
    }
  }

  return projection;
}
