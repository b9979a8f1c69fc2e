// sim/conservation.ts — Accounting checks over every unit ever minted

import type { WorldState } from './world.js';
import { pendingAction } from '../pipeline/actions.js';
import { FOOBAR_PRICE } from '../shared/constants.js';

interface InFlight {
  foos: number;
  bars: number;
  foobars: number;
}

function countInFlight(world: WorldState): InFlight {
  const inFlight: InFlight = { foos: 0, bars: 0, foobars: 0 };
  for (const robot of world.robots) {
    const action = pendingAction(robot.action);
    switch (action.kind) {
      case 'assembling_foobar':
        inFlight.foos += 1;
        inFlight.bars += 1;
        break;
      case 'selling_foobars':
        inFlight.foobars += action.foobars.length;
        break;
      case 'buying_robot':
        inFlight.foos += action.foos.length;
        break;
      default:
        break;
    }
  }
  return inFlight;
}

/**
 * Returns one message per broken accounting law; an empty list means every
 * foo, bar, foobar and coin is where the books say it is.
 */
export function checkConservation(world: WorldState): string[] {
  const { stats } = world;
  const inFlight = countInFlight(world);
  const violations: string[] = [];

  const fooTotal =
    world.foos.length + inFlight.foos + stats.foosLost + stats.foosSpent + stats.foobarsAssembled;
  if (fooTotal !== stats.foosMinted) {
    violations.push(`foos: ${stats.foosMinted} minted but ${fooTotal} accounted for`);
  }

  const barTotal = world.bars.length + inFlight.bars + stats.foobarsAssembled;
  if (barTotal !== stats.barsMinted) {
    violations.push(`bars: ${stats.barsMinted} minted but ${barTotal} accounted for`);
  }

  const foobarTotal = world.foobars.length + inFlight.foobars + stats.foobarsSold;
  if (foobarTotal !== stats.foobarsAssembled) {
    violations.push(`foobars: ${stats.foobarsAssembled} assembled but ${foobarTotal} accounted for`);
  }

  if (stats.moneyEarned !== stats.foobarsSold * FOOBAR_PRICE) {
    violations.push(`money: earned ${stats.moneyEarned} for ${stats.foobarsSold} foobars sold`);
  }
  if (world.money !== stats.moneyEarned - stats.moneySpent) {
    violations.push(`money: balance ${world.money} != ${stats.moneyEarned} earned - ${stats.moneySpent} spent`);
  }

  return violations;
}
