// sim/world.ts — In-memory world state

import type {
  Tick,
  Robot,
  Foo,
  Bar,
  Foobar,
  RunStats,
  SimEvent,
} from '../types/index.js';
import { INITIAL_ROBOTS } from '../shared/constants.js';
import { ContractViolation } from '../shared/errors.js';
import { idle } from '../pipeline/actions.js';

export function emptyStats(): RunStats {
  return {
    foosMinted: 0,
    barsMinted: 0,
    foobarsAssembled: 0,
    assembliesFailed: 0,
    foosLost: 0,
    foobarsSold: 0,
    robotsBought: 0,
    foosSpent: 0,
    moneyEarned: 0,
    moneySpent: 0,
  };
}

export class WorldState {
  tick: Tick = 0;

  robots: Robot[] = [];

  // Pools hold uncommitted units, most recent last.
  foos: Foo[] = [];
  bars: Bar[] = [];
  foobars: Foobar[] = [];

  money = 0;

  stats: RunStats = emptyStats();
  tickEvents: SimEvent[] = [];

  private nextFooSerial = 0;
  private nextBarSerial = 0;

  constructor(robotCount: number = INITIAL_ROBOTS) {
    for (let i = 0; i < robotCount; i++) {
      this.addRobot();
    }
  }

  // --- Robot methods ---

  addRobot(): Robot {
    const robot: Robot = {
      index: this.robots.length,
      action: idle(),
      lastCompleted: null,
    };
    this.robots.push(robot);
    return robot;
  }

  // --- Minting ---

  mintFoo(): Foo {
    const foo: Foo = { type: 'foo', serial: this.nextFooSerial++ };
    this.foos.push(foo);
    this.stats.foosMinted++;
    return foo;
  }

  mintBar(): Bar {
    const bar: Bar = { type: 'bar', serial: this.nextBarSerial++ };
    this.bars.push(bar);
    this.stats.barsMinted++;
    return bar;
  }

  // --- Pool withdrawals (LIFO) ---

  takeFoo(): Foo {
    const foo = this.foos.pop();
    if (!foo) throw new ContractViolation('No foo available');
    return foo;
  }

  takeBar(): Bar {
    const bar = this.bars.pop();
    if (!bar) throw new ContractViolation('No bar available');
    return bar;
  }

  takeFoos(count: number): Foo[] {
    return takeLast(this.foos, count, 'foos');
  }

  takeFoobars(count: number): Foobar[] {
    return takeLast(this.foobars, count, 'foobars');
  }

  // --- Treasury ---

  credit(amount: number): void {
    this.money += amount;
    this.stats.moneyEarned += amount;
  }

  debit(amount: number): void {
    if (this.money < amount) {
      throw new ContractViolation(`Cannot pay ${amount} with a balance of ${this.money}`);
    }
    this.money -= amount;
    this.stats.moneySpent += amount;
  }

  emit(event: SimEvent): void {
    this.tickEvents.push(event);
  }
}

/** Removes the `count` most recent items, most recent first. */
function takeLast<T>(pool: T[], count: number, label: string): T[] {
  if (pool.length < count) {
    throw new ContractViolation(`Cannot take ${count} ${label} from a pool of ${pool.length}`);
  }
  if (count === 0) return [];
  return pool.splice(pool.length - count).reverse();
}
