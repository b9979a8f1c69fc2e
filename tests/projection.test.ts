// tests/projection.test.ts — Tests for projectFutureState

import { describe, it, expect } from 'vitest';
import { projectFutureState } from '../src/pipeline/projection.js';
import { WorldState } from '../src/sim/world.js';
import {
  assemblingFoobar,
  buyingRobot,
  changingTask,
  miningBar,
  miningFoo,
  sellingFoobars,
} from '../src/pipeline/actions.js';
import type { Foo, Foobar, Robot } from '../src/types/index.js';

function robotAt(world: WorldState, index: number): Robot {
  const robot = world.robots[index];
  if (!robot) throw new Error(`no robot #${index}`);
  return robot;
}

describe('projectFutureState', () => {
  it('matches the pools when nothing is in flight', () => {
    const world = new WorldState(2);
    world.mintFoo();
    world.mintBar();
    world.credit(2);

    expect(projectFutureState(world)).toEqual({
      foos: 1,
      bars: 1,
      foobars: 0,
      money: 2,
      robots: 2,
    });
  });

  it('adds the expected output of every in-flight action', () => {
    const world = new WorldState(5);
    const foobars: Foobar[] = Array.from({ length: 3 }, (_, i) => ({
      type: 'foobar',
      foo: { type: 'foo', serial: i },
      bar: { type: 'bar', serial: i },
    }));
    const foos: Foo[] = Array.from({ length: 6 }, (_, i) => ({ type: 'foo', serial: 10 + i }));
    world.credit(5);

    robotAt(world, 0).action = miningFoo();
    robotAt(world, 1).action = changingTask(miningBar({ next: () => 0 }));
    robotAt(world, 2).action = assemblingFoobar({ type: 'foo', serial: 20 }, { type: 'bar', serial: 20 });
    robotAt(world, 3).action = sellingFoobars(foobars);
    robotAt(world, 4).action = changingTask(buyingRobot(foos));

    const projection = projectFutureState(world);

    expect(projection.foos).toBe(1);
    expect(projection.bars).toBeCloseTo(1.4);
    expect(projection.foobars).toBeCloseTo(0.6);
    expect(projection.money).toBe(5);
    expect(projection.robots).toBe(6);
  });

  it('does not change the world', () => {
    const world = new WorldState(1);
    robotAt(world, 0).action = miningFoo();

    projectFutureState(world);

    expect(world.foos).toHaveLength(0);
    expect(robotAt(world, 0).action).toEqual({ kind: 'mining_foo', remainingTicks: 10 });
  });
});
