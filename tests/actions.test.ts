// tests/actions.test.ts — Tests for action constructors

import { describe, it, expect } from 'vitest';
import {
  buyingRobot,
  changingTask,
  idle,
  miningBar,
  miningFoo,
  pendingAction,
  sellingFoobars,
  assemblingFoobar,
} from '../src/pipeline/actions.js';
import type { RandomSource } from '../src/sim/rng.js';
import { ContractViolation } from '../src/shared/errors.js';
import type { Foo, Foobar } from '../src/types/index.js';

function fixedRng(value: number): RandomSource {
  return { next: () => value };
}

function makeFoos(count: number): Foo[] {
  return Array.from({ length: count }, (_, i): Foo => ({ type: 'foo', serial: i }));
}

function makeFoobars(count: number): Foobar[] {
  return Array.from({ length: count }, (_, i): Foobar => ({
    type: 'foobar',
    foo: { type: 'foo', serial: i },
    bar: { type: 'bar', serial: i },
  }));
}

describe('actions', () => {
  it('idle takes no time and remembers what came before', () => {
    expect(idle()).toEqual({ kind: 'idle', remainingTicks: 0, previous: null });
    expect(idle('mining_foo')).toEqual({ kind: 'idle', remainingTicks: 0, previous: 'mining_foo' });
  });

  it('mining foo takes 10 ticks', () => {
    expect(miningFoo().remainingTicks).toBe(10);
  });

  describe('miningBar', () => {
    it('takes 5 ticks on a zero draw', () => {
      expect(miningBar(fixedRng(0)).remainingTicks).toBe(5);
    });

    it('takes 20 ticks on a draw just below 1', () => {
      expect(miningBar(fixedRng(0.9999)).remainingTicks).toBe(20);
    });

    it('rounds the scaled draw', () => {
      // 0.5 * 15 = 7.5 rounds to 8
      expect(miningBar(fixedRng(0.5)).remainingTicks).toBe(13);
      // 0.2 * 15 = 3 exactly
      expect(miningBar(fixedRng(0.2)).remainingTicks).toBe(8);
    });

    it('draws exactly once', () => {
      let draws = 0;
      miningBar({ next: () => { draws++; return 0.1; } });
      expect(draws).toBe(1);
    });
  });

  it('assembling holds both units for 20 ticks', () => {
    const foo: Foo = { type: 'foo', serial: 3 };
    const action = assemblingFoobar(foo, { type: 'bar', serial: 9 });
    expect(action.remainingTicks).toBe(20);
    expect(action.foo).toBe(foo);
    expect(action.bar.serial).toBe(9);
  });

  describe('sellingFoobars', () => {
    it('accepts 5 foobars', () => {
      const action = sellingFoobars(makeFoobars(5));
      expect(action.remainingTicks).toBe(100);
      expect(action.foobars).toHaveLength(5);
    });

    it('rejects 6 foobars', () => {
      expect(() => sellingFoobars(makeFoobars(6))).toThrow(ContractViolation);
      expect(() => sellingFoobars(makeFoobars(6))).toThrow('Cannot sell 6 foobars at once (max 5)');
    });
  });

  describe('buyingRobot', () => {
    it('accepts exactly 6 foos', () => {
      const action = buyingRobot(makeFoos(6));
      expect(action.remainingTicks).toBe(100);
      expect(action.foos).toHaveLength(6);
    });

    it('rejects 5 foos', () => {
      expect(() => buyingRobot(makeFoos(5))).toThrow(ContractViolation);
    });

    it('rejects 7 foos', () => {
      expect(() => buyingRobot(makeFoos(7))).toThrow('Buying a robot takes exactly 6 foos, got 7');
    });
  });

  describe('changingTask', () => {
    it('takes 50 ticks and leaves the wrapped action untouched', () => {
      const next = miningFoo();
      const action = changingTask(next);
      expect(action.remainingTicks).toBe(50);
      expect(action.next).toBe(next);
      expect(action.next.remainingTicks).toBe(10);
    });

    it('pendingAction looks through the wrapper', () => {
      const next = miningFoo();
      expect(pendingAction(changingTask(next))).toBe(next);
      expect(pendingAction(next)).toBe(next);
    });
  });
});
