// tests/world.test.ts — Tests for WorldState

import { describe, it, expect } from 'vitest';
import { WorldState } from '../src/sim/world.js';
import { ContractViolation } from '../src/shared/errors.js';

describe('WorldState', () => {
  it('starts with two idle robots, empty pools and no money', () => {
    const world = new WorldState();

    expect(world.tick).toBe(0);
    expect(world.robots).toHaveLength(2);
    expect(world.robots.map((r) => r.index)).toEqual([0, 1]);
    for (const robot of world.robots) {
      expect(robot.action).toEqual({ kind: 'idle', remainingTicks: 0, previous: null });
      expect(robot.lastCompleted).toBeNull();
    }
    expect(world.foos).toEqual([]);
    expect(world.bars).toEqual([]);
    expect(world.foobars).toEqual([]);
    expect(world.money).toBe(0);
  });

  it('appends robots at the next index', () => {
    const world = new WorldState(1);
    const robot = world.addRobot();
    expect(robot.index).toBe(1);
    expect(world.robots).toHaveLength(2);
  });

  describe('minting', () => {
    it('gives foos and bars independent, increasing serials', () => {
      const world = new WorldState();
      expect(world.mintFoo().serial).toBe(0);
      expect(world.mintFoo().serial).toBe(1);
      expect(world.mintBar().serial).toBe(0);
      expect(world.mintFoo().serial).toBe(2);
      expect(world.stats.foosMinted).toBe(3);
      expect(world.stats.barsMinted).toBe(1);
    });

    it('never reuses a serial after units leave the pool', () => {
      const world = new WorldState();
      world.mintFoo();
      world.mintFoo();
      world.takeFoos(2);
      expect(world.mintFoo().serial).toBe(2);
    });
  });

  describe('withdrawals', () => {
    it('takes the most recent units first', () => {
      const world = new WorldState();
      for (let i = 0; i < 8; i++) world.mintFoo();

      const taken = world.takeFoos(6);

      expect(taken.map((f) => f.serial)).toEqual([7, 6, 5, 4, 3, 2]);
      expect(world.foos.map((f) => f.serial)).toEqual([0, 1]);
    });

    it('takeFoo and takeBar pop the newest unit', () => {
      const world = new WorldState();
      world.mintFoo();
      world.mintFoo();
      world.mintBar();
      expect(world.takeFoo().serial).toBe(1);
      expect(world.takeBar().serial).toBe(0);
    });

    it('taking zero leaves the pool alone', () => {
      const world = new WorldState();
      world.mintFoo();
      expect(world.takeFoos(0)).toEqual([]);
      expect(world.foos).toHaveLength(1);
    });

    it('refuses to overdraw a pool', () => {
      const world = new WorldState();
      world.mintFoo();
      expect(() => world.takeFoos(2)).toThrow('Cannot take 2 foos from a pool of 1');
      expect(() => world.takeBar()).toThrow(ContractViolation);
      expect(world.foos).toHaveLength(1);
    });
  });

  describe('treasury', () => {
    it('tracks earnings and spending', () => {
      const world = new WorldState();
      world.credit(5);
      world.debit(3);
      expect(world.money).toBe(2);
      expect(world.stats.moneyEarned).toBe(5);
      expect(world.stats.moneySpent).toBe(3);
    });

    it('refuses to go negative', () => {
      const world = new WorldState();
      world.credit(2);
      expect(() => world.debit(3)).toThrow('Cannot pay 3 with a balance of 2');
      expect(world.money).toBe(2);
    });
  });
});
