// types/action.ts — Robot actions

import type { Bar, Foo, Foobar } from './resources.js';

export type ActionKind =
  | 'idle'
  | 'changing_task'
  | 'mining_foo'
  | 'mining_bar'
  | 'assembling_foobar'
  | 'selling_foobars'
  | 'buying_robot';

/** Kinds that produce an effect when they complete. */
export type WorkKind = Exclude<ActionKind, 'idle' | 'changing_task'>;

export interface IdleAction {
  kind: 'idle';
  remainingTicks: 0;
  previous: WorkKind | null;
}

export interface MiningFooAction {
  kind: 'mining_foo';
  remainingTicks: number;
}

export interface MiningBarAction {
  kind: 'mining_bar';
  remainingTicks: number;
}

export interface AssemblingFoobarAction {
  kind: 'assembling_foobar';
  remainingTicks: number;
  foo: Foo;
  bar: Bar;
}

export interface SellingFoobarsAction {
  kind: 'selling_foobars';
  remainingTicks: number;
  foobars: Foobar[];
}

export interface BuyingRobotAction {
  kind: 'buying_robot';
  remainingTicks: number;
  foos: Foo[];
}

export type WorkAction =
  | MiningFooAction
  | MiningBarAction
  | AssemblingFoobarAction
  | SellingFoobarsAction
  | BuyingRobotAction;

export interface ChangingTaskAction {
  kind: 'changing_task';
  remainingTicks: number;
  next: WorkAction;
}

export type Action = IdleAction | ChangingTaskAction | WorkAction;
