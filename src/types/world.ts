// types/world.ts — Simulation events

import type { RobotIndex, Serial } from './core.js';
import type { WorkKind } from './action.js';

export type SimEvent =
  | { type: 'foo_mined'; robot: RobotIndex; serial: Serial }
  | { type: 'bar_mined'; robot: RobotIndex; serial: Serial }
  | { type: 'foobar_assembled'; robot: RobotIndex; foo: Serial; bar: Serial }
  | { type: 'assembly_failed'; robot: RobotIndex; foo: Serial; bar: Serial }
  | { type: 'foobars_sold'; robot: RobotIndex; count: number; money: number }
  | { type: 'robot_bought'; robot: RobotIndex; newRobot: RobotIndex; fleet: number; money: number }
  | { type: 'task_changed'; robot: RobotIndex; from: WorkKind; to: WorkKind };
