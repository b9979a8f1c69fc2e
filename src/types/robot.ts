// types/robot.ts — Robots

import type { RobotIndex } from './core.js';
import type { Action, WorkKind } from './action.js';

export interface Robot {
  /** Position in the fleet; robots are never removed, so this is stable. */
  index: RobotIndex;
  action: Action;
  lastCompleted: WorkKind | null;
}
