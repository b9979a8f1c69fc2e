// types/core.ts — Fundamental types

import { TICKS_PER_SECOND } from '../shared/constants.js';

export type Tick = number;
export type Serial = number;
export type RobotIndex = number;

export function elapsedSeconds(tick: Tick): number {
  return tick / TICKS_PER_SECOND;
}
