// shared/constants.ts — All simulation constants

export const TICK_DURATION_MS = 100;
export const TICKS_PER_SECOND = 1000 / TICK_DURATION_MS;

export const INITIAL_ROBOTS = 2;
export const FLEET_TARGET = 30;

export const CHANGING_TASK_TICKS = 50;
export const MINING_FOO_TICKS = 10;
export const MINING_BAR_MIN_TICKS = 5;
export const MINING_BAR_SPREAD_TICKS = 15;
export const ASSEMBLING_TICKS = 20;
export const SELLING_TICKS = 100;
export const BUYING_TICKS = 100;

export const ASSEMBLY_SUCCESS_RATE = 0.6;

export const SELL_BATCH_SIZE = 5;
export const FOOBAR_PRICE = 1;

export const ROBOT_PRICE = 3;
export const ROBOT_FOO_COST = 6;

/** Foos kept back before any are committed to assembly or purchases. */
export const FOO_RESERVE = 6;

/** Projected foo surplus over bars below which idle robots mine foo. */
export const FOO_SURPLUS_TARGET = 6;

export const SLOW_TICK_MS = 50;
export const DEFAULT_STATUS_INTERVAL_TICKS = 600;
