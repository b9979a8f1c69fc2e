// index.ts — Public API

export * from './types/index.js';
export * from './shared/constants.js';
export { ContractViolation } from './shared/errors.js';
export { loadConfig, type SimulationConfig } from './shared/config.js';
export { SeededRng, type RandomSource } from './sim/rng.js';
export { WorldState } from './sim/world.js';
export { TickLoop, type TickLoopOptions } from './sim/tick-loop.js';
export { EventLog, formatEvent, formatSlowTick, type LogSink } from './sim/event-log.js';
export { checkConservation } from './sim/conservation.js';
export { createSimulation, type Simulation } from './sim/simulation.js';
export * from './pipeline/actions.js';
export { ProgressProcessor } from './pipeline/progress-processor.js';
export { DispatchPolicy, shouldRobotTake, uncommittedMoney } from './pipeline/dispatch-policy.js';
export { projectFutureState, type Projection } from './pipeline/projection.js';
