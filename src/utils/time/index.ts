export { now, nowMs } from './time';
export { elapsedSec, formatDuration } from './helpers';
export { createNodeTimerApi, createDelayedAction } from './timers';
export type { DelayedAction, DelayedActionStatus } from './timers';
export { createSimulatedClock } from './simulated-clock';
export type { SimulatedClock } from './simulated-clock';
export { createSerialQueue, withTimeout } from './serial-queue';
export type { SerialQueue } from './serial-queue';
