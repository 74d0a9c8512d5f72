export { createActuatorCommander } from './actuator';
export { createMemoryActuatorPort } from './memory-port';
export type { MemoryActuatorPort } from './memory-port';
export type {
  ActuatorAction,
  ActuatorPort,
  ActuatorCommander,
  ActuatorCommanderConfig,
  ActuatorHistoryEntry
} from './types';
