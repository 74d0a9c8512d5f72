/**
 * Public API
 */

export { initialize, createAppLogger } from '@boot/init';
export { DEFAULT_ZONE_CONFIG, APP_CONSTANTS, DEFAULT_LOGGING_CONFIG, buildZoneConfig, buildEngineConfig } from '@boot/config';
export type { InitOptions, HeatingApp } from '@boot/types';

export { createHeatingEngine } from '@system/engine';
export type { HeatingEngine, HeatingEngineDependencies, EngineEventListener } from '@system/engine';
export type { ZoneSnapshot, PersistedZoneState, BlockReason, DegradedReason } from '@system/zone';
export { createJsonFileStateStore, createMemoryStateStore, parsePersistedState } from '@system/persistence';
export type { PersistedEngineState, RuntimeStateStore } from '@system/persistence';

export { createMemoryActuatorPort } from '@hardware/actuator';
export type { ActuatorPort, ActuatorAction, MemoryActuatorPort } from '@hardware/actuator';
export { EVENT_NAMES } from '@events/types';
export type { SensorEvent, EngineEvent, ZoneStateEvent, ZoneAlertEvent, ZoneAlertKind } from '@events/types';

export { validateZoneConfig, validateEngineConfig } from '@validation';
export { createLogger, createConsoleSink, createWebhookSink, LOG_LEVELS } from '@logging';
export { createNodeTimerApi, createSimulatedClock } from '@utils/time';

export * from '$types';
