export { createSensorHealthState, updateSensorHealth, effectiveTemperature } from './sensor-health';
export { checkNoReading, checkStuckSensor, isSampleExpired } from './helpers';
export type { SensorHealthState, SensorHealthConfig, NoReadingResult, StuckSensorResult } from './types';
